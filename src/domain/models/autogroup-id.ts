/**
 * The idNumber convention that marks a group as auto-managed:
 *
 *   autogroup|<groupSetId>
 *
 * where groupSetId is a positive decimal integer. Any idNumber without the
 * marker is an ordinary group.
 */
export const AUTOGROUP_MARKER = 'autogroup|';

export function hasAutogroupMarker(idNumber: unknown): idNumber is string {
  return typeof idNumber === 'string' && idNumber.includes(AUTOGROUP_MARKER);
}

/**
 * Group-set id carried by an idNumber: the leading integer of the segment after
 * the first '|'. Returns 0 when there is no such segment or it does not start
 * with a number, so callers only need to test `>= 1`.
 */
export function parseGroupSetId(idNumber: string): number {
  const segments = idNumber.split('|');
  if (segments.length < 2) return 0;
  const parsed = Number.parseInt(segments[1], 10);
  return Number.isNaN(parsed) ? 0 : parsed;
}

export function formatAutogroupIdNumber(groupSetId: number): string {
  if (!Number.isSafeInteger(groupSetId) || groupSetId < 1) {
    throw new RangeError(`Group-set id must be a positive integer, got ${groupSetId}.`);
  }
  return `${AUTOGROUP_MARKER}${groupSetId}`;
}
