/**
 * Domain models for autogroups, group-sets and their membership rows.
 *
 * Field names are camelCase at the domain boundary; storage adapters map their
 * own column names onto these shapes.
 */

/** Persisted attribute set of a group, as handed to the mutation primitives. */
export interface GroupAttributes {
  id: number;
  courseId: number;
  idNumber: string;
  name: string;
  description: string;
  descriptionFormat: number;
  enrolmentKey: string;
  picture: number;
  timeCreated: number;
  timeModified: number;
  visibility: number;
  participation: number;
}

/**
 * Untyped group row as produced by a store or supplied by a caller.
 * Values are checked field-by-field during hydration.
 */
export type RawGroupRecord = Record<string, unknown>;

/** Membership snapshot: membership-record id → user id, ascending by key. */
export type MembershipMap = Map<number, number>;

export interface GroupSetRecord {
  id: number;
  courseId: number;
}

export interface ManualAssignmentRecord {
  userId: number;
  groupId: number;
}

export interface MembershipRecord {
  id: number;
  groupId: number;
  userId: number;
  component: string;
  timeAdded: number;
}

/** Tables that `recordExists` may be asked about. */
export type ExistenceTable = 'autogroup_set' | 'autogroup_manual';

export type ExistenceFilter = Record<string, number>;

/** Origin tag stamped on memberships created by reconciliation. */
export const AUTOGROUP_COMPONENT = 'autogroup';

/** Runtime switches the entity consults on every call. */
export interface AutogroupSettings {
  /** When true, members with a manual-assignment marker are never removed automatically. */
  preserveManuallyAssignedMembers: boolean;
}
