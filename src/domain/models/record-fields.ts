/**
 * Declarative field lists for hydrating typed entities from untyped rows.
 *
 * Each entity declares one decoder per attribute. Hydration copies the fields
 * present on the source that decode cleanly; unknown source keys are ignored
 * and fields that are missing or fail to decode keep the entity's defaults.
 */

/** Decodes one raw value; `undefined` means "treat as missing". */
export type FieldDecoder<V> = (value: unknown) => V | undefined;

export type FieldList<T> = { readonly [K in keyof T]: FieldDecoder<T[K]> };

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * Integer column. Accepts integral numbers and base-10 integer strings
 * (node-postgres hands back int8 columns as strings).
 */
export const intField: FieldDecoder<number> = (value) => {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : undefined;
  }
  if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
    const parsed = Number(value.trim());
    return Number.isSafeInteger(parsed) ? parsed : undefined;
  }
  return undefined;
};

export const stringField: FieldDecoder<string> = (value) =>
  typeof value === 'string' ? value : undefined;

/** Copy every declared field present on `source` over `defaults`. */
export function hydrateFields<T extends object>(
  defaults: T,
  fields: FieldList<T>,
  source: Record<string, unknown>,
): T {
  const result = { ...defaults };
  for (const key in fields) {
    if (!Object.prototype.hasOwnProperty.call(source, key)) continue;
    const decoded = fields[key](source[key]);
    if (decoded !== undefined) {
      result[key] = decoded;
    }
  }
  return result;
}

/** Serialize the declared fields of `values` into a plain row. */
export function serializeFields<T extends object>(
  values: T,
  fields: FieldList<T>,
): Record<string, unknown> {
  const row: Record<string, unknown> = {};
  for (const key in fields) {
    row[key] = values[key];
  }
  return row;
}
