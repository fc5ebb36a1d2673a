/**
 * Relation Helpers
 *
 * Schema-driven type guessing and conversion between field values and
 * stored column values.
 *
 * @module model/relations
 */

import type { FieldValue } from '../field/types.js';
import type { ColumnValue, DataAccess, RowId } from './types.js';

/**
 * Field type for a name declared in an `auto_*` group.
 */
export function guessFieldType(dataAccess: DataAccess, table: string, name: string): string {
  if (dataAccess.schemaHasRelationship(table, name)) {
    return dataAccess.relationshipMetadata(table, name).kind === 'single' ? 'Select' : 'Multiple';
  }
  if (name.endsWith('_time')) return 'DateTime';
  return 'Text';
}

/**
 * Column value for a field value. Unset becomes null; lists are joined
 * with commas and nested row data is stored as JSON.
 */
export function toColumnValue(value: FieldValue | undefined): ColumnValue {
  if (value === undefined) return null;
  if (Array.isArray(value)) return value.map((v) => String(v)).join(',');
  if (value instanceof Date) return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return value;
}

/**
 * Comparison key for stored and submitted values: booleans as 1/0, dates
 * as ISO strings, everything else as its string form.
 */
export function valueKey(value: ColumnValue): string {
  if (value === null) return '';
  if (typeof value === 'boolean') return value ? '1' : '0';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function isFalsy(value: ColumnValue | undefined): boolean {
  return (
    value === undefined ||
    value === null ||
    value === false ||
    value === 0 ||
    value === '' ||
    value === '0'
  );
}

/**
 * True when writing `next` over `current` changes nothing. Two falsy
 * values (null, empty, 0, false) count as the same.
 */
export function sameColumnValue(current: ColumnValue | undefined, next: ColumnValue): boolean {
  if (isFalsy(current) && isFalsy(next)) return true;
  if (current === undefined || isFalsy(current) !== isFalsy(next)) return false;
  return valueKey(current) === valueKey(next);
}

/**
 * Ids of a multi-valued field's value, in order, without duplicates.
 */
export function selectedIds(value: FieldValue | undefined): RowId[] {
  if (value === undefined) return [];
  const values = Array.isArray(value) ? value : [value];
  const ids = new Map<string, RowId>();
  for (const v of values) {
    if (typeof v === 'string' || typeof v === 'number') ids.set(String(v), v);
  }
  return [...ids.values()];
}
