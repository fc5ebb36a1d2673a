/**
 * Data Access Types
 *
 * The capability the model binding needs from a backing store. Row
 * operations are asynchronous; schema introspection is not, since forms
 * are built synchronously.
 *
 * @module model/types
 */

export type RowId = string | number;

export type ColumnValue = string | number | boolean | Date | null;

/**
 * Snapshot of one stored row.
 */
export interface Row {
  readonly table: string;
  readonly id: RowId;
  readonly values: Readonly<Record<string, ColumnValue>>;
}

/**
 * Column equality match. An array value matches any of its elements.
 */
export type Criteria = Readonly<Record<string, ColumnValue | readonly ColumnValue[]>>;

/**
 * A single criteria object, or a list of alternatives (any may match).
 * An empty list matches every row.
 */
export type Where = Criteria | readonly Criteria[];

/**
 * How a relationship is stored.
 *
 * - `single`: `joinColumn` on the owning table holds the id of the
 *   `foreignTable` row (`foreignColumn` is that table's key).
 * - `multi` with `linkTable`: link rows hold the owner's id in
 *   `joinColumn` and the related id in `foreignColumn`.
 * - `multi` without `linkTable`: rows of `foreignTable` hold the owner's
 *   id in `joinColumn`; `foreignColumn` is their key.
 */
export interface RelationshipMetadata {
  kind: 'single' | 'multi';
  joinColumn: string;
  foreignTable: string;
  foreignColumn: string;
  linkTable?: string;
}

export interface DataAccess {
  findById(table: string, id: RowId): Promise<Row | undefined>;
  listWhere(table: string, where?: Where, orderBy?: string): Promise<Row[]>;
  countWhere(table: string, where?: Where): Promise<number>;
  create(table: string, values: Readonly<Record<string, ColumnValue>>): Promise<Row>;
  update(row: Row, values: Readonly<Record<string, ColumnValue>>): Promise<Row>;
  linkRelated(row: Row, relation: string, foreignId: RowId): Promise<void>;
  unlinkRelated(row: Row, relation: string, foreignId: RowId): Promise<void>;
  listRelatedIds(row: Row, relation: string): Promise<RowId[]>;

  /**
   * @throws RelationshipConfigError when the storage of the relationship
   * cannot be determined
   */
  relationshipMetadata(table: string, relation: string): RelationshipMetadata;
  schemaHasTable(table: string): boolean;
  schemaHasColumn(table: string, name: string): boolean;
  schemaHasRelationship(table: string, name: string): boolean;
  /** Non-column attribute that can be read and written on a row */
  schemaHasAccessor(table: string, name: string): boolean;
  primaryKey(table: string): string;
}
