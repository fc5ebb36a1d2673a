/**
 * In-Memory Data Access
 *
 * A process-local store implementing the data-access capability, seeded
 * from a JSON description of tables, relationships and rows. Used by the
 * MCP host and by tests.
 *
 * @module model/memory-data-access
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ErrorCode } from '../shared/errors/error-codes.js';
import {
  DataAccessError,
  RecordNotFoundError,
  RelationshipConfigError,
} from '../shared/errors/form-error.js';
import { getLogger } from '../shared/services/logging.service.js';
import { valueKey } from './relations.js';
import type {
  ColumnValue,
  Criteria,
  DataAccess,
  RelationshipMetadata,
  Row,
  RowId,
  Where,
} from './types.js';

// ============================================================================
// Seed schema
// ============================================================================

const ColumnValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const RelationshipSeedSchema = z
  .object({
    kind: z.enum(['single', 'multi']),
    foreignTable: z.string().min(1),
    joinColumn: z.string().min(1).optional(),
    foreignColumn: z.string().min(1).optional(),
    linkTable: z.string().min(1).optional(),
  })
  .strict();

export const TableSeedSchema = z
  .object({
    primaryKey: z.string().min(1).default('id'),
    columns: z.array(z.string().min(1)).min(1),
    accessors: z.array(z.string().min(1)).default([]),
    relationships: z.record(z.string(), RelationshipSeedSchema).default({}),
    rows: z.array(z.record(z.string(), ColumnValueSchema)).default([]),
  })
  .strict();

export const DataSeedSchema = z
  .object({
    tables: z.record(z.string(), TableSeedSchema),
  })
  .strict();

export type DataSeed = z.input<typeof DataSeedSchema>;
type RelationshipSeed = z.infer<typeof RelationshipSeedSchema>;
type TableSeed = z.infer<typeof TableSeedSchema>;

type StoredRow = Record<string, ColumnValue>;

interface Table {
  readonly name: string;
  readonly def: TableSeed;
  readonly rows: Map<string, StoredRow>;
  nextId: number;
}

// ============================================================================
// Matching
// ============================================================================

function sameValue(a: ColumnValue | undefined, b: ColumnValue): boolean {
  if (a === undefined || a === null || b === null) {
    return (a === undefined || a === null) && b === null;
  }
  return valueKey(a) === valueKey(b);
}

function isValueList(value: ColumnValue | readonly ColumnValue[]): value is readonly ColumnValue[] {
  return Array.isArray(value);
}

function matchesCriteria(row: StoredRow, criteria: Criteria): boolean {
  return Object.entries(criteria).every(([column, expected]) => {
    const actual = row[column];
    if (isValueList(expected)) {
      return expected.some((value) => sameValue(actual, value));
    }
    return sameValue(actual, expected);
  });
}

function isCriteriaList(where: Where): where is readonly Criteria[] {
  return Array.isArray(where);
}

function matches(row: StoredRow, where: Where | undefined): boolean {
  if (where === undefined) return true;
  if (isCriteriaList(where)) {
    return where.length === 0 || where.some((criteria) => matchesCriteria(row, criteria));
  }
  return matchesCriteria(row, where);
}

function compareValues(a: ColumnValue | undefined, b: ColumnValue | undefined): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const left = a === undefined ? '' : valueKey(a);
  const right = b === undefined ? '' : valueKey(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

// ============================================================================
// Store
// ============================================================================

export class InMemoryDataAccess implements DataAccess {
  private readonly tables = new Map<string, Table>();
  private readonly logger = getLogger().child('store');

  constructor(seed: DataSeed) {
    const result = DataSeedSchema.safeParse(seed);
    if (!result.success) {
      throw new DataAccessError('Invalid data seed', ErrorCode.INVALID_DATA_FILE, {
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    for (const [name, def] of Object.entries(result.data.tables)) {
      const table: Table = { name, def, rows: new Map(), nextId: 1 };
      this.tables.set(name, table);
      for (const values of def.rows) {
        this.insert(table, values);
      }
    }
  }

  /**
   * Load a seed from a JSON file.
   */
  static async fromFile(path: string): Promise<InMemoryDataAccess> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(path, 'utf8'));
    } catch (error) {
      throw new DataAccessError(
        `Failed to read data file ${path}`,
        ErrorCode.INVALID_DATA_FILE,
        { path, reason: error instanceof Error ? error.message : String(error) },
      );
    }

    const result = DataSeedSchema.safeParse(parsed);
    if (!result.success) {
      throw new DataAccessError(`Invalid data file ${path}`, ErrorCode.INVALID_DATA_FILE, {
        path,
        issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return new InMemoryDataAccess(result.data);
  }

  // ==========================================================================
  // Rows
  // ==========================================================================

  async findById(table: string, id: RowId): Promise<Row | undefined> {
    const t = this.table(table);
    const values = t.rows.get(String(id));
    return values ? this.toRow(t, values) : undefined;
  }

  async listWhere(table: string, where?: Where, orderBy?: string): Promise<Row[]> {
    const t = this.table(table);
    const rows = [...t.rows.values()].filter((values) => matches(values, where));
    if (orderBy) {
      this.checkColumn(t, orderBy);
      rows.sort((a, b) => compareValues(a[orderBy], b[orderBy]));
    }
    return rows.map((values) => this.toRow(t, values));
  }

  async countWhere(table: string, where?: Where): Promise<number> {
    const t = this.table(table);
    let count = 0;
    for (const values of t.rows.values()) {
      if (matches(values, where)) count++;
    }
    return count;
  }

  async create(table: string, values: Readonly<Record<string, ColumnValue>>): Promise<Row> {
    const t = this.table(table);
    const stored = this.insert(t, values);
    this.logger.debug('Row created', { table, id: stored[t.def.primaryKey] });
    return this.toRow(t, stored);
  }

  async update(row: Row, values: Readonly<Record<string, ColumnValue>>): Promise<Row> {
    const t = this.table(row.table);
    const stored = t.rows.get(String(row.id));
    if (!stored) throw new RecordNotFoundError(row.table, row.id);

    for (const [column, value] of Object.entries(values)) {
      if (column === t.def.primaryKey) {
        throw new DataAccessError(`Cannot change the primary key of '${row.table}'`, ErrorCode.UNKNOWN_COLUMN, {
          table: row.table,
          column,
        });
      }
      this.checkWritable(t, column);
      stored[column] = value;
    }
    this.logger.debug('Row updated', { table: row.table, id: row.id, columns: Object.keys(values) });
    return this.toRow(t, stored);
  }

  // ==========================================================================
  // Relationships
  // ==========================================================================

  async linkRelated(row: Row, relation: string, foreignId: RowId): Promise<void> {
    const meta = this.relationshipMetadata(row.table, relation);
    const foreign = await this.findById(meta.foreignTable, foreignId);
    if (!foreign) throw new RecordNotFoundError(meta.foreignTable, foreignId);

    if (meta.kind === 'single') {
      await this.update(row, { [meta.joinColumn]: foreign.id });
      return;
    }

    if (meta.linkTable) {
      const link = this.table(meta.linkTable);
      const existing = [...link.rows.values()].some((values) =>
        matchesCriteria(values, { [meta.joinColumn]: row.id, [meta.foreignColumn]: foreign.id }),
      );
      if (!existing) {
        this.insert(link, { [meta.joinColumn]: row.id, [meta.foreignColumn]: foreign.id });
      }
      return;
    }

    await this.update(foreign, { [meta.joinColumn]: row.id });
  }

  async unlinkRelated(row: Row, relation: string, foreignId: RowId): Promise<void> {
    const meta = this.relationshipMetadata(row.table, relation);

    if (meta.kind === 'single') {
      const current = (await this.findById(row.table, row.id))?.values[meta.joinColumn];
      if (current !== undefined && sameValue(current, foreignId)) {
        await this.update(row, { [meta.joinColumn]: null });
      }
      return;
    }

    if (meta.linkTable) {
      const link = this.table(meta.linkTable);
      for (const [key, values] of link.rows) {
        if (matchesCriteria(values, { [meta.joinColumn]: row.id, [meta.foreignColumn]: foreignId })) {
          link.rows.delete(key);
        }
      }
      return;
    }

    const child = await this.findById(meta.foreignTable, foreignId);
    if (child && sameValue(child.values[meta.joinColumn], row.id)) {
      await this.update(child, { [meta.joinColumn]: null });
    }
  }

  async listRelatedIds(row: Row, relation: string): Promise<RowId[]> {
    const meta = this.relationshipMetadata(row.table, relation);

    if (meta.kind === 'single') {
      const current = (await this.findById(row.table, row.id))?.values[meta.joinColumn];
      return current === undefined || current === null || typeof current === 'boolean' || current instanceof Date
        ? []
        : [current];
    }

    if (meta.linkTable) {
      const ids: RowId[] = [];
      for (const values of this.table(meta.linkTable).rows.values()) {
        if (!sameValue(values[meta.joinColumn], row.id)) continue;
        const id = values[meta.foreignColumn];
        if (typeof id === 'string' || typeof id === 'number') ids.push(id);
      }
      return ids;
    }

    const children = await this.listWhere(meta.foreignTable, { [meta.joinColumn]: row.id });
    return children.map((child) => child.id);
  }

  /**
   * Resolve how a relationship is stored, filling in what the seed leaves
   * out.
   *
   * A link table's columns are inferred only when it has exactly one
   * single relationship back to the owning table and exactly one to the
   * related table; anything else must be declared.
   */
  relationshipMetadata(table: string, relation: string): RelationshipMetadata {
    const owner = this.table(table);
    const seed = owner.def.relationships[relation];
    if (!seed) {
      throw new RelationshipConfigError(`Table '${table}' has no relationship '${relation}'`, {
        table,
        relation,
      });
    }
    if (!this.tables.has(seed.foreignTable)) {
      throw new RelationshipConfigError(
        `Relationship '${table}.${relation}' refers to unknown table '${seed.foreignTable}'`,
        { table, relation, foreignTable: seed.foreignTable },
      );
    }

    if (seed.kind === 'single') return this.singleMetadata(owner, relation, seed);
    if (seed.linkTable) return this.linkMetadata(owner, relation, seed, seed.linkTable);
    return this.hasManyMetadata(owner, relation, seed);
  }

  private singleMetadata(owner: Table, relation: string, seed: RelationshipSeed): RelationshipMetadata {
    const foreign = this.table(seed.foreignTable);
    const candidates = seed.joinColumn ? [seed.joinColumn] : [`${relation}_id`, relation];
    const joinColumn = candidates.find((column) => owner.def.columns.includes(column));
    if (!joinColumn) {
      throw new RelationshipConfigError(
        `Cannot find the join column of '${owner.name}.${relation}'`,
        { table: owner.name, relation, tried: candidates },
      );
    }
    return {
      kind: 'single',
      joinColumn,
      foreignTable: seed.foreignTable,
      foreignColumn: seed.foreignColumn ?? foreign.def.primaryKey,
    };
  }

  private linkMetadata(
    owner: Table,
    relation: string,
    seed: RelationshipSeed,
    linkTable: string,
  ): RelationshipMetadata {
    const link = this.table(linkTable);
    const singles = this.singleRelationships(link);
    const back = singles.filter((rel) => rel.foreignTable === owner.name);
    const forward = singles.filter((rel) => rel.foreignTable === seed.foreignTable);

    const joinColumn = seed.joinColumn ?? (back.length === 1 ? back[0].joinColumn : undefined);
    const foreignColumn =
      seed.foreignColumn ??
      (forward.length === 1 && back.length === 1 && singles.length === 2 ? forward[0].joinColumn : undefined);

    if (!joinColumn || !foreignColumn) {
      throw new RelationshipConfigError(
        `Cannot infer the link columns of '${owner.name}.${relation}' through '${linkTable}'; declare joinColumn and foreignColumn`,
        { table: owner.name, relation, linkTable },
      );
    }
    for (const column of [joinColumn, foreignColumn]) {
      if (!link.def.columns.includes(column)) {
        throw new RelationshipConfigError(`Link table '${linkTable}' has no column '${column}'`, {
          table: owner.name,
          relation,
          linkTable,
          column,
        });
      }
    }

    return { kind: 'multi', joinColumn, foreignTable: seed.foreignTable, foreignColumn, linkTable };
  }

  private hasManyMetadata(owner: Table, relation: string, seed: RelationshipSeed): RelationshipMetadata {
    const child = this.table(seed.foreignTable);
    const back = this.singleRelationships(child).filter((rel) => rel.foreignTable === owner.name);

    let joinColumn = seed.joinColumn;
    if (!joinColumn && back.length === 1) joinColumn = back[0].joinColumn;
    if (!joinColumn && back.length === 0 && child.def.columns.includes(`${owner.name}_id`)) {
      joinColumn = `${owner.name}_id`;
    }
    if (!joinColumn || !child.def.columns.includes(joinColumn)) {
      throw new RelationshipConfigError(
        `Cannot infer the column of '${seed.foreignTable}' referring back to '${owner.name}' for '${relation}'`,
        { table: owner.name, relation, foreignTable: seed.foreignTable },
      );
    }

    return {
      kind: 'multi',
      joinColumn,
      foreignTable: seed.foreignTable,
      foreignColumn: child.def.primaryKey,
    };
  }

  private singleRelationships(table: Table): RelationshipMetadata[] {
    return Object.entries(table.def.relationships)
      .filter(([, rel]) => rel.kind === 'single')
      .map(([name, rel]) => this.singleMetadata(table, name, rel));
  }

  // ==========================================================================
  // Schema
  // ==========================================================================

  schemaHasTable(table: string): boolean {
    return this.tables.has(table);
  }

  schemaHasColumn(table: string, name: string): boolean {
    return this.tables.get(table)?.def.columns.includes(name) ?? false;
  }

  schemaHasRelationship(table: string, name: string): boolean {
    const relationships = this.tables.get(table)?.def.relationships;
    return relationships !== undefined && Object.prototype.hasOwnProperty.call(relationships, name);
  }

  schemaHasAccessor(table: string, name: string): boolean {
    return this.tables.get(table)?.def.accessors.includes(name) ?? false;
  }

  primaryKey(table: string): string {
    return this.table(table).def.primaryKey;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private table(name: string): Table {
    const table = this.tables.get(name);
    if (!table) {
      throw new DataAccessError(`Unknown table '${name}'`, ErrorCode.TABLE_NOT_FOUND, { table: name });
    }
    return table;
  }

  private checkColumn(table: Table, column: string): void {
    if (!table.def.columns.includes(column)) {
      throw new DataAccessError(`Table '${table.name}' has no column '${column}'`, ErrorCode.UNKNOWN_COLUMN, {
        table: table.name,
        column,
      });
    }
  }

  private checkWritable(table: Table, column: string): void {
    if (!table.def.accessors.includes(column)) this.checkColumn(table, column);
  }

  private insert(table: Table, values: Readonly<Record<string, ColumnValue>>): StoredRow {
    const pk = table.def.primaryKey;
    const stored: StoredRow = {};
    for (const column of table.def.columns) {
      stored[column] = null;
    }
    for (const [column, value] of Object.entries(values)) {
      this.checkWritable(table, column);
      stored[column] = value;
    }

    let id = stored[pk];
    if (id === null || id === undefined) {
      id = table.nextId;
      stored[pk] = id;
    }
    if (typeof id !== 'string' && typeof id !== 'number') {
      throw new DataAccessError(`Invalid primary key for '${table.name}'`, ErrorCode.UNSUPPORTED_VALUE, {
        table: table.name,
      });
    }

    const key = String(id);
    if (table.rows.has(key)) {
      throw new DataAccessError(
        `Duplicate primary key '${key}' in '${table.name}'`,
        ErrorCode.UNSUPPORTED_VALUE,
        { table: table.name, id },
      );
    }
    table.rows.set(key, stored);

    const numeric = Number(id);
    if (Number.isInteger(numeric) && numeric >= table.nextId) {
      table.nextId = numeric + 1;
    }
    return stored;
  }

  private toRow(table: Table, values: StoredRow): Row {
    const id = values[table.def.primaryKey];
    return {
      table: table.name,
      id: typeof id === 'number' ? id : String(id),
      values: { ...values },
    };
  }
}
