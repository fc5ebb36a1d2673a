/**
 * Model Form
 *
 * A form bound to one table of a data store: loads initial values and
 * option lists from the bound record, checks uniqueness, and writes the
 * validated values back, reconciling relationships.
 *
 * @module model/model-form
 */

import type { FieldOption } from '../field/field-spec.js';
import { toFieldValue, type Field } from '../field/field.js';
import type { FieldValue, FormParams } from '../field/types.js';
import { Form, type FormOptions } from '../form/form.js';
import { Messages } from '../messages/message-catalog.js';
import { ErrorCode, ErrorSeverity } from '../shared/errors/error-codes.js';
import { FormConfigError, FormProcessorError } from '../shared/errors/form-error.js';
import {
  guessFieldType,
  sameColumnValue,
  selectedIds,
  toColumnValue,
} from './relations.js';
import type { ColumnValue, Criteria, DataAccess, Row, RowId } from './types.js';

export interface ModelFormOptions extends FormOptions {
  table: string;
  dataAccess: DataAccess;
  /** Id of the record to edit; absent for a new record */
  itemId?: RowId;
  /** Record to edit, already loaded */
  item?: Row;
  /** Overrides every field's `activeColumn` when looking up options */
  activeColumn?: string;
}

interface MultiUpdate {
  relation: string;
  ids: RowId[];
}

export class ModelForm extends Form {
  readonly table: string;
  readonly dataAccess: DataAccess;
  readonly activeColumn?: string;

  item?: Row;
  itemId?: RowId;

  constructor(options: ModelFormOptions) {
    const { dataAccess, table } = options;
    if (!dataAccess.schemaHasTable(table)) {
      throw new FormConfigError(
        `Form '${options.name}' is bound to unknown table '${table}'`,
        ErrorCode.TABLE_NOT_FOUND,
        { form: options.name, table },
      );
    }

    super({
      ...options,
      guessFieldType: options.guessFieldType ?? ((name) => guessFieldType(dataAccess, table, name)),
    });

    this.table = table;
    this.dataAccess = dataAccess;
    this.activeColumn = options.activeColumn;
    this.item = options.item;
    this.itemId = options.item?.id ?? options.itemId;
  }

  // ==========================================================================
  // Initialization
  // ==========================================================================

  /**
   * Load the bound record, check relationship metadata, then load initial
   * values and option lists.
   *
   * An `itemId` with no matching record is dropped and the form acts as a
   * form for a new record.
   *
   * @throws RelationshipConfigError when a relationship field's storage
   * cannot be resolved
   */
  override async initialize(): Promise<this> {
    await this.initItem();
    this.checkRelationships();

    if (this.item) {
      await this.initFromRecord(this.item);
    } else {
      await this.initFromObject();
    }
    await this.loadOptions();
    return this;
  }

  private async initItem(): Promise<void> {
    if (this.item || this.itemId === undefined) return;

    const item = await this.dataAccess.findById(this.table, this.itemId);
    if (!item) {
      this.logger.info('Record not found; treating form as new', {
        form: this.name,
        table: this.table,
        itemId: this.itemId,
      });
      this.itemId = undefined;
      return;
    }
    this.item = item;
  }

  private checkRelationships(): void {
    for (const field of this.fields) {
      const name = this.bareName(field);
      if (this.dataAccess.schemaHasRelationship(this.table, name)) {
        this.dataAccess.relationshipMetadata(this.table, name);
      }
    }
  }

  /**
   * Set every field's initial value (and value) from `item`.
   */
  async initFromRecord(item: Row): Promise<void> {
    for (const field of this.fields) {
      const hook = this.hooks.initValue?.[this.bareName(field)];
      const value = hook ? await hook(field, this) : await this.initValue(field, item);
      field.initValue = value;
      field.value = value;
    }
    this.resetParams();
  }

  /**
   * Read a field's value from a record: a column, the related id of a
   * single relationship, or the related ids of a multi relationship.
   */
  protected async initValue(field: Field, item: Row): Promise<FieldValue | undefined> {
    const name = this.bareName(field);
    const { dataAccess, table } = this;

    if (dataAccess.schemaHasRelationship(table, name)) {
      const meta = dataAccess.relationshipMetadata(table, name);

      if (meta.kind === 'multi') {
        return dataAccess.listRelatedIds(item, name);
      }
      if (field.hasOptions) {
        return toFieldValue(item.values[meta.joinColumn]);
      }

      // Relationship without a choice list: the related row's columns
      const foreignId = item.values[meta.joinColumn];
      if (typeof foreignId !== 'string' && typeof foreignId !== 'number') return undefined;
      const related = await dataAccess.findById(meta.foreignTable, foreignId);
      return related ? { ...related.values } : undefined;
    }

    if (dataAccess.schemaHasColumn(table, name) || dataAccess.schemaHasAccessor(table, name)) {
      return toFieldValue(item.values[name]);
    }
    return undefined;
  }

  /**
   * Options from the related table: active rows plus rows the field
   * already refers to, sorted by `sortColumn` (default: the label
   * column). Inactive rows are labelled `[ label ]`.
   */
  protected override async lookupOptions(field: Field): Promise<FieldOption[]> {
    const name = this.bareName(field);
    const { dataAccess } = this;
    if (!dataAccess.schemaHasRelationship(this.table, name)) return [];

    const source = dataAccess.relationshipMetadata(this.table, name).foreignTable;
    const labelColumn = field.labelColumn;
    if (!dataAccess.schemaHasColumn(source, labelColumn)) return [];

    const requestedActive = this.activeColumn ?? field.activeColumn;
    const activeColumn = dataAccess.schemaHasColumn(source, requestedActive) ? requestedActive : undefined;
    const sortColumn =
      field.sortColumn && dataAccess.schemaHasColumn(source, field.sortColumn) ? field.sortColumn : labelColumn;

    const where: Criteria[] = [];
    if (activeColumn) {
      where.push({ [activeColumn]: true });
      const current = selectedIds(field.initValue);
      if (this.item && current.length > 0) {
        where.push({ [dataAccess.primaryKey(source)]: current });
      }
    }

    const rows = await dataAccess.listWhere(source, where, sortColumn);
    return rows.map((row) => {
      const label = String(row.values[labelColumn] ?? '');
      const inactive = activeColumn !== undefined && !isTrue(row.values[activeColumn]);
      return { value: row.id, label: inactive ? `[ ${label} ]` : label };
    });
  }

  // ==========================================================================
  // Validation
  // ==========================================================================

  protected override async modelValidate(): Promise<void> {
    await this.validateUnique();
  }

  /**
   * Check fields declared unique against the table. A match on the record
   * being edited is not a conflict.
   *
   * @returns Number of fields that failed
   */
  async validateUnique(): Promise<number> {
    const candidates = new Map<Field, string | undefined>();
    const listMessage = Array.isArray(this.profile.unique) ? Messages.NOT_UNIQUE : undefined;
    for (const [name, message] of this.uniqueRules) {
      candidates.set(this.field(name), message);
    }
    for (const field of this.fields) {
      if (field.unique && !candidates.has(field)) candidates.set(field, undefined);
    }

    let failed = 0;
    for (const [field, mapMessage] of candidates) {
      if (field.hasErrors() || field.value === undefined || field.value === '') continue;

      const criteria = { [this.bareName(field)]: toColumnValue(field.value) };
      const count = await this.dataAccess.countWhere(this.table, criteria);
      if (count < 1) continue;
      if (count === 1 && this.itemId !== undefined) {
        const [match] = await this.dataAccess.listWhere(this.table, criteria);
        if (match && String(match.id) === String(this.itemId)) continue;
      }

      field.addError(field.uniqueMessage ?? listMessage ?? mapMessage ?? Messages.NOT_UNIQUE);
      failed++;
    }
    return failed;
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  /**
   * Validate `params` and, on success, write them to the record.
   */
  async updateFromForm(params: FormParams): Promise<boolean> {
    if (!(await this.validate(params))) return false;
    await this.updateRecord();
    return true;
  }

  /**
   * Write the validated values to the bound record, creating it when
   * there is none.
   *
   * Columns are written only when changed; single relationships set
   * their join column; accessors are written when the table has them.
   * Multi relationships are reconciled link by link: links not in the
   * new selection are removed, then missing ones are added.
   *
   * @throws FormProcessorError unless the form validated
   */
  async updateRecord(): Promise<Row> {
    if (!this.validated) {
      throw new FormProcessorError(
        `Form '${this.name}' must validate before updating its record`,
        ErrorCode.NOT_VALIDATED,
        ErrorSeverity.ERROR,
        { form: this.name },
      );
    }

    const { dataAccess, table } = this;
    const columns: Record<string, ColumnValue> = {};
    const extra: Record<string, ColumnValue> = {};
    const multi: MultiUpdate[] = [];

    for (const field of this.fields) {
      if (field.noupdate) continue;
      const name = this.bareName(field);
      const value = field.clear ? undefined : field.value;

      if (dataAccess.schemaHasRelationship(table, name)) {
        const meta = dataAccess.relationshipMetadata(table, name);
        if (meta.kind === 'multi') {
          multi.push({ relation: name, ids: selectedIds(value) });
        } else if (field.hasOptions) {
          extra[meta.joinColumn] = optionValue(field, value);
        } else {
          this.logger.debug('Skipping relationship without a choice list', { form: this.name, field: name });
        }
      } else if (dataAccess.schemaHasColumn(table, name)) {
        columns[name] = toColumnValue(value);
      } else if (dataAccess.schemaHasAccessor(table, name)) {
        extra[name] = toColumnValue(value);
      }
    }

    let item = this.item;
    let action: 'created' | 'updated';
    if (item) {
      const current = item;
      const changes: Record<string, ColumnValue> = { ...extra };
      for (const [name, value] of Object.entries(columns)) {
        if (!sameColumnValue(current.values[name], value)) changes[name] = value;
      }
      if (Object.keys(changes).length > 0) {
        item = await dataAccess.update(item, changes);
      }
      action = 'updated';
    } else {
      item = await dataAccess.create(table, columns);
      if (Object.keys(extra).length > 0) {
        item = await dataAccess.update(item, extra);
      }
      action = 'created';
    }

    for (const { relation, ids } of multi) {
      await this.reconcile(item, relation, ids, action === 'updated');
    }

    this.item = item;
    this.itemId = item.id;
    this.updatedOrCreated = action;
    this.resetParams();

    this.logger.info(`Record ${action}`, { form: this.name, table, id: item.id });
    return item;
  }

  private async reconcile(item: Row, relation: string, ids: RowId[], existing: boolean): Promise<void> {
    const keep = new Map(ids.map((id) => [String(id), id]));

    if (existing) {
      for (const linked of await this.dataAccess.listRelatedIds(item, relation)) {
        if (!keep.delete(String(linked))) {
          await this.dataAccess.unlinkRelated(item, relation, linked);
        }
      }
    }

    for (const id of keep.values()) {
      await this.dataAccess.linkRelated(item, relation, id);
    }
  }

  /**
   * Also forgets the bound record.
   */
  override clear(): void {
    super.clear();
    this.item = undefined;
    this.itemId = undefined;
  }
}

/**
 * Column value for a choice: the matching option's value, so ids keep
 * the type they were listed with.
 */
function optionValue(field: Field, value: FieldValue | undefined): ColumnValue {
  if (typeof value === 'string') {
    const option = field.options.find((candidate) => String(candidate.value) === value);
    if (option) return option.value;
  }
  return toColumnValue(value);
}

function isTrue(value: ColumnValue | undefined): boolean {
  return value === true || value === 1 || value === '1' || value === 'true';
}
