/**
 * Form
 *
 * Owns the ordered fields built from a profile and runs the validation
 * protocol over a submission:
 *
 * 1. Return the cached outcome if validation already ran
 * 2. Store the params and apply dependency groups
 * 3. Move each field's trimmed submitted value to its input
 * 4. Run the field validation cycle (fields flagged `clear` are skipped)
 * 5. Call per-field validate hooks for fields holding a value
 * 6. Cross-field validation
 * 7. Model-level validation
 * 8. Revert dependency-forced `required` flags
 * 9. Record the outcome until `clear()`
 *
 * @module form/form
 */

import type { FieldAttributes, FieldOption } from '../field/field-spec.js';
import { getFieldRegistry, type FieldRegistry } from '../field/field-registry.js';
import { toFieldValue, type Field } from '../field/field.js';
import type {
  FieldHost,
  FieldValue,
  FormattedValues,
  FormParams,
  ParamValue,
  SubForm,
} from '../field/types.js';
import { getDefaultMessages, type MessageLookup } from '../messages/message-catalog.js';
import { ErrorCode } from '../shared/errors/error-codes.js';
import { FormConfigError } from '../shared/errors/form-error.js';
import { getLogger, type Logger } from '../shared/services/logging.service.js';
import { DependencyGroups } from './dependency-groups.js';
import {
  groupEntries,
  parseProfile,
  uniqueEntries,
  type FieldGroup,
  type Profile,
} from './profile.js';

// ============================================================================
// Hooks
// ============================================================================

/** Form-level check of one field, run once the field holds a value */
export type ValidateHook = (field: Field, form: Form) => void;

/** Options for a choice field, in place of the generic lookup */
export type OptionsHook = (field: Field, form: Form) => FieldOption[] | Promise<FieldOption[]>;

/** Initial value for a field, in place of reading the bound record */
export type InitValueHook = (
  field: Field,
  form: Form,
) => FieldValue | undefined | Promise<FieldValue | undefined>;

export type CrossValidateHook = (params: FormParams, form: Form) => void;

/**
 * Per-field hooks are keyed by the bare field name (without `namePrefix`).
 */
export interface FormHooks {
  validate?: Readonly<Record<string, ValidateHook>>;
  options?: Readonly<Record<string, OptionsHook>>;
  initValue?: Readonly<Record<string, InitValueHook>>;
  crossValidate?: CrossValidateHook;
}

// ============================================================================
// Options
// ============================================================================

export interface FormOptions {
  /** Used for field ids and the `htmlPrefix` parameter prefix */
  name: string;
  profile: Profile;
  /** Qualifies every field name as `prefix.name` */
  namePrefix?: string;
  /** Submitted keys `<form name>.x` are also read as `x` */
  htmlPrefix?: boolean;
  messages?: MessageLookup;
  registry?: FieldRegistry;
  /** Registry searched for `+Type` field types */
  fieldNamespace?: FieldRegistry;
  hooks?: FormHooks;
  /** Plain object seeding initial values when no record is bound */
  initObject?: Readonly<Record<string, unknown>>;
  /** Set on the sub-form of a compound field */
  parentField?: Field;
  verbose?: boolean;
  /** Defaults to the root logger's `form.<name>` child */
  logger?: Logger;
  /** Resolves the type of `auto_*` fields */
  guessFieldType?: (name: string) => string;
}

export type ValidationState = 'not-run' | 'failed' | 'passed';

const AUTO_TYPE = 'Auto';

// ============================================================================
// Form
// ============================================================================

export class Form implements FieldHost, SubForm {
  readonly name: string;
  readonly profile: Profile;
  readonly namePrefix?: string;
  readonly htmlPrefix: boolean;
  readonly messages: MessageLookup;
  readonly parentField?: Field;

  verbose: boolean;
  initObject?: Readonly<Record<string, unknown>>;
  updatedOrCreated?: 'created' | 'updated';

  protected readonly logger: Logger;
  protected readonly hooks: FormHooks;
  /** Bare field name -> custom message, for fields checked for uniqueness */
  protected readonly uniqueRules: ReadonlyMap<string, string | undefined>;

  private readonly fieldList: Field[] = [];
  private readonly registry: FieldRegistry;
  private readonly fieldNamespace?: FieldRegistry;
  private readonly guessType: (name: string) => string;
  private readonly dependencies: DependencyGroups;
  private fieldCounter = 1;
  private state: ValidationState = 'not-run';
  private submitted?: Record<string, ParamValue | undefined>;
  private builtParams?: FormattedValues;

  constructor(options: FormOptions) {
    this.name = options.name;
    this.profile = parseProfile(options.profile, options.name);
    this.namePrefix = options.namePrefix;
    this.htmlPrefix = options.htmlPrefix ?? false;
    this.messages = options.messages ?? getDefaultMessages();
    this.parentField = options.parentField;
    this.verbose = options.verbose ?? false;
    this.initObject = options.initObject;
    this.logger = options.logger ?? getLogger().child(`form.${this.name}`);
    this.hooks = options.hooks ?? {};
    this.registry = options.registry ?? getFieldRegistry();
    this.fieldNamespace = options.fieldNamespace;
    this.guessType = options.guessFieldType ?? ((name) => this.guessFieldType(name));

    this.build();

    this.dependencies = new DependencyGroups(
      (this.profile.dependency ?? []).map((group) => group.map((name) => this.field(name))),
    );

    const unique = uniqueEntries(this.profile.unique);
    for (const name of unique.keys()) {
      this.field(name);
    }
    this.uniqueRules = unique;
  }

  // ==========================================================================
  // Build
  // ==========================================================================

  /**
   * Build fields from the profile, group by group: required,
   * auto_required, optional, auto_optional, fields.
   */
  private build(): void {
    const { profile } = this;

    this.buildGroup(profile.required, true);
    this.buildAuto(profile.auto_required, true);
    this.buildGroup(profile.optional, false);
    this.buildAuto(profile.auto_optional, false);
    this.buildGroup(profile.fields, undefined);

    if (this.fieldList.length === 0) {
      throw new FormConfigError(`Form '${this.name}' declares no fields`, ErrorCode.INVALID_PROFILE, {
        form: this.name,
      });
    }
  }

  private buildGroup(group: FieldGroup | undefined, required: boolean | undefined): void {
    for (const { name, type, ...attributes } of groupEntries(group)) {
      this.addField(name, type, {
        ...attributes,
        required: attributes.required === true || required === true,
      });
    }
  }

  private buildAuto(names: readonly string[] | undefined, required: boolean): void {
    for (const name of names ?? []) {
      this.addField(name, AUTO_TYPE, { required });
    }
  }

  private addField(name: string, declaredType: string, attributes: FieldAttributes): void {
    const fullName = this.namePrefix ? `${this.namePrefix}.${name}` : name;
    if (this.fieldList.some((field) => field.name === fullName)) {
      throw new FormConfigError(
        `Field '${name}' is declared more than once in form '${this.name}'`,
        ErrorCode.DUPLICATE_FIELD,
        { form: this.name, field: name },
      );
    }

    const type = declaredType === AUTO_TYPE ? this.guessType(name) : declaredType;
    const field = this.registry.create(fullName, type, attributes, this, this.fieldNamespace);
    if (attributes.order === undefined) this.setOrder(field);

    const compound = field.kind.compound;
    if (compound) {
      field.attachSubForm(
        new Form({
          name: `${this.name}.${fullName}`,
          profile: { fields: [...compound.fields] },
          messages: this.messages,
          registry: this.registry,
          fieldNamespace: this.fieldNamespace,
          parentField: field,
          logger: this.logger,
        }),
      );
    }

    this.fieldList.push(field);
  }

  /**
   * Type for `auto_*` fields. Forms without a schema to consult cannot
   * guess.
   */
  protected guessFieldType(name: string): string {
    throw new FormConfigError(
      `Cannot guess the type of field '${name}' in form '${this.name}'`,
      ErrorCode.UNKNOWN_FIELD_TYPE,
      { form: this.name, field: name },
    );
  }

  // ==========================================================================
  // Field access
  // ==========================================================================

  get fields(): readonly Field[] {
    return this.fieldList;
  }

  /**
   * Look up a field by bare or prefixed name.
   *
   * @throws FormConfigError when no field matches
   */
  field(name: string): Field {
    const field = this.findField(name);
    if (!field) {
      throw new FormConfigError(
        `Failed to look up field '${name}' in form '${this.name}'`,
        ErrorCode.FIELD_NOT_FOUND,
        { form: this.name, field: name },
      );
    }
    return field;
  }

  hasField(name: string): boolean {
    return this.findField(name) !== undefined;
  }

  private findField(name: string): Field | undefined {
    const prefixed = this.namePrefix ? `${this.namePrefix}.${name}` : name;
    return (
      this.fieldList.find((field) => field.name === prefixed) ??
      this.fieldList.find((field) => field.name === name)
    );
  }

  /**
   * Field name without the form's `namePrefix`.
   */
  bareName(field: Field): string {
    const prefix = this.namePrefix ? `${this.namePrefix}.` : '';
    return prefix && field.name.startsWith(prefix) ? field.name.slice(prefix.length) : field.name;
  }

  sortedFields(): Field[] {
    return [...this.fieldList].sort((a, b) => a.order - b.order);
  }

  /**
   * Give `field` the next display position. Fields declared without an
   * `order` are numbered from 1 as they are built.
   */
  setOrder(field: Field): void {
    field.order = this.fieldCounter++;
  }

  value(name: string): FieldValue | undefined {
    return this.field(name).value;
  }

  valueChanged(name: string): boolean {
    return this.field(name).valueChanged();
  }

  requiredText(name: string): 'required' | 'optional' | 'unknown' {
    const field = this.findField(name);
    return field ? field.requiredText() : 'unknown';
  }

  // ==========================================================================
  // Validation
  // ==========================================================================

  /**
   * Validate a submission, including model-level checks.
   *
   * Runs once; later calls return the cached outcome until `clear()`.
   * Without `params`, the form's current params are validated.
   */
  async validate(params?: FormParams): Promise<boolean> {
    if (this.state !== 'not-run') return this.validated;

    const submitted = this.beginValidation(params);
    try {
      this.runFieldPasses(submitted);
      await this.modelValidate();
    } finally {
      this.dependencies.revert();
    }
    return this.finishValidation();
  }

  /**
   * Validate without the model-level pass.
   */
  validateSync(params?: FormParams): boolean {
    if (this.state !== 'not-run') return this.validated;

    const submitted = this.beginValidation(params);
    try {
      this.runFieldPasses(submitted);
    } finally {
      this.dependencies.revert();
    }
    return this.finishValidation();
  }

  private beginValidation(params: FormParams | undefined): FormParams {
    const submitted = this.mungeParams(params ?? this.currentParams());
    this.submitted = submitted;
    this.dependencies.apply(submitted);
    return submitted;
  }

  private runFieldPasses(params: FormParams): void {
    for (const field of this.fieldList) {
      field.takeInput(params);
    }

    for (const field of this.fieldList) {
      if (field.clear) continue;
      field.validateField();
    }

    for (const field of this.fieldList) {
      if (field.clear || field.value === undefined) continue;
      this.hooks.validate?.[this.bareName(field)]?.(field, this);
    }

    this.crossValidate(params);
  }

  private finishValidation(): boolean {
    const errorCount = this.errorCount;
    this.state = errorCount === 0 ? 'passed' : 'failed';

    if (this.verbose) {
      this.logger.debug(`Form '${this.name}' validation`, {
        form: this.name,
        fields: Object.fromEntries(
          this.fieldList.map((field) => [
            field.name,
            field.hasErrors() ? field.errors.join(' | ') : 'validated!',
          ]),
        ),
      });
    }
    this.logger.debug('Form validated', { form: this.name, validated: this.validated, errorCount });

    return this.validated;
  }

  /**
   * Rules spanning several fields. Runs whatever the per-field outcome.
   */
  protected crossValidate(params: FormParams): void {
    this.hooks.crossValidate?.(params, this);
  }

  /**
   * Checks that need the backing store.
   */
  protected async modelValidate(): Promise<void> {
    // Forms without a model have nothing to check.
  }

  get validationState(): ValidationState {
    return this.state;
  }

  get validated(): boolean {
    return this.state === 'passed';
  }

  /** Ran validation and failed */
  hasError(): boolean {
    return this.state === 'failed';
  }

  /** Number of fields carrying errors */
  get errorCount(): number {
    return this.fieldList.filter((field) => field.hasErrors()).length;
  }

  errorFields(): Field[] {
    return this.sortedFields().filter((field) => field.hasErrors());
  }

  errorFieldNames(): string[] {
    return this.errorFields().map((field) => field.name);
  }

  // ==========================================================================
  // Params / round trip
  // ==========================================================================

  /**
   * The last submission, or the values formatted from the fields when
   * nothing has been submitted.
   */
  params(): FormattedValues {
    if (this.submitted) {
      const params: FormattedValues = {};
      for (const [key, value] of Object.entries(this.submitted)) {
        if (value !== undefined) params[key] = value;
      }
      return params;
    }
    this.builtParams ??= this.buildParams();
    return { ...this.builtParams };
  }

  /**
   * Redisplay map: `params()` without password fields, under either key
   * in `htmlPrefix` mode.
   */
  fif(): FormattedValues {
    const values = this.params();
    for (const field of this.fieldList) {
      if (!field.password) continue;
      delete values[field.name];
      if (this.htmlPrefix) delete values[`${this.name}.${field.name}`];
    }
    return values;
  }

  /**
   * Forget submitted and formatted params so the next `params()` call
   * formats the current field values.
   */
  resetParams(): void {
    this.submitted = undefined;
    this.builtParams = undefined;
  }

  private currentParams(): FormParams {
    const params: Record<string, ParamValue> = {};
    for (const [key, value] of Object.entries(this.params())) {
      const param = toParamValue(value);
      if (param !== undefined) params[key] = param;
    }
    return params;
  }

  private buildParams(): FormattedValues {
    const params: FormattedValues = {};
    for (const field of this.fieldList) {
      if (field.writeonly) continue;
      Object.assign(params, field.formatValue());
    }
    return params;
  }

  private mungeParams(params: FormParams): Record<string, ParamValue | undefined> {
    const munged = { ...params };
    if (!this.htmlPrefix) return munged;

    const prefix = `${this.name}.`;
    for (const [key, value] of Object.entries(params)) {
      if (key.startsWith(prefix)) munged[key.slice(prefix.length)] = value;
    }
    return munged;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Reset validation state, inputs and values, keeping the fields.
   */
  clear(): void {
    this.state = 'not-run';
    this.updatedOrCreated = undefined;
    for (const field of this.fieldList) {
      field.clearState();
    }
    this.resetParams();
  }

  /**
   * Load initial values and option lists.
   */
  async initialize(): Promise<this> {
    await this.initFromObject();
    await this.loadOptions();
    return this;
  }

  /**
   * Seed values from `initObject`, keyed by bare field name.
   */
  protected async initFromObject(): Promise<void> {
    const source = this.initObject;
    if (!source) return;

    for (const field of this.fieldList) {
      const hook = this.hooks.initValue?.[this.bareName(field)];
      const value = hook ? await hook(field, this) : toFieldValue(source[this.bareName(field)]);
      field.initValue = value;
      field.value = value;
    }
    this.resetParams();
  }

  /**
   * Fill the options of every choice field, from its options hook or
   * from `lookupOptions()`. An empty result keeps the field's options.
   */
  async loadOptions(): Promise<void> {
    for (const field of this.fieldList) {
      if (!field.hasOptions) continue;

      const hook = this.hooks.options?.[this.bareName(field)];
      const options = hook ? await hook(field, this) : await this.lookupOptions(field);
      if (options.length > 0) field.options = options;
    }
  }

  /**
   * Generic option lookup for choice fields without a hook.
   */
  protected async lookupOptions(_field: Field): Promise<FieldOption[]> {
    return [];
  }
}

function toParamValue(value: FieldValue): ParamValue | undefined {
  if (Array.isArray(value)) return value.map((v) => (v instanceof Date ? v.toISOString() : String(v)));
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') return undefined;
  return String(value);
}
