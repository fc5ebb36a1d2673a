/**
 * Field
 *
 * One named, typed, validatable unit of form data. The validation cycle
 * lives here; anything type-specific is delegated to the field's kind.
 *
 * @module field/field
 */

import { sprintf } from 'sprintf-js';
import { getDefaultMessages, Messages, type MessageArg } from '../messages/message-catalog.js';
import type { FieldAttributes, FieldOption, FieldWidget } from './field-spec.js';
import type {
  CompoundValues,
  FieldHost,
  FieldInput,
  FieldKind,
  FieldScalar,
  FieldValue,
  FormattedValues,
  FormParams,
  ParamValue,
  RowData,
  SubForm,
} from './types.js';

/**
 * Trim leading and trailing whitespace from a submitted value.
 *
 * Each element of a sequence is trimmed. A one-element sequence collapses
 * to its element and an empty sequence to undefined, so a select posted
 * as a list of one is treated like a single value.
 */
export function trimValue(value: ParamValue | undefined): FieldInput | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'string') return value.trim();

  const values = value.map((v) => v.trim());
  if (values.length === 0) return undefined;
  return values.length > 1 ? values : values[0];
}

/**
 * True when the value holds at least one non-blank string.
 */
export function hasNonBlank(value: ParamValue | undefined): boolean {
  if (value === undefined) return false;
  if (typeof value === 'string') return /\S/.test(value);
  return value.some((v) => /\S/.test(v));
}

function isScalar(value: unknown): value is FieldScalar {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  );
}

/**
 * Narrow a stored or caller-supplied value to a field value. Lists keep
 * their scalar elements; null and undefined become undefined.
 */
export function toFieldValue(raw: unknown): FieldValue | undefined {
  if (raw === null || raw === undefined) return undefined;
  if (isScalar(raw)) return raw;
  if (Array.isArray(raw)) return raw.filter(isScalar);
  if (typeof raw === 'object') return { ...raw };
  return undefined;
}

function compareKey(value: FieldValue | undefined): string {
  if (value === undefined) return '';
  const parts: (FieldScalar | RowData)[] = Array.isArray(value) ? value : [value];
  return parts
    .map((part) => {
      if (part instanceof Date) return part.toISOString();
      if (typeof part === 'object') return JSON.stringify(part);
      return String(part);
    })
    .sort()
    .join('|');
}

export class Field {
  readonly name: string;
  readonly type: string;
  readonly kind: FieldKind;

  required: boolean;
  order: number;
  label: string;
  title?: string;
  widget: FieldWidget;
  requiredMessage: string;
  unique: boolean;
  uniqueMessage?: string;
  rangeStart?: number;
  rangeEnd?: number;
  valueFormat?: string;
  password: boolean;
  writeonly: boolean;
  noupdate: boolean;
  clear: boolean;
  disabled: boolean;
  readonly: boolean;
  size?: number;
  minLength?: number;
  labelColumn: string;
  activeColumn: string;
  sortColumn?: string;
  options: FieldOption[];

  /** Trimmed submitted value */
  input?: FieldInput;

  /** Validated internal value */
  value?: FieldValue;

  /** Value loaded from the bound record, for change detection */
  initValue?: FieldValue;

  private errorList: string[] = [];
  private staged: { value: FieldValue } | null = null;
  private readonly host?: FieldHost;
  private subForm?: SubForm;
  private subParams: FormParams = {};

  constructor(name: string, kind: FieldKind, attributes: FieldAttributes = {}, host?: FieldHost) {
    const attrs: FieldAttributes = { ...kind.defaults, ...attributes };

    this.name = name;
    this.type = kind.type;
    this.kind = kind;
    this.host = host;

    this.required = attrs.required ?? false;
    this.order = attrs.order ?? 1;
    this.label = attrs.label ?? name;
    this.title = attrs.title;
    this.widget = attrs.widget ?? kind.widget;
    this.requiredMessage = attrs.requiredMessage ?? Messages.REQUIRED;
    this.unique = attrs.unique ?? false;
    this.uniqueMessage = attrs.uniqueMessage;
    this.rangeStart = attrs.rangeStart;
    this.rangeEnd = attrs.rangeEnd;
    this.valueFormat = attrs.valueFormat;
    this.password = attrs.password ?? false;
    this.writeonly = attrs.writeonly ?? false;
    this.noupdate = attrs.noupdate ?? false;
    this.clear = attrs.clear ?? false;
    this.disabled = attrs.disabled ?? false;
    this.readonly = attrs.readonly ?? false;
    this.size = attrs.size;
    this.minLength = attrs.minLength;
    this.labelColumn = attrs.labelColumn ?? 'name';
    this.activeColumn = attrs.activeColumn ?? 'active';
    this.sortColumn = attrs.sortColumn;
    this.options = attrs.options ?? kind.initOptions?.(this) ?? [];
  }

  // ==========================================================================
  // Identity
  // ==========================================================================

  /**
   * Name used to read submitted parameters. Sub-fields of a compound field
   * are qualified with the parent's name ("birthday.month").
   */
  get fullName(): string {
    const parent = this.host?.parentField;
    return parent ? `${parent.name}.${this.name}` : this.name;
  }

  get id(): string {
    return `${this.host?.name ?? 'fld-'}${this.name}`;
  }

  /** Field offers an options list */
  get hasOptions(): boolean {
    return this.kind.choice === true;
  }

  /** Field accepts a sequence of values */
  get acceptsMultiple(): boolean {
    return this.kind.multiple === true || this.kind.compound !== undefined;
  }

  get subFields(): readonly Field[] {
    return this.subForm?.fields ?? [];
  }

  /**
   * Attach the sub-form that validates a compound field's parts.
   */
  attachSubForm(subForm: SubForm): void {
    this.subForm = subForm;
  }

  // ==========================================================================
  // Errors
  // ==========================================================================

  get errors(): readonly string[] {
    return this.errorList;
  }

  hasErrors(): boolean {
    return this.errorList.length > 0;
  }

  resetErrors(): void {
    this.errorList = [];
  }

  /**
   * Resolve a message through the form's lookup and record it.
   *
   * Errors raised inside a compound field's sub-form are recorded on the
   * compound field. Always returns false so checks can
   * `return field.addError(...)`.
   */
  addError(key: string, ...args: MessageArg[]): false {
    const messages = this.host?.messages ?? getDefaultMessages();
    const target = this.host?.parentField ?? this;
    target.errorList.push(messages.resolve(key, ...args));
    return false;
  }

  // ==========================================================================
  // Input
  // ==========================================================================

  setInput(raw: ParamValue | undefined): void {
    this.input = trimValue(raw);
  }

  /**
   * Read this field's input from a submission.
   */
  takeInput(params: FormParams): void {
    if (!this.subForm) {
      this.setInput(params[this.fullName]);
      return;
    }

    this.subParams = params;
    const parts: string[] = [];
    for (const sub of this.subForm.fields) {
      const raw = trimValue(params[sub.fullName]);
      if (typeof raw === 'string') parts.push(raw);
      else if (raw) parts.push(...raw);
    }
    this.input = parts.length > 0 ? parts : undefined;
  }

  anyInput(): boolean {
    return hasNonBlank(this.input);
  }

  // ==========================================================================
  // Validation cycle
  // ==========================================================================

  /**
   * Run one validation cycle over the current input.
   *
   * Errors and value are reset first. Blank input passes unless the field
   * is required. Otherwise multiplicity, options, the kind's check and the
   * range check run in that order, each gating the next; on success the
   * input is converted to a value and the value is checked.
   */
  validateField(): boolean {
    this.resetErrors();
    this.value = undefined;
    this.staged = null;

    if (!this.anyInput()) {
      if (this.required) this.addError(this.requiredMessage);
      return !this.required;
    }

    if (!this.testMultiple()) return false;
    if (!this.testOptions()) return false;
    if (!this.validate() || this.hasErrors()) return false;
    if (!this.testRange()) return false;

    this.inputToValue();
    if (this.hasErrors()) {
      this.value = undefined;
      return false;
    }

    if (!this.validateValue()) {
      this.value = undefined;
      return false;
    }
    return true;
  }

  /**
   * Type-specific check of the input.
   */
  validate(): boolean {
    if (this.subForm) return this.validateCompound();
    return this.kind.validate?.(this) ?? true;
  }

  /**
   * Keep a value parsed during `validate()`. It becomes the field's value
   * only once every check has passed.
   */
  stageValue(value: FieldValue): void {
    this.staged = { value };
  }

  /**
   * Move validated input to `value`: a staged value wins, then the kind's
   * conversion, then a copy of the input through `valueFormat`.
   */
  inputToValue(): void {
    if (this.value !== undefined) return;

    if (this.staged) {
      this.value = this.staged.value;
      this.staged = null;
      return;
    }

    if (this.kind.inputToValue) {
      this.value = this.kind.inputToValue(this);
      return;
    }

    const input = this.input;
    if (input === undefined) return;

    if (this.valueFormat && typeof input === 'string') {
      this.value = sprintf(this.valueFormat, input);
    } else {
      this.value = Array.isArray(input) ? [...input] : input;
    }
  }

  validateValue(): boolean {
    return this.kind.validateValue?.(this) ?? true;
  }

  /**
   * Reject a sequence of inputs unless the field takes multiple values.
   */
  testMultiple(): boolean {
    if (Array.isArray(this.input) && !this.acceptsMultiple) {
      return this.addError(Messages.NOT_MULTIPLE);
    }
    return true;
  }

  /**
   * Every submitted value must match an option value.
   */
  testOptions(): boolean {
    if (!this.hasOptions || this.input === undefined) return true;

    const allowed = new Set(this.options.map((option) => String(option.value)));
    const inputs = Array.isArray(this.input) ? this.input : [this.input];
    for (const value of inputs) {
      if (!allowed.has(value)) {
        return this.addError(Messages.INVALID_OPTION, value);
      }
    }
    return true;
  }

  /**
   * Inclusive numeric range check, for fields without options.
   */
  testRange(): boolean {
    if (this.hasOptions || this.hasErrors()) return true;
    if (this.input === undefined) return true;

    const low = this.rangeStart;
    const high = this.rangeEnd;
    if (low === undefined && high === undefined) return true;

    const inputs = Array.isArray(this.input) ? this.input : [this.input];
    for (const raw of inputs) {
      const n = Number(raw);
      if (low !== undefined && high !== undefined) {
        if (!(n >= low && n <= high)) return this.addError(Messages.RANGE_BETWEEN, low, high);
      } else if (low !== undefined) {
        if (!(n >= low)) return this.addError(Messages.RANGE_MIN, low);
      } else if (high !== undefined) {
        if (!(n <= high)) return this.addError(Messages.RANGE_MAX, high);
      }
    }
    return true;
  }

  private validateCompound(): boolean {
    const subForm = this.subForm;
    const compound = this.kind.compound;
    if (!subForm || !compound) return true;

    subForm.clear();
    subForm.validateSync(this.subParams);
    if (this.hasErrors()) return false;

    const values: Record<string, FieldValue | undefined> = {};
    for (const sub of subForm.fields) {
      values[sub.name] = sub.value;
    }
    const combined = compound.combine(values satisfies CompoundValues, this);
    if (combined === undefined) return false;

    this.stageValue(combined);
    return true;
  }

  // ==========================================================================
  // Round trip
  // ==========================================================================

  /**
   * Pairs merged into the form's round-trip map.
   */
  formatValue(): FormattedValues {
    if (this.kind.formatValue) return this.kind.formatValue(this);

    const value = this.value;
    if (value === undefined) return {};

    const compound = this.kind.compound;
    if (compound) {
      const formatted: FormattedValues = {};
      for (const [part, partValue] of Object.entries(compound.split(value))) {
        formatted[`${this.name}.${part}`] = partValue;
      }
      return formatted;
    }

    return { [this.name]: value };
  }

  /**
   * Value to refill the widget with: the raw input, else the value.
   * Never anything for a password field.
   */
  fif(): FieldValue | undefined {
    if (this.password) return undefined;
    return this.input ?? this.value;
  }

  /**
   * True when `value` differs from `initValue` (string comparison;
   * sequences compared order-insensitively).
   */
  valueChanged(): boolean {
    return compareKey(this.initValue) !== compareKey(this.value);
  }

  requiredText(): 'required' | 'optional' {
    return this.required ? 'required' : 'optional';
  }

  /**
   * Drop input, value and errors, keeping the declaration.
   */
  clearState(): void {
    this.input = undefined;
    this.value = undefined;
    this.staged = null;
    this.subParams = {};
    this.resetErrors();
    this.subForm?.clear();
  }
}
