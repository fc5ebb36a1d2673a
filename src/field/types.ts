/**
 * Field Types
 *
 * Value shapes and the strategy contract that field kinds implement.
 *
 * @module field/types
 */

import type { MessageLookup } from '../messages/message-catalog.js';
import type { FieldAttributes, FieldOption, FieldWidget, NamedFieldSpec } from './field-spec.js';
import type { Field } from './field.js';

// ============================================================================
// Values
// ============================================================================

export type FieldScalar = string | number | boolean | Date;

/**
 * Flattened column map of a related row.
 */
export interface RowData {
  readonly [column: string]: unknown;
}

/**
 * Typed internal value of a field.
 */
export type FieldValue = FieldScalar | FieldScalar[] | RowData;

/**
 * One submitted parameter: a single string or an ordered sequence.
 */
export type ParamValue = string | string[];

/**
 * Raw submission: flat key -> value(s).
 */
export type FormParams = Readonly<Record<string, ParamValue | undefined>>;

/**
 * Trimmed input held by a field.
 */
export type FieldInput = string | string[];

/**
 * Name -> value pairs a field contributes to the round-trip map.
 */
export type FormattedValues = Record<string, FieldValue>;

// ============================================================================
// Field <-> Form association
// ============================================================================

/**
 * Non-owning handle a field keeps on the form that built it.
 */
export interface FieldHost {
  readonly name: string;
  readonly messages: MessageLookup;
  /** Set when the host is the sub-form of a compound field */
  readonly parentField?: Field;
}

/**
 * The sub-form behind a compound field.
 */
export interface SubForm {
  readonly fields: readonly Field[];
  validateSync(params: FormParams): boolean;
  clear(): void;
}

// ============================================================================
// Field kinds
// ============================================================================

/**
 * Values of a compound field's sub-fields, keyed by sub-field name.
 */
export type CompoundValues = Readonly<Record<string, FieldValue | undefined>>;

/**
 * A field made up of sub-fields validated by their own form.
 */
export interface CompoundKind {
  /** Sub-field declarations, in display order */
  readonly fields: readonly NamedFieldSpec[];

  /**
   * Build the parent value from validated sub-values. Records an error on
   * the field and returns undefined when the combination is invalid.
   */
  combine(values: CompoundValues, field: Field): FieldValue | undefined;

  /** Split a parent value back into sub-values for redisplay */
  split(value: FieldValue): Record<string, FieldValue>;
}

/**
 * Strategy object describing one field type.
 *
 * Every hook is optional; a missing hook falls back to the behavior of
 * the base field (accept, copy input, emit `name => value`).
 */
export interface FieldKind {
  readonly type: string;
  readonly widget: FieldWidget;

  /** Accepts an ordered sequence of values */
  readonly multiple?: boolean;

  /** Exposes an options list; input must match an option value */
  readonly choice?: boolean;

  /** Attribute defaults, overridden by the declaration */
  readonly defaults?: FieldAttributes;

  /** Options the kind provides before any form-level lookup */
  initOptions?(field: Field): FieldOption[];

  /** Type-specific check of `field.input` */
  validate?(field: Field): boolean;

  /** Convert validated input to the internal value */
  inputToValue?(field: Field): FieldValue | undefined;

  /** Check of the converted value */
  validateValue?(field: Field): boolean;

  /** Round-trip pairs for the field's value */
  formatValue?(field: Field): FormattedValues;

  readonly compound?: CompoundKind;
}
