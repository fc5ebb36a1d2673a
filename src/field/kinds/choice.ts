/**
 * Choice Kinds
 *
 * Fields whose input must match one of their options, plus the boolean
 * and checkbox kinds that render as choices but carry no options list.
 */

import { Messages } from '../../messages/message-catalog.js';
import type { FieldOption } from '../field-spec.js';
import type { Field } from '../field.js';
import type { FieldKind, FieldValue } from '../types.js';

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

const TRUE_INPUTS = new Set(['1', 'true', 'yes', 'on']);
const FALSE_INPUTS = new Set(['0', 'false', 'no', 'off']);

export const selectKind: FieldKind = {
  type: 'Select',
  widget: 'select',
  choice: true,
};

/**
 * Select that takes any number of options. The value is always a list,
 * even when a single option was submitted.
 */
export const multipleKind: FieldKind = {
  type: 'Multiple',
  widget: 'select',
  choice: true,
  multiple: true,
  inputToValue: (field): FieldValue | undefined => {
    const input = field.input;
    if (input === undefined) return undefined;
    return Array.isArray(input) ? [...input] : [input];
  },
};

export const checkboxKind: FieldKind = {
  type: 'Checkbox',
  widget: 'checkbox',
};

export const booleanKind: FieldKind = {
  type: 'Boolean',
  widget: 'radio',
  validate: (field) => {
    const input = typeof field.input === 'string' ? field.input.toLowerCase() : '';
    if (TRUE_INPUTS.has(input)) {
      field.stageValue(true);
      return true;
    }
    if (FALSE_INPUTS.has(input)) {
      field.stageValue(false);
      return true;
    }
    return field.addError(Messages.NOT_BOOLEAN);
  },
  formatValue: (field) => {
    if (field.value === undefined) return {};
    return { [field.name]: isTruthy(field.value) ? 1 : 0 };
  },
};

function isTruthy(value: FieldValue): boolean {
  if (typeof value === 'string') return TRUE_INPUTS.has(value.toLowerCase());
  return Boolean(value);
}

function rangeOptions(field: Field): FieldOption[] {
  const start = field.rangeStart;
  const end = field.rangeEnd;
  if (start === undefined || end === undefined) return [];

  const options: FieldOption[] = [];
  for (let n = start; n <= end; n++) {
    options.push({ value: n, label: String(n) });
  }
  return options;
}

function toInteger(field: Field): FieldValue | undefined {
  return typeof field.input === 'string' ? Number.parseInt(field.input, 10) : undefined;
}

/**
 * Select over the integers `rangeStart`..`rangeEnd`.
 */
export const intRangeKind: FieldKind = {
  type: 'IntRange',
  widget: 'select',
  choice: true,
  initOptions: rangeOptions,
  inputToValue: toInteger,
};

export const minuteKind: FieldKind = {
  ...intRangeKind,
  type: 'Minute',
  defaults: { rangeStart: 0, rangeEnd: 59 },
};

export const secondKind: FieldKind = {
  ...intRangeKind,
  type: 'Second',
  defaults: { rangeStart: 0, rangeEnd: 59 },
};

export const hourKind: FieldKind = {
  ...intRangeKind,
  type: 'Hour',
  defaults: { rangeStart: 0, rangeEnd: 23 },
};

export const monthKind: FieldKind = {
  ...intRangeKind,
  type: 'Month',
  defaults: { rangeStart: 1, rangeEnd: 12 },
};

export const monthDayKind: FieldKind = {
  ...intRangeKind,
  type: 'MonthDay',
  defaults: { rangeStart: 1, rangeEnd: 31 },
};

export const monthNameKind: FieldKind = {
  type: 'MonthName',
  widget: 'select',
  choice: true,
  initOptions: () => MONTH_NAMES.map((label, i) => ({ value: i + 1, label })),
  inputToValue: toInteger,
};
