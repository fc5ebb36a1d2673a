/**
 * Numeric Kinds
 */

import { Messages } from '../../messages/message-catalog.js';
import type { Field } from '../field.js';
import type { FieldKind } from '../types.js';

const INTEGER = /^[+-]?\d+$/;
const POSITIVE_INTEGER = /^\+?\d+$/;
const MONEY = /^-?\d+(?:\.\d+)?$/;

/**
 * Parse the input with `pattern` and stage it as a number. A field with a
 * `valueFormat` keeps the formatted input instead.
 */
function stageInteger(field: Field, pattern: RegExp, message: string): boolean {
  const input = field.input;
  if (typeof input !== 'string' || !pattern.test(input)) {
    return field.addError(message);
  }
  if (!field.valueFormat) field.stageValue(Number.parseInt(input, 10));
  return true;
}

export const integerKind: FieldKind = {
  type: 'Integer',
  widget: 'text',
  validate: (field) => stageInteger(field, INTEGER, Messages.NOT_INTEGER),
};

export const posIntegerKind: FieldKind = {
  ...integerKind,
  type: 'PosInteger',
  validate: (field) => stageInteger(field, POSITIVE_INTEGER, Messages.NOT_POSITIVE_INTEGER),
};

export const yearKind: FieldKind = {
  ...integerKind,
  type: 'Year',
  defaults: { rangeStart: 1, rangeEnd: 9999 },
};

/**
 * Decimal amount, formatted to two places.
 */
export const moneyKind: FieldKind = {
  type: 'Money',
  widget: 'text',
  defaults: { valueFormat: '%.2f' },
  validate: (field) => {
    const input = field.input;
    if (typeof input !== 'string' || !MONEY.test(input)) {
      return field.addError(Messages.NOT_MONEY);
    }
    return true;
  },
};
