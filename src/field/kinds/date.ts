/**
 * Date Kinds
 *
 * Dates are held as UTC `Date` values. `DateMDY` is a compound field
 * built from month, day and year sub-fields.
 */

import { Messages } from '../../messages/message-catalog.js';
import type { Field } from '../field.js';
import type { FieldKind, FieldValue } from '../types.js';

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const ISO_DATETIME = /^(\d{4})-(\d{1,2})-(\d{1,2})[T ](\d{1,2}):(\d{2})(?::(\d{2}))?Z?$/;

/**
 * Build a UTC date, or undefined when the parts do not name a real
 * calendar date (February 30th, month 13).
 */
export function utcDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
): Date | undefined {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hours, minutes, seconds, 0);

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hours ||
    date.getUTCMinutes() !== minutes ||
    date.getUTCSeconds() !== seconds
  ) {
    return undefined;
  }
  return date;
}

function toDate(value: FieldValue): Date | undefined {
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') {
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? undefined : date;
  }
  return undefined;
}

function parseDate(field: Field): boolean {
  const match = typeof field.input === 'string' ? ISO_DATE.exec(field.input) : null;
  const date = match ? utcDate(Number(match[1]), Number(match[2]), Number(match[3])) : undefined;
  if (!date) return field.addError(Messages.NOT_DATE);

  field.stageValue(date);
  return true;
}

function parseDateTime(field: Field): boolean {
  const match = typeof field.input === 'string' ? ISO_DATETIME.exec(field.input) : null;
  const date = match
    ? utcDate(
        Number(match[1]),
        Number(match[2]),
        Number(match[3]),
        Number(match[4]),
        Number(match[5]),
        Number(match[6] ?? 0),
      )
    : undefined;
  if (!date) return field.addError(Messages.NOT_DATETIME);

  field.stageValue(date);
  return true;
}

export const dateKind: FieldKind = {
  type: 'Date',
  widget: 'text',
  validate: parseDate,
  formatValue: (field) => {
    if (field.value === undefined) return {};
    const date = toDate(field.value);
    return { [field.name]: date ? date.toISOString().slice(0, 10) : field.value };
  },
};

export const dateTimeKind: FieldKind = {
  type: 'DateTime',
  widget: 'text',
  validate: parseDateTime,
  formatValue: (field) => {
    if (field.value === undefined) return {};
    const date = toDate(field.value);
    return { [field.name]: date ? date.toISOString() : field.value };
  },
};

/**
 * Date entered as three selects. Errors from the parts are reported on
 * the date field itself.
 */
export const dateMdyKind: FieldKind = {
  type: 'DateMDY',
  widget: 'compound',
  compound: {
    fields: [
      { name: 'month', type: 'Month', required: true },
      { name: 'day', type: 'MonthDay', required: true },
      { name: 'year', type: 'Year', required: true },
    ],
    combine: ({ month, day, year }, field) => {
      const date =
        typeof month === 'number' && typeof day === 'number' && typeof year === 'number'
          ? utcDate(year, month, day)
          : undefined;
      if (!date) {
        field.addError(Messages.NOT_DATE);
        return undefined;
      }
      return date;
    },
    split: (value): Record<string, FieldValue> => {
      const date = toDate(value);
      if (!date) return {};
      return {
        month: date.getUTCMonth() + 1,
        day: date.getUTCDate(),
        year: date.getUTCFullYear(),
      };
    },
  },
};
