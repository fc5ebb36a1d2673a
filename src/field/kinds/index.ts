/**
 * Built-in field kinds, keyed by type name.
 */

import type { FieldKind } from '../types.js';
import {
  booleanKind,
  checkboxKind,
  hourKind,
  intRangeKind,
  minuteKind,
  monthDayKind,
  monthKind,
  monthNameKind,
  multipleKind,
  secondKind,
  selectKind,
} from './choice.js';
import { dateKind, dateMdyKind, dateTimeKind } from './date.js';
import { emailKind, urlKind } from './format.js';
import { integerKind, moneyKind, posIntegerKind, yearKind } from './number.js';
import { hiddenKind, passwordKind, textAreaKind, textKind, uploadKind } from './text.js';

export const BUILTIN_KINDS: readonly FieldKind[] = [
  textKind,
  textAreaKind,
  passwordKind,
  hiddenKind,
  uploadKind,
  integerKind,
  posIntegerKind,
  moneyKind,
  yearKind,
  emailKind,
  urlKind,
  selectKind,
  multipleKind,
  checkboxKind,
  booleanKind,
  intRangeKind,
  minuteKind,
  hourKind,
  secondKind,
  monthKind,
  monthDayKind,
  monthNameKind,
  dateKind,
  dateTimeKind,
  dateMdyKind,
];

export * from './choice.js';
export * from './date.js';
export * from './format.js';
export * from './number.js';
export * from './text.js';
