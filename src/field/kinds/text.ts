/**
 * Text Kinds
 *
 * Free-text fields, optionally bounded by `size` (maximum length) and
 * `minLength`.
 */

import { Messages } from '../../messages/message-catalog.js';
import type { Field } from '../field.js';
import type { FieldKind } from '../types.js';

function validateLength(field: Field): boolean {
  const input = field.input;
  if (typeof input !== 'string') return true;

  if (field.size !== undefined && input.length > field.size) {
    return field.addError(Messages.TOO_LONG, field.size);
  }
  if (field.minLength !== undefined && input.length < field.minLength) {
    return field.addError(Messages.TOO_SHORT, field.minLength);
  }
  return true;
}

export const textKind: FieldKind = {
  type: 'Text',
  widget: 'text',
  validate: validateLength,
};

export const textAreaKind: FieldKind = {
  ...textKind,
  type: 'TextArea',
  widget: 'textarea',
};

export const hiddenKind: FieldKind = {
  ...textKind,
  type: 'Hidden',
  widget: 'hidden',
};

/**
 * Never echoed back in the round-trip map.
 */
export const passwordKind: FieldKind = {
  ...textKind,
  type: 'Password',
  widget: 'password',
  defaults: { password: true, minLength: 6 },
};

/**
 * File name of an upload. Storing the file is up to the caller.
 */
export const uploadKind: FieldKind = {
  ...textKind,
  type: 'Upload',
  widget: 'file',
};
