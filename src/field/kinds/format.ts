/**
 * Format Kinds
 *
 * Email and URL fields. Format checks are delegated to zod.
 */

import { z } from 'zod';
import { Messages } from '../../messages/message-catalog.js';
import type { FieldKind } from '../types.js';

const EmailSchema = z.string().email();
const UrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value));

export const emailKind: FieldKind = {
  type: 'Email',
  widget: 'text',
  validate: (field) => {
    if (!EmailSchema.safeParse(field.input).success) {
      return field.addError(Messages.NOT_EMAIL, 'someuser@example.com');
    }
    return true;
  },
};

export const urlKind: FieldKind = {
  type: 'URL',
  widget: 'text',
  validate: (field) => {
    if (!UrlSchema.safeParse(field.input).success) {
      return field.addError(Messages.NOT_URL);
    }
    return true;
  },
};
