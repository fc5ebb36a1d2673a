/**
 * Field Declarations
 *
 * Zod schemas for the attributes a profile may declare on a field.
 * Used for validation and type inference.
 */

import { z } from 'zod';

export const FieldWidgetSchema = z.enum([
  'text',
  'textarea',
  'password',
  'hidden',
  'file',
  'checkbox',
  'radio',
  'select',
  'compound',
]);

export type FieldWidget = z.infer<typeof FieldWidgetSchema>;

export const FieldOptionSchema = z.object({
  value: z.union([z.string(), z.number()]),
  label: z.string(),
});

export type FieldOption = z.infer<typeof FieldOptionSchema>;

/**
 * Attributes shared by every field declaration.
 */
export const FieldAttributesSchema = z
  .object({
    required: z.boolean(),
    order: z.number().int(),
    label: z.string(),
    title: z.string(),
    widget: FieldWidgetSchema,
    requiredMessage: z.string(),
    unique: z.boolean(),
    uniqueMessage: z.string(),
    /** Inclusive numeric bounds, checked when the field has no options */
    rangeStart: z.number(),
    rangeEnd: z.number(),
    /** printf-style template applied when input becomes value */
    valueFormat: z.string(),
    password: z.boolean(),
    writeonly: z.boolean(),
    noupdate: z.boolean(),
    clear: z.boolean(),
    disabled: z.boolean(),
    readonly: z.boolean(),
    options: z.array(FieldOptionSchema),
    /** Maximum length for text kinds */
    size: z.number().int().positive(),
    minLength: z.number().int().nonnegative(),
    // Relational choice fields
    labelColumn: z.string(),
    activeColumn: z.string(),
    sortColumn: z.string(),
  })
  .partial()
  .strict();

export type FieldAttributes = z.infer<typeof FieldAttributesSchema>;

/**
 * A field declaration: a type name plus attributes.
 */
export const FieldSpecSchema = FieldAttributesSchema.extend({
  type: z.string().min(1),
});

export type FieldSpec = z.infer<typeof FieldSpecSchema>;

/**
 * A field declaration inside an ordered list carries its own name.
 */
export const NamedFieldSpecSchema = FieldSpecSchema.extend({
  name: z.string().min(1),
});

export type NamedFieldSpec = z.infer<typeof NamedFieldSpecSchema>;
