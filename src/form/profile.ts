/**
 * Form Profile
 *
 * Declarative description of a form's fields and cross-field rules.
 *
 * Groups:
 * - `required` / `optional`: fields forced to (not) required
 * - `fields`: fields keeping their own `required` attribute
 * - `auto_required` / `auto_optional`: names whose type is guessed
 * - `dependency`: groups that become required together
 * - `unique`: names checked for uniqueness, optionally with a message
 *
 * A group given as an array keeps its order; a map is ordered by key.
 *
 * @module form/profile
 */

import { z } from 'zod';
import { FieldSpecSchema, NamedFieldSpecSchema, type NamedFieldSpec } from '../field/field-spec.js';
import { ErrorCode } from '../shared/errors/error-codes.js';
import { FormConfigError } from '../shared/errors/form-error.js';

/**
 * A field group: `{ name: 'Type' | { type, ...attrs } }` or an ordered
 * list of `{ name, type, ...attrs }`.
 */
export const FieldGroupSchema = z.union([
  z.record(z.string().min(1), z.union([z.string().min(1), FieldSpecSchema])),
  z.array(NamedFieldSpecSchema),
]);

export type FieldGroup = z.infer<typeof FieldGroupSchema>;

export const ProfileSchema = z
  .object({
    required: FieldGroupSchema,
    optional: FieldGroupSchema,
    fields: FieldGroupSchema,
    auto_required: z.array(z.string().min(1)),
    auto_optional: z.array(z.string().min(1)),
    dependency: z.array(z.array(z.string().min(1))),
    unique: z.union([z.array(z.string().min(1)), z.record(z.string().min(1), z.string())]),
  })
  .partial()
  .strict();

export type Profile = z.infer<typeof ProfileSchema>;

/**
 * Validate an untrusted profile.
 *
 * @throws FormConfigError listing every schema violation
 */
export function parseProfile(input: unknown, formName?: string): Profile {
  const result = ProfileSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new FormConfigError(
      `Invalid profile${formName ? ` for form '${formName}'` : ''}`,
      ErrorCode.INVALID_PROFILE,
      { form: formName, issues },
    );
  }
  return result.data;
}

/**
 * Flatten a field group into ordered, named declarations.
 */
export function groupEntries(group: FieldGroup | undefined): NamedFieldSpec[] {
  if (!group) return [];
  if (Array.isArray(group)) return group;

  return Object.entries(group)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([name, spec]) => (typeof spec === 'string' ? { name, type: spec } : { ...spec, name }));
}

/**
 * Unique-check names and their optional custom messages.
 */
export function uniqueEntries(unique: Profile['unique']): Map<string, string | undefined> {
  const entries = new Map<string, string | undefined>();
  if (!unique) return entries;

  if (Array.isArray(unique)) {
    for (const name of unique) entries.set(name, undefined);
  } else {
    for (const [name, message] of Object.entries(unique)) entries.set(name, message);
  }
  return entries;
}
