/**
 * Form Definition Loader
 *
 * Reads form definitions from JSON files and registers a factory for
 * each with a controller. A definition naming a `table` is bound to the
 * data store as a model form.
 */

import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { FormController } from '../controller/form-controller.js';
import { Form } from '../form/form.js';
import { ProfileSchema } from '../form/profile.js';
import { ModelForm } from '../model/model-form.js';
import type { DataAccess } from '../model/types.js';
import { ErrorCode } from '../shared/errors/error-codes.js';
import { HostError } from '../shared/errors/form-error.js';
import { getLogger } from '../shared/services/logging.service.js';

export const FormDefinitionSchema = z
  .object({
    name: z.string().min(1),
    title: z.string().optional(),
    table: z.string().min(1).optional(),
    namePrefix: z.string().min(1).optional(),
    htmlPrefix: z.boolean().optional(),
    profile: ProfileSchema,
  })
  .strict();

export type FormDefinition = z.infer<typeof FormDefinitionSchema>;

/**
 * Validate one definition.
 *
 * @param source - File the definition came from, for error details
 */
export function parseFormDefinition(input: unknown, source?: string): FormDefinition {
  const result = FormDefinitionSchema.safeParse(input);
  if (!result.success) {
    throw new HostError(
      `Invalid form definition${source ? ` in ${source}` : ''}`,
      ErrorCode.INVALID_FORM_DEFINITION,
      {
        source,
        issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      },
    );
  }
  return result.data;
}

/**
 * Load every `*.json` definition in `dir`, in file name order.
 */
export async function loadFormDefinitions(dir: string): Promise<FormDefinition[]> {
  const files = (await readdir(dir)).filter((file) => file.endsWith('.json')).sort();
  const definitions: FormDefinition[] = [];

  for (const file of files) {
    const path = join(dir, file);
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(path, 'utf8'));
    } catch (error) {
      throw new HostError(`Failed to read form definition ${path}`, ErrorCode.INVALID_FORM_DEFINITION, {
        source: path,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    definitions.push(parseFormDefinition(parsed, path));
  }

  getLogger().child('loader').info(`Loaded ${definitions.length} form definition(s)`, { dir });
  return definitions;
}

/**
 * Build the form a definition describes.
 *
 * @throws HostError when a table-bound definition has no data store
 */
export function createForm(
  definition: FormDefinition,
  dataAccess: DataAccess | undefined,
  itemId?: string | number,
): Form {
  const { name, table, namePrefix, htmlPrefix, profile } = definition;
  if (!table) {
    return new Form({ name, profile, namePrefix, htmlPrefix });
  }
  if (!dataAccess) {
    throw new HostError(
      `Form '${name}' is bound to '${table}' but no data file is loaded`,
      ErrorCode.NOT_INITIALIZED,
      { name, table },
    );
  }
  return new ModelForm({ name, profile, namePrefix, htmlPrefix, table, dataAccess, itemId });
}

/**
 * Register a factory for every definition.
 */
export function registerDefinitions(
  controller: FormController,
  definitions: readonly FormDefinition[],
  dataAccess?: DataAccess,
): FormController {
  for (const definition of definitions) {
    // Build once up front so declaration errors surface at startup
    createForm(definition, dataAccess);
    controller.register(definition.name, ({ itemId }) => createForm(definition, dataAccess, itemId));
  }
  return controller;
}
