/**
 * Form Tools
 *
 * MCP tool handlers exposing registered forms: list them, describe
 * their fields, validate a submission and submit it to the data store.
 */

import { z } from 'zod';
import type { FormController, FormResult } from '../controller/form-controller.js';
import type { Field } from '../field/field.js';
import { ErrorCode } from '../shared/errors/error-codes.js';
import { HostError } from '../shared/errors/form-error.js';

// Module-level reference to the controller (set via initializeFormTools)
let controller: FormController | null = null;

/**
 * Initialize form tools with a controller instance.
 * Must be called before using any form tool handlers.
 */
export function initializeFormTools(instance: FormController): void {
  controller = instance;
}

/**
 * Get the controller, throwing if not initialized.
 */
function getController(): FormController {
  if (!controller) {
    throw new HostError(
      'Form tools not initialized. Call initializeFormTools() first.',
      ErrorCode.NOT_INITIALIZED,
    );
  }
  return controller;
}

// ============================================================================
// Input Schemas
// ============================================================================

const ItemIdSchema = z.union([z.string().min(1), z.number().int()]);

const ParamsSchema = z.record(z.string(), z.union([z.string(), z.array(z.string())]));

export const ListFormsInputSchema = z.object({});

export const DescribeFormInputSchema = z.object({
  /** Registered form name */
  form: z.string().min(1),
  /** Record to load initial values from */
  item_id: ItemIdSchema.optional(),
});

export const ValidateFormInputSchema = z.object({
  form: z.string().min(1),
  /** Submitted values: field name -> value or list of values */
  params: ParamsSchema,
  item_id: ItemIdSchema.optional(),
});

export const SubmitFormInputSchema = ValidateFormInputSchema;

// ============================================================================
// Output helpers
// ============================================================================

function describeField(field: Field): Record<string, unknown> {
  const description: Record<string, unknown> = {
    name: field.name,
    type: field.type,
    label: field.label,
    widget: field.widget,
    required: field.required,
    order: field.order,
  };
  if (field.hasOptions) description.options = field.options;
  if (field.acceptsMultiple) description.multiple = true;
  if (field.password) description.password = true;
  if (field.subFields.length > 0) description.fields = field.subFields.map(describeField);
  return description;
}

function summarize(result: FormResult): Record<string, unknown> {
  const output: Record<string, unknown> = {
    form: result.form.name,
    posted: result.posted,
    validated: result.validated,
    errors: result.errors,
    values: result.fif,
  };
  if (result.updatedOrCreated) output.action = result.updatedOrCreated;
  if (result.item) {
    output.item = { table: result.item.table, id: result.item.id, values: result.item.values };
  }
  return output;
}

// ============================================================================
// Handlers
// ============================================================================

/**
 * list_forms
 */
export async function listForms(rawInput: unknown): Promise<Record<string, unknown>> {
  ListFormsInputSchema.parse(rawInput ?? {});
  return { forms: getController().names() };
}

/**
 * describe_form
 */
export async function describeForm(rawInput: unknown): Promise<Record<string, unknown>> {
  const input = DescribeFormInputSchema.parse(rawInput);
  const ctl = getController();
  const form = await ctl.getForm(input.form, { itemId: input.item_id });

  return {
    form: form.name,
    fields: form.sortedFields().map(describeField),
    values: ctl.fillIn(form),
  };
}

/**
 * validate_form
 */
export async function validateForm(rawInput: unknown): Promise<Record<string, unknown>> {
  const input = ValidateFormInputSchema.parse(rawInput);
  const result = await getController().validateForm(input.form, {
    method: 'POST',
    params: input.params,
    itemId: input.item_id,
  });
  return summarize(result);
}

/**
 * submit_form
 */
export async function submitForm(rawInput: unknown): Promise<Record<string, unknown>> {
  const input = SubmitFormInputSchema.parse(rawInput);
  const result = await getController().updateFromForm(input.form, {
    method: 'POST',
    params: input.params,
    itemId: input.item_id,
  });
  return summarize(result);
}
