/**
 * Form Controller
 *
 * Request-level glue between a host and its forms: builds a named form
 * for an optional record, validates or updates it only for POST
 * requests, and reports the fill-in map for redisplay.
 *
 * @module controller/form-controller
 */

import type { FormattedValues, FormParams } from '../field/types.js';
import type { Form } from '../form/form.js';
import { ModelForm } from '../model/model-form.js';
import type { Row, RowId } from '../model/types.js';
import { ErrorCode } from '../shared/errors/error-codes.js';
import { HostError } from '../shared/errors/form-error.js';
import { getLogger, type Logger } from '../shared/services/logging.service.js';

export interface FormArgs {
  itemId?: RowId;
  item?: Row;
}

/**
 * Builds a fresh, uninitialized form for one request.
 */
export type FormFactory = (args: FormArgs) => Form;

export interface FormRequest {
  method: string;
  params?: FormParams;
  itemId?: RowId;
}

export interface FormResult {
  form: Form;
  /** Request was a POST */
  posted: boolean;
  validated: boolean;
  /** Field name -> error messages, for fields with errors */
  errors: Record<string, string[]>;
  fif: FormattedValues;
  item?: Row;
  updatedOrCreated?: 'created' | 'updated';
}

export class FormController {
  private readonly factories = new Map<string, FormFactory>();
  private readonly logger: Logger;

  constructor(logger: Logger = getLogger().child('controller')) {
    this.logger = logger;
  }

  register(name: string, factory: FormFactory): this {
    if (this.factories.has(name)) {
      throw new HostError(`Form '${name}' is already registered`, ErrorCode.INVALID_FORM_DEFINITION, { name });
    }
    this.factories.set(name, factory);
    return this;
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  names(): string[] {
    return [...this.factories.keys()].sort();
  }

  /**
   * Build and initialize the named form.
   *
   * @throws HostError when no form is registered under `name`
   */
  async getForm(name: string, args: FormArgs = {}): Promise<Form> {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new HostError(`No form registered as '${name}'`, ErrorCode.FORM_NOT_REGISTERED, {
        name,
        registered: this.names(),
      });
    }
    return factory(args).initialize();
  }

  /**
   * Build the form and validate the params when the request is a POST.
   */
  async validateForm(name: string, request: FormRequest): Promise<FormResult> {
    const form = await this.getForm(name, { itemId: request.itemId });
    const posted = isPost(request);
    if (posted) {
      await form.validate(request.params ?? {});
    }
    return this.result(form, posted);
  }

  /**
   * Build the form and, for a POST, validate and write the record.
   *
   * @throws HostError when the form is not bound to a table
   */
  async updateFromForm(name: string, request: FormRequest): Promise<FormResult> {
    const form = await this.getForm(name, { itemId: request.itemId });
    if (!(form instanceof ModelForm)) {
      throw new HostError(`Form '${name}' is not bound to a table`, ErrorCode.INVALID_FORM_DEFINITION, {
        name,
      });
    }

    const posted = isPost(request);
    if (posted) {
      await form.updateFromForm(request.params ?? {});
    }
    return this.result(form, posted);
  }

  /**
   * Values to fill the rendered form with.
   */
  fillIn(form: Form): FormattedValues {
    return form.fif();
  }

  private result(form: Form, posted: boolean): FormResult {
    const errors: Record<string, string[]> = {};
    for (const field of form.errorFields()) {
      errors[field.name] = [...field.errors];
    }

    const result: FormResult = {
      form,
      posted,
      validated: form.validated,
      errors,
      fif: this.fillIn(form),
    };
    if (form instanceof ModelForm) {
      result.item = form.item;
      result.updatedOrCreated = form.updatedOrCreated;
    }

    this.logger.debug('Form request handled', {
      form: form.name,
      posted,
      validated: result.validated,
      errorCount: form.errorCount,
    });
    return result;
  }
}

function isPost(request: FormRequest): boolean {
  return request.method.toUpperCase() === 'POST';
}
