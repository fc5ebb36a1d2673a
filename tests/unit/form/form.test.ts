/**
 * Form Tests
 *
 * Tests for building forms from profiles and the validation protocol.
 */

import { describe, it, expect, vi } from 'vitest';
import type { Field } from '../../../src/field/field.js';
import { Form, type FormOptions } from '../../../src/form/form.js';
import { ErrorCode } from '../../../src/shared/errors/error-codes.js';
import { FieldTypeError, FormConfigError } from '../../../src/shared/errors/form-error.js';
import {
  getLogger,
  LoggingService,
  setLogger,
  type LogEntry,
} from '../../../src/shared/services/logging.service.js';
import { catchError } from '../../helpers/test-utils.js';

function form(profile: FormOptions['profile'], options: Partial<FormOptions> = {}): Form {
  return new Form({ name: 'test', profile, ...options });
}

describe('Form', () => {
  describe('build', () => {
    it('should build groups in order and force required per group', () => {
      const f = form({
        fields: [
          { name: 'note', type: 'TextArea', required: true },
          { name: 'tag', type: 'Text' },
        ],
        optional: { age: 'Integer' },
        required: { name: 'Text' },
      });

      expect(f.fields.map((field) => [field.name, field.order, field.required])).toEqual([
        ['name', 1, true],
        ['age', 2, false],
        ['note', 3, true],
        ['tag', 4, false],
      ]);
    });

    it('should keep a declared order and sort by it', () => {
      const f = form({
        optional: [
          { name: 'last', type: 'Text', order: 9 },
          { name: 'first', type: 'Text', order: 0 },
        ],
      });

      expect(f.sortedFields().map((field) => field.name)).toEqual(['first', 'last']);
    });

    it('should reject a field declared twice', () => {
      const error = catchError(() => form({ required: { a: 'Text' }, optional: { a: 'Integer' } }));

      expect(error).toBeInstanceOf(FormConfigError);
      expect(error).toMatchObject({ code: ErrorCode.DUPLICATE_FIELD });
    });

    it('should reject a profile without fields', () => {
      expect(() => form({})).toThrow("Form 'test' declares no fields");
    });

    it('should reject an unknown field type', () => {
      expect(() => form({ required: { a: 'Colour' } })).toThrow(FieldTypeError);
    });

    it('should reject a dependency naming an unknown field', () => {
      const error = catchError(() => form({ optional: { a: 'Text' }, dependency: [['a', 'b']] }));

      expect(error).toMatchObject({ code: ErrorCode.FIELD_NOT_FOUND });
    });

    it('should not guess auto field types without a schema', () => {
      const error = catchError(() => form({ auto_required: ['publisher'] }));

      expect(error).toMatchObject({ code: ErrorCode.UNKNOWN_FIELD_TYPE });
    });

    it('should use a supplied type guesser for auto fields', () => {
      const f = form({ auto_optional: ['count'] }, { guessFieldType: () => 'Integer' });

      expect(f.field('count').type).toBe('Integer');
      expect(f.field('count').required).toBe(false);
    });

    it('should qualify names with the name prefix', () => {
      const f = form({ required: { email: 'Email' } }, { namePrefix: 'user' });
      const field = f.field('email');

      expect(field.name).toBe('user.email');
      expect(f.field('user.email')).toBe(field);
      expect(f.bareName(field)).toBe('email');
      expect(field.id).toBe('testuser.email');
    });

    it('should report requiredText for known and unknown fields', () => {
      const f = form({ required: { a: 'Text' }, optional: { b: 'Text' } });

      expect(f.requiredText('a')).toBe('required');
      expect(f.requiredText('b')).toBe('optional');
      expect(f.requiredText('c')).toBe('unknown');
    });

    it('should throw when looking up a missing field', () => {
      const f = form({ required: { a: 'Text' } });

      expect(() => f.field('zzz')).toThrow("Failed to look up field 'zzz' in form 'test'");
      expect(f.hasField('zzz')).toBe(false);
    });
  });

  describe('validate', () => {
    it('should report every failing field in one pass', async () => {
      const f = form({
        required: [
          { name: 'name', type: 'Text' },
          { name: 'age', type: 'Integer', rangeStart: 18, rangeEnd: 120 },
          { name: 'email', type: 'Email' },
        ],
      });

      const ok = await f.validate({ age: '17', email: 'ada@example.com' });

      expect(ok).toBe(false);
      expect(f.validationState).toBe('failed');
      expect(f.hasError()).toBe(true);
      expect(f.errorCount).toBe(2);
      expect(f.errorFieldNames()).toEqual(['name', 'age']);
      expect(f.field('age').errors).toEqual(['value must be between 18 and 120']);
      expect(f.value('email')).toBe('ada@example.com');
    });

    it('should format values on the way in', async () => {
      const f = form({ optional: { price: 'Money' } });

      expect(await f.validate({ price: '1234' })).toBe(true);
      expect(f.value('price')).toBe('1234.00');
    });

    it('should run once until cleared', async () => {
      const f = form({ required: { name: 'Text' } });

      expect(await f.validate({ name: 'Ada' })).toBe(true);
      expect(await f.validate({})).toBe(true);

      f.clear();
      expect(f.validationState).toBe('not-run');
      expect(await f.validate({})).toBe(false);
    });

    it('should make a dependency group required together and revert afterwards', async () => {
      const f = form({
        optional: [
          { name: 'address', type: 'Text' },
          { name: 'city', type: 'Text' },
          { name: 'state', type: 'Text' },
          { name: 'zip', type: 'Text' },
        ],
        dependency: [['address', 'city', 'state', 'zip']],
      });

      expect(await f.validate({ address: '1 Main St', city: '', state: ' ' })).toBe(false);

      expect(f.errorFieldNames()).toEqual(['city', 'state', 'zip']);
      for (const name of ['city', 'state', 'zip']) {
        expect(f.field(name).errors).toEqual(['This field is required']);
      }
      expect(f.fields.map((field) => field.required)).toEqual([false, false, false, false]);
    });

    it('should skip fields flagged clear', async () => {
      const f = form({ required: [{ name: 'token', type: 'Text', clear: true }] });

      expect(await f.validate({})).toBe(true);
      expect(f.field('token').hasErrors()).toBe(false);
    });

    it('should read prefixed keys in htmlPrefix mode', async () => {
      const f = new Form({
        name: 'signup',
        htmlPrefix: true,
        profile: { required: { name: 'Text', password: 'Password' } },
      });

      expect(await f.validate({ 'signup.name': ' Ada ', 'signup.password': 'secret-1' })).toBe(true);
      expect(f.value('name')).toBe('Ada');
      expect(f.value('password')).toBe('secret-1');
      expect(f.params()).toEqual({
        'signup.name': ' Ada ',
        'signup.password': 'secret-1',
        name: ' Ada ',
        password: 'secret-1',
      });
      expect(f.fif()).toEqual({ 'signup.name': ' Ada ', name: ' Ada ' });
    });

    it('should call validate hooks only for fields with a value', async () => {
      const hook = vi.fn((field: Field) => {
        if (field.value === 'root') field.addError('That name is reserved');
      });
      const f = form(
        { required: { username: 'Text' }, optional: { nickname: 'Text' } },
        { hooks: { validate: { username: hook, nickname: hook } } },
      );

      expect(await f.validate({ username: 'root' })).toBe(false);
      expect(f.field('username').errors).toEqual(['That name is reserved']);
      expect(hook).toHaveBeenCalledTimes(1);
    });

    it('should run cross-field validation on the submitted params', async () => {
      const f = form(
        {
          required: [
            { name: 'password', type: 'Password' },
            { name: 'confirm', type: 'Password' },
          ],
        },
        {
          hooks: {
            crossValidate: (params, self) => {
              if (params.password !== params.confirm) {
                self.field('confirm').addError('Passwords do not match');
              }
            },
          },
        },
      );

      expect(await f.validate({ password: 'secret-1', confirm: 'secret-2' })).toBe(false);
      expect(f.errorFieldNames()).toEqual(['confirm']);
      expect(f.field('confirm').errors).toEqual(['Passwords do not match']);
    });

    it('should validate synchronously without the model pass', () => {
      const f = form({ required: { name: 'Text' } });

      expect(f.validateSync({ name: 'Ada' })).toBe(true);
      expect(f.validated).toBe(true);
    });

    it('should log a per-field dump when verbose', async () => {
      const entries: LogEntry[] = [];
      const logger = new LoggingService('debug', (entry) => entries.push(entry));
      const f = form({ optional: { name: 'Text', age: 'Integer' } }, { verbose: true, logger });

      await f.validate({ name: 'Ada', age: 'old' });

      const [dump, summary] = entries;
      expect(entries).toHaveLength(2);
      expect(dump.message).toBe("Form 'test' validation");
      expect(dump.context).toEqual({
        form: 'test',
        fields: { age: 'Value must be an integer', name: 'validated!' },
      });
      expect(summary.context).toEqual({ form: 'test', validated: false, errorCount: 1 });
    });

    it('should log under the form name by default', async () => {
      const entries: LogEntry[] = [];
      const original = getLogger();
      setLogger(new LoggingService('debug', (entry) => entries.push(entry)));
      try {
        await form({ optional: { name: 'Text' } }).validate({ name: 'Ada' });
      } finally {
        setLogger(original);
      }

      expect(entries.map((entry) => [entry.logger, entry.message])).toEqual([
        ['form-processor.form.test', 'Form validated'],
      ]);
    });
  });

  describe('compound fields', () => {
    const birthdayForm = (): Form => form({ optional: { birthday: 'DateMDY' } });

    it('should combine the parts into a date', async () => {
      const f = birthdayForm();

      const ok = await f.validate({ 'birthday.month': '2', 'birthday.day': '28', 'birthday.year': '2023' });

      expect(ok).toBe(true);
      expect(f.value('birthday')).toEqual(new Date(Date.UTC(2023, 1, 28)));
      expect(f.field('birthday').formatValue()).toEqual({
        'birthday.month': 2,
        'birthday.day': 28,
        'birthday.year': 2023,
      });
      expect(f.field('birthday').subFields.map((field) => field.fullName)).toEqual([
        'birthday.month',
        'birthday.day',
        'birthday.year',
      ]);
    });

    it('should report an impossible date on the parent field', async () => {
      const f = birthdayForm();

      await f.validate({ 'birthday.month': '2', 'birthday.day': '30', 'birthday.year': '2023' });

      expect(f.field('birthday').errors).toEqual(['Not a valid date']);
      expect(f.value('birthday')).toBeUndefined();
    });

    it('should route errors from the parts to the parent field', async () => {
      const f = birthdayForm();

      await f.validate({ 'birthday.month': '2', 'birthday.year': '2023' });

      expect(f.errorFieldNames()).toEqual(['birthday']);
      expect(f.field('birthday').errors).toEqual(['This field is required']);
    });

    it('should accept a compound field left blank', async () => {
      expect(await birthdayForm().validate({})).toBe(true);
    });
  });

  describe('round trip', () => {
    it('should never include password fields in fif', async () => {
      const f = form({ required: { name: 'Text', password: 'Password' } });

      await f.validate({ name: 'Ada', password: 'secret-1' });

      expect(f.value('password')).toBe('secret-1');
      expect(f.params()).toEqual({ name: 'Ada', password: 'secret-1' });
      expect(f.fif()).toEqual({ name: 'Ada' });
    });

    it('should format field values when nothing was submitted', async () => {
      const f = form(
        { required: { name: 'Text' }, optional: { age: 'Integer', secret: { type: 'Text', writeonly: true } } },
        { initObject: { name: 'Ada', age: 36, secret: 'hidden' } },
      );

      await f.initialize();

      expect(f.params()).toEqual({ name: 'Ada', age: 36 });
      expect(f.field('age').initValue).toBe(36);
    });

    it('should validate the current values when called without params', async () => {
      const f = form(
        { required: { name: 'Text' }, optional: { age: 'Integer' } },
        { initObject: { name: 'Ada', age: 36 } },
      );
      await f.initialize();

      expect(await f.validate()).toBe(true);
      expect(f.value('age')).toBe(36);
      expect(f.field('age').input).toBe('36');
    });
  });

  describe('hooks', () => {
    it('should load options from an options hook', async () => {
      const f = form(
        { optional: { color: 'Select' } },
        {
          hooks: {
            options: {
              color: () => [
                { value: 'r', label: 'Red' },
                { value: 'g', label: 'Green' },
              ],
            },
          },
        },
      );

      await f.initialize();

      expect(f.field('color').options).toEqual([
        { value: 'r', label: 'Red' },
        { value: 'g', label: 'Green' },
      ]);
      expect(await f.validate({ color: 'b' })).toBe(false);
      expect(f.field('color').errors).toEqual(["'b' is not a valid value"]);
    });

    it('should keep declared options when the lookup finds none', async () => {
      const f = form({ optional: { size: { type: 'Select', options: [{ value: 's', label: 'Small' }] } } });

      await f.initialize();

      expect(f.field('size').options).toEqual([{ value: 's', label: 'Small' }]);
    });

    it('should seed a value from an initValue hook', async () => {
      const f = form(
        { optional: { name: 'Text', country: 'Text' } },
        {
          initObject: { name: 'Ada' },
          hooks: { initValue: { country: () => 'NZ' } },
        },
      );

      await f.initialize();

      expect(f.value('name')).toBe('Ada');
      expect(f.value('country')).toBe('NZ');
    });
  });
});
