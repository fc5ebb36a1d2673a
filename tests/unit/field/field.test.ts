/**
 * Field Tests
 *
 * Tests for the field validation cycle and its helpers.
 */

import { describe, it, expect } from 'vitest';
import {
  Field,
  hasNonBlank,
  toFieldValue,
  trimValue,
} from '../../../src/field/field.js';
import {
  integerKind,
  moneyKind,
  multipleKind,
  passwordKind,
  selectKind,
  textKind,
} from '../../../src/field/kinds/index.js';
import { MessageCatalog } from '../../../src/messages/message-catalog.js';

describe('trimValue', () => {
  it('should trim a single string', () => {
    expect(trimValue('  hello \n')).toBe('hello');
  });

  it('should trim every element of a sequence', () => {
    expect(trimValue([' a ', 'b  '])).toEqual(['a', 'b']);
  });

  it('should collapse a one-element sequence to its element', () => {
    expect(trimValue([' only '])).toBe('only');
  });

  it('should return undefined for an empty sequence or no value', () => {
    expect(trimValue([])).toBeUndefined();
    expect(trimValue(undefined)).toBeUndefined();
  });
});

describe('hasNonBlank', () => {
  it('should detect blank and non-blank input', () => {
    expect(hasNonBlank('   ')).toBe(false);
    expect(hasNonBlank(['', ' '])).toBe(false);
    expect(hasNonBlank(['', 'x'])).toBe(true);
    expect(hasNonBlank(undefined)).toBe(false);
  });
});

describe('toFieldValue', () => {
  it('should map null and undefined to undefined', () => {
    expect(toFieldValue(null)).toBeUndefined();
    expect(toFieldValue(undefined)).toBeUndefined();
  });

  it('should keep scalars and the scalar elements of lists', () => {
    expect(toFieldValue(42)).toBe(42);
    expect(toFieldValue([1, null, 'a'])).toEqual([1, 'a']);
  });
});

describe('Field', () => {
  describe('attributes', () => {
    it('should default label to the name and widget to the kind widget', () => {
      const field = new Field('title', textKind);

      expect(field.label).toBe('title');
      expect(field.widget).toBe('text');
      expect(field.required).toBe(false);
      expect(field.id).toBe('fld-title');
    });

    it('should let declared attributes override kind defaults', () => {
      const field = new Field('secret', passwordKind, { minLength: 10 });

      expect(field.password).toBe(true);
      expect(field.minLength).toBe(10);
      expect(field.widget).toBe('password');
    });

    it('should report required text', () => {
      expect(new Field('a', textKind, { required: true }).requiredText()).toBe('required');
      expect(new Field('b', textKind).requiredText()).toBe('optional');
    });
  });

  describe('required', () => {
    it('should fail blank input on a required field with exactly one error', () => {
      const field = new Field('name', textKind, { required: true });
      field.setInput('   ');

      expect(field.validateField()).toBe(false);
      expect(field.errors).toEqual(['This field is required']);
      expect(field.value).toBeUndefined();
    });

    it('should use a custom required message', () => {
      const field = new Field('name', textKind, { required: true, requiredMessage: 'Name please' });
      field.setInput(undefined);

      field.validateField();

      expect(field.errors).toEqual(['Name please']);
    });

    it('should pass blank input on an optional field without a value', () => {
      const field = new Field('name', textKind);
      field.setInput('');

      expect(field.validateField()).toBe(true);
      expect(field.value).toBeUndefined();
      expect(field.hasErrors()).toBe(false);
    });
  });

  describe('value conversion', () => {
    it('should copy trimmed input to value', () => {
      const field = new Field('name', textKind);
      field.setInput('  Ada  ');

      expect(field.validateField()).toBe(true);
      expect(field.value).toBe('Ada');
    });

    it('should apply valueFormat to numeric input', () => {
      const field = new Field('price', moneyKind);
      field.setInput('1234');

      expect(field.validateField()).toBe(true);
      expect(field.value).toBe('1234.00');
    });

    it('should apply a declared valueFormat on a plain field', () => {
      const field = new Field('code', textKind, { valueFormat: '%05d' });
      field.setInput('42');

      field.validateField();

      expect(field.value).toBe('00042');
    });

    it('should reset errors and value on every cycle', () => {
      const field = new Field('age', integerKind);
      field.setInput('abc');
      field.validateField();
      expect(field.errors).toEqual(['Value must be an integer']);

      field.setInput('7');
      expect(field.validateField()).toBe(true);
      expect(field.errors).toEqual([]);
      expect(field.value).toBe(7);
    });
  });

  describe('testRange', () => {
    const ageField = (): Field => new Field('age', integerKind, { rangeStart: 18, rangeEnd: 120 });

    it.each(['18', '120'])('should accept boundary value %s', (input) => {
      const field = ageField();
      field.setInput(input);

      expect(field.validateField()).toBe(true);
      expect(field.value).toBe(Number(input));
    });

    it.each(['17', '121'])('should reject %s naming both bounds', (input) => {
      const field = ageField();
      field.setInput(input);

      expect(field.validateField()).toBe(false);
      expect(field.errors).toEqual(['value must be between 18 and 120']);
      expect(field.value).toBeUndefined();
    });

    it('should check a lower bound alone', () => {
      const field = new Field('n', integerKind, { rangeStart: 5 });
      field.setInput('4');

      field.validateField();

      expect(field.errors).toEqual(['value must be greater than or equal to 5']);
    });

    it('should check an upper bound alone', () => {
      const field = new Field('n', integerKind, { rangeEnd: 5 });
      field.setInput('6');

      field.validateField();

      expect(field.errors).toEqual(['value must be less than or equal to 5']);
    });
  });

  describe('testMultiple', () => {
    it('should reject a sequence on a single-valued field', () => {
      const field = new Field('name', textKind);
      field.setInput(['a', 'b']);

      expect(field.validateField()).toBe(false);
      expect(field.errors).toEqual(['This field does not take multiple values']);
    });

    it('should accept a one-element sequence on a select', () => {
      const field = new Field('color', selectKind, {
        options: [
          { value: 'red', label: 'Red' },
          { value: 'blue', label: 'Blue' },
        ],
      });
      field.setInput(['blue']);

      expect(field.validateField()).toBe(true);
      expect(field.value).toBe('blue');
    });
  });

  describe('testOptions', () => {
    const options = [
      { value: 1, label: 'One' },
      { value: 2, label: 'Two' },
    ];

    it('should reject a value that is not an option', () => {
      const field = new Field('n', selectKind, { options });
      field.setInput('3');

      expect(field.validateField()).toBe(false);
      expect(field.errors).toEqual(["'3' is not a valid value"]);
    });

    it('should accept a single scalar on a multiple field as a list', () => {
      const field = new Field('n', multipleKind, { options });
      field.setInput('2');

      expect(field.validateField()).toBe(true);
      expect(field.value).toEqual(['2']);
    });

    it('should reject a list holding any unknown value', () => {
      const field = new Field('n', multipleKind, { options });
      field.setInput(['1', '5', '2']);

      expect(field.validateField()).toBe(false);
      expect(field.errors).toEqual(["'5' is not a valid value"]);
    });
  });

  describe('fif', () => {
    it('should return input before value', () => {
      const field = new Field('age', integerKind);
      field.setInput('007');
      field.validateField();

      expect(field.value).toBe(7);
      expect(field.fif()).toBe('007');
    });

    it('should never return anything for a password field', () => {
      const field = new Field('pw', passwordKind);
      field.setInput('sesame-123');
      field.validateField();

      expect(field.value).toBe('sesame-123');
      expect(field.fif()).toBeUndefined();
    });
  });

  describe('valueChanged', () => {
    it('should compare sequences regardless of order and type', () => {
      const field = new Field('ids', multipleKind);
      field.initValue = [1, 2];
      field.value = ['2', '1'];

      expect(field.valueChanged()).toBe(false);

      field.value = ['1', '3'];
      expect(field.valueChanged()).toBe(true);
    });
  });

  describe('addError', () => {
    it('should resolve the message through the host lookup', () => {
      const messages = new MessageCatalog('fr', { 'This field is required': 'Champ obligatoire' });
      const field = new Field('name', textKind, { required: true }, { name: 'f', messages });
      field.setInput('');

      field.validateField();

      expect(field.errors).toEqual(['Champ obligatoire']);
      expect(field.id).toBe('fname');
    });
  });

  describe('clearState', () => {
    it('should drop input, value and errors', () => {
      const field = new Field('age', integerKind, { required: true });
      field.setInput('x');
      field.validateField();

      field.clearState();

      expect(field.input).toBeUndefined();
      expect(field.value).toBeUndefined();
      expect(field.errors).toEqual([]);
      expect(field.required).toBe(true);
    });
  });
});
