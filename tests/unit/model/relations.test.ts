/**
 * Relation Helper Tests
 */

import { describe, it, expect } from 'vitest';
import { InMemoryDataAccess } from '../../../src/model/memory-data-access.js';
import {
  guessFieldType,
  sameColumnValue,
  selectedIds,
  toColumnValue,
  valueKey,
} from '../../../src/model/relations.js';
import { librarySeed } from '../../helpers/test-utils.js';

describe('guessFieldType', () => {
  const store = new InMemoryDataAccess(librarySeed());

  it('should pick a choice type for relationships', () => {
    expect(guessFieldType(store, 'book', 'publisher')).toBe('Select');
    expect(guessFieldType(store, 'book', 'authors')).toBe('Multiple');
  });

  it('should pick DateTime for *_time names and Text otherwise', () => {
    expect(guessFieldType(store, 'book', 'updated_time')).toBe('DateTime');
    expect(guessFieldType(store, 'book', 'title')).toBe('Text');
  });
});

describe('toColumnValue', () => {
  it('should convert field values for storage', () => {
    expect(toColumnValue(undefined)).toBeNull();
    expect(toColumnValue(['1', 2])).toBe('1,2');
    expect(toColumnValue({ id: 1 })).toBe('{"id":1}');
    expect(toColumnValue(7)).toBe(7);
  });
});

describe('valueKey', () => {
  it('should build comparison keys', () => {
    expect(valueKey(null)).toBe('');
    expect(valueKey(true)).toBe('1');
    expect(valueKey(new Date(Date.UTC(2024, 0, 2)))).toBe('2024-01-02T00:00:00.000Z');
    expect(valueKey(12)).toBe('12');
  });
});

describe('sameColumnValue', () => {
  it.each([
    { current: null, next: '', same: true },
    { current: 0, next: false, same: true },
    { current: '0', next: null, same: true },
    { current: 12, next: '12', same: true },
    { current: 'a', next: 'b', same: false },
    { current: 'a', next: null, same: false },
    { current: null, next: 'a', same: false },
  ])('should compare $current and $next', ({ current, next, same }) => {
    expect(sameColumnValue(current, next)).toBe(same);
  });
});

describe('selectedIds', () => {
  it('should collect ids without duplicates', () => {
    expect(selectedIds(['4', '6', '4', 9])).toEqual(['4', '6', 9]);
    expect(selectedIds('3')).toEqual(['3']);
    expect(selectedIds(undefined)).toEqual([]);
  });
});
