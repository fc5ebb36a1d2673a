/**
 * Test Utilities
 *
 * Common test helpers, assertions and seed data for the test suite.
 */

import { expect } from 'vitest';
import type { DataSeed } from '../../src/model/memory-data-access.js';

/**
 * Assert that a value is defined (not null or undefined)
 */
export function assertDefined<T>(
  value: T | null | undefined,
  message?: string,
): asserts value is T {
  expect(value, message).toBeDefined();
  expect(value, message).not.toBeNull();
}

/**
 * Run `fn` and return what it threw, failing the test if nothing was.
 */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  expect.unreachable('Expected function to throw');
}

/**
 * Await `fn` and return what it rejected with, failing the test if it
 * resolved.
 */
export async function catchAsyncError(fn: () => Promise<unknown>): Promise<unknown> {
  try {
    await fn();
  } catch (error) {
    return error;
  }
  expect.unreachable('Expected promise to reject');
}

/**
 * Library store: books with a publisher (single), authors through a link
 * table (multi) and a `summary` accessor; publishers list their books
 * (has-many).
 *
 * Book 1 "Alpha" (isbn A-1) is linked to authors 2, 4 and 6.
 * Book 2 "Beta" (isbn B-2) is linked to author 1.
 * Author 3 and publisher 3 are inactive.
 */
export function librarySeed(): DataSeed {
  return {
    tables: {
      publisher: {
        columns: ['id', 'name', 'active'],
        relationships: {
          books: { kind: 'multi', foreignTable: 'book' },
        },
        rows: [
          { id: 1, name: 'North', active: true },
          { id: 2, name: 'East', active: true },
          { id: 3, name: 'Closed', active: false },
        ],
      },
      author: {
        columns: ['id', 'name', 'active'],
        rows: [
          { id: 1, name: 'Fay', active: true },
          { id: 2, name: 'Abe', active: true },
          { id: 3, name: 'Cal', active: false },
          { id: 4, name: 'Dee', active: true },
          { id: 5, name: 'Eli', active: true },
          { id: 6, name: 'Gus', active: true },
          { id: 7, name: 'Hal', active: false },
          { id: 8, name: 'Ivy', active: true },
          { id: 9, name: 'Jo', active: true },
        ],
      },
      book: {
        columns: ['id', 'title', 'isbn', 'pages', 'price', 'publisher_id'],
        accessors: ['summary'],
        relationships: {
          publisher: { kind: 'single', foreignTable: 'publisher' },
          authors: { kind: 'multi', foreignTable: 'author', linkTable: 'book_author' },
        },
        rows: [
          { id: 1, title: 'Alpha', isbn: 'A-1', pages: 100, price: '10.00', publisher_id: 1 },
          { id: 2, title: 'Beta', isbn: 'B-2', pages: 200, price: '20.00', publisher_id: 3 },
        ],
      },
      book_author: {
        columns: ['id', 'book_id', 'author_id'],
        relationships: {
          book: { kind: 'single', foreignTable: 'book' },
          author: { kind: 'single', foreignTable: 'author' },
        },
        rows: [
          { book_id: 1, author_id: 2 },
          { book_id: 1, author_id: 4 },
          { book_id: 1, author_id: 6 },
          { book_id: 2, author_id: 1 },
        ],
      },
    },
  };
}
