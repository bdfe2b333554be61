import { describe, it, expect } from 'vitest';
import {
  TodoError,
  InvalidInputError,
  IndexOutOfRangeError,
  CorruptStoreError,
  StoreIoError,
  ExportError,
} from '../src/errors.js';

describe('TodoError subclasses', () => {
  it('carry a kind and their class name', () => {
    const errors: TodoError[] = [
      new InvalidInputError('bad'),
      new IndexOutOfRangeError(4, 2),
      new CorruptStoreError('todo.json', 'not valid JSON'),
      new StoreIoError('todo.json', 'write', new Error('EACCES')),
      new ExportError('nope'),
    ];

    expect(errors.map(e => [e.name, e.kind])).toEqual([
      ['InvalidInputError', 'invalid-input'],
      ['IndexOutOfRangeError', 'index-out-of-range'],
      ['CorruptStoreError', 'corrupt-store'],
      ['StoreIoError', 'io-error'],
      ['ExportError', 'export-error'],
    ]);
    expect(errors.every(e => e instanceof Error)).toBe(true);
  });

  it('describes the valid index range', () => {
    const err = new IndexOutOfRangeError(4, 2);
    expect(err.message).toBe('No task at index 4: valid indices are 0 to 1');
    expect(err.index).toBe(4);
    expect(err.length).toBe(2);
  });

  it('keeps the underlying cause of an I/O failure', () => {
    const cause = new Error('EACCES: permission denied');
    const err = new StoreIoError('/data/todo.json', 'read', cause);
    expect(err.message).toBe('Could not read store file /data/todo.json: EACCES: permission denied');
    expect(err.cause).toBe(cause);
    expect(err.path).toBe('/data/todo.json');
  });
});
