import { describe, expect, test } from 'vitest';

import { StoreError } from './store-error';

describe('StoreError', () => {
  test('keeps operation and target', () => {
    const error = new StoreError('boom', 'get', 'id 1');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('StoreError');
    expect(error.operation).toBe('get');
    expect(error.target).toBe('id 1');
  });

  test('fromError formats the message and keeps the cause', () => {
    const cause = new Error('server selection timed out');
    const error = StoreError.fromError('count', 'status any', cause);

    expect(error.message).toBe(
      'Document store count failed for status any: server selection timed out',
    );
    expect(error.cause).toBe(cause);
  });
});
