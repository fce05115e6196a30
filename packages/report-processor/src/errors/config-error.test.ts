import { describe, expect, test } from 'vitest';

import { ConfigError } from './config-error';

describe('ConfigError', () => {
  test('lists each issue on its own line', () => {
    const error = new ConfigError(['MONGODB_URL: Required', 'CHUNK_SIZE: Expected number']);

    expect(error.name).toBe('ConfigError');
    expect(error.issues).toHaveLength(2);
    expect(error.message).toBe(
      'Invalid configuration:\n  - MONGODB_URL: Required\n  - CHUNK_SIZE: Expected number',
    );
  });
});
