import { describe, expect, test } from 'vitest';

import { DownloadError } from './download-error';
import { ExtractionError } from './extraction-error';
import { MergeError } from './merge-error';

describe('ExtractionError', () => {
  test('creates error with name and cause', () => {
    const cause = new Error('bad xref');
    const error = new ExtractionError('cannot read', { cause });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ExtractionError');
    expect(error.message).toBe('cannot read');
    expect(error.cause).toBe(cause);
  });

  test('fromError prefixes the context', () => {
    const error = ExtractionError.fromError(
      'Failed to open /tmp/a.pdf',
      new Error('Invalid PDF structure.'),
    );

    expect(error.message).toBe('Failed to open /tmp/a.pdf: Invalid PDF structure.');
  });
});

describe('MergeError', () => {
  test('names the duplicated page', () => {
    const error = new MergeError(3);

    expect(error.name).toBe('MergeError');
    expect(error.pageNumber).toBe(3);
    expect(error.message).toBe('Duplicate page number 3 in page results');
  });
});

describe('DownloadError', () => {
  test('keeps the url', () => {
    const error = new DownloadError('HTTP 404', 'https://reports.test/005930');

    expect(error.name).toBe('DownloadError');
    expect(error.url).toBe('https://reports.test/005930');
  });

  test('fromError wraps unknown errors', () => {
    const cause = new TypeError('fetch failed');
    const error = DownloadError.fromError('https://reports.test/1', cause);

    expect(error.message).toBe(
      'Failed to download https://reports.test/1: fetch failed',
    );
    expect(error.cause).toBe(cause);
  });

  test('fromError returns an existing DownloadError unchanged', () => {
    const original = new DownloadError('HTTP 500', 'https://reports.test/1');

    expect(DownloadError.fromError('https://reports.test/1', original)).toBe(
      original,
    );
  });
});
