import type { LoggerMethods } from '@reportrag/logger';
import type { Mock } from 'vitest';

import {
  access,
  mkdtemp,
  readFile,
  readdir,
  rm,
  writeFile,
} from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { DownloadError } from '../errors/download-error';
import { PdfDownloader, buildPdfFilename } from './pdf-downloader';

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return { ...actual, writeFile: vi.fn(actual.writeFile) };
});

const NOW = new Date('2026-03-04T05:06:07.000Z');
const PDF_BYTES = new TextEncoder().encode('%PDF-1.7 test body');

function pdfResponse(
  body: ConstructorParameters<typeof Response>[0],
  headers: Record<string, string> = { 'content-type': 'application/pdf' },
  status = 200,
): Response {
  return new Response(body, { status, headers });
}

describe('PdfDownloader', () => {
  let dir: string;
  let mockLogger: LoggerMethods;
  let mockFetch: Mock<typeof fetch>;
  let downloader: PdfDownloader;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pdf-downloader-'));
    mockLogger = {
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      debug: vi.fn(),
    };
    mockFetch = vi.fn<typeof fetch>();
    downloader = new PdfDownloader(mockLogger, {
      baseUrl: 'https://reports.test/pdf?code=',
      downloadDir: join(dir, 'downloads'),
      timeoutMs: 1000,
      maxSizeBytes: 64,
      fetch: mockFetch,
      now: () => NOW,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('builds the report URL from the base URL and ticker', () => {
    expect(downloader.buildReportUrl('005930')).toBe(
      'https://reports.test/pdf?code=005930',
    );
  });

  test('writes the PDF and returns its metadata', async () => {
    mockFetch.mockResolvedValueOnce(pdfResponse(PDF_BYTES));

    const result = await downloader.download(
      'https://reports.test/pdf?code=005930',
      '005930',
    );

    expect(result).toEqual({
      filePath: join(dir, 'downloads', '005930_20260304_050607.pdf'),
      filename: '005930_20260304_050607.pdf',
      sourceUrl: 'https://reports.test/pdf?code=005930',
      fileSize: PDF_BYTES.byteLength,
      contentType: 'application/pdf',
      downloadTime: NOW,
    });
    expect(new Uint8Array(await readFile(result.filePath))).toEqual(PDF_BYTES);
  });

  test('passes an abort signal to fetch', async () => {
    mockFetch.mockResolvedValueOnce(pdfResponse(PDF_BYTES));

    await downloader.download('https://reports.test/a.pdf');

    expect(mockFetch.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal);
  });

  test('rejects a non-200 status', async () => {
    mockFetch.mockResolvedValueOnce(pdfResponse('missing', {}, 404));

    await expect(
      downloader.download('https://reports.test/a.pdf'),
    ).rejects.toThrow('Failed to download https://reports.test/a.pdf: HTTP 404');
  });

  test('cancels the unread body of a rejected response', async () => {
    const cancel = vi.fn();
    mockFetch.mockResolvedValueOnce(
      pdfResponse(new ReadableStream<Uint8Array>({ cancel }), {}, 503),
    );

    await expect(
      downloader.download('https://reports.test/a.pdf'),
    ).rejects.toThrow('HTTP 503');
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  test('cancels the body when the content type is wrong', async () => {
    const cancel = vi.fn();
    mockFetch.mockResolvedValueOnce(
      pdfResponse(new ReadableStream<Uint8Array>({ cancel }), {
        'content-type': 'text/html',
      }),
    );

    await expect(
      downloader.download('https://reports.test/a.pdf'),
    ).rejects.toThrow('Unexpected content type "text/html"');
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  test('removes a partially written file', async () => {
    const actual =
      await vi.importActual<typeof import('node:fs/promises')>('node:fs/promises');
    vi.mocked(writeFile).mockImplementationOnce(async (file) => {
      await actual.writeFile(file, 'partial');
      throw new Error('ENOSPC: no space left on device');
    });
    mockFetch.mockResolvedValueOnce(pdfResponse(PDF_BYTES));

    await expect(
      downloader.download('https://reports.test/a.pdf', 'T'),
    ).rejects.toThrow(
      'Failed to download https://reports.test/a.pdf: ENOSPC: no space left on device',
    );
    expect(await readdir(join(dir, 'downloads'))).toEqual([]);
  });

  test('rejects a content type other than PDF', async () => {
    mockFetch.mockResolvedValueOnce(
      pdfResponse('<html></html>', { 'content-type': 'text/html' }),
    );

    await expect(
      downloader.download('https://reports.test/a.pdf'),
    ).rejects.toThrow(
      'Unexpected content type "text/html" for https://reports.test/a.pdf',
    );
  });

  test('accepts a content type with parameters', async () => {
    mockFetch.mockResolvedValueOnce(
      pdfResponse(PDF_BYTES, { 'content-type': 'application/pdf; qs=0.001' }),
    );

    const result = await downloader.download('https://reports.test/a.pdf');

    expect(result.contentType).toBe('application/pdf; qs=0.001');
  });

  test('rejects a declared content-length above the limit', async () => {
    mockFetch.mockResolvedValueOnce(
      pdfResponse(PDF_BYTES, {
        'content-type': 'application/pdf',
        'content-length': '65',
      }),
    );

    await expect(
      downloader.download('https://reports.test/a.pdf'),
    ).rejects.toThrow('Declared size 65 bytes exceeds limit of 64 bytes');
  });

  test('aborts a body that grows past the limit and writes nothing', async () => {
    mockFetch.mockResolvedValueOnce(pdfResponse(new Uint8Array(65)));

    await expect(
      downloader.download('https://reports.test/a.pdf', 'T'),
    ).rejects.toThrow('Downloaded size exceeds limit of 64 bytes');
    await expect(readdir(join(dir, 'downloads'))).rejects.toThrow();
  });

  test('wraps network errors in DownloadError', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    const error = await downloader
      .download('https://reports.test/a.pdf')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DownloadError);
    expect(error).toMatchObject({
      message: 'Failed to download https://reports.test/a.pdf: fetch failed',
      url: 'https://reports.test/a.pdf',
    });
  });

  describe('cleanup', () => {
    test('removes the downloaded file', async () => {
      mockFetch.mockResolvedValueOnce(pdfResponse(PDF_BYTES));
      const { filePath } = await downloader.download(
        'https://reports.test/a.pdf',
        'T',
      );

      await downloader.cleanup(filePath);

      await expect(access(filePath)).rejects.toThrow();
    });

    test('logs a warning when the file cannot be removed', async () => {
      const missing = join(dir, 'missing.pdf');

      await downloader.cleanup(missing);

      expect(mockLogger.warn).toHaveBeenCalledWith(
        expect.stringContaining(`[PdfDownloader] Failed to remove ${missing}:`),
      );
    });
  });
});

describe('buildPdfFilename', () => {
  test('uses the ticker when given', () => {
    expect(buildPdfFilename('https://x.test/a', 'AAPL', NOW)).toBe(
      'AAPL_20260304_050607.pdf',
    );
  });

  test('uses an md5 prefix of the URL without a ticker', () => {
    // md5('abc') = 900150983cd24fb0d6963f7d28e17f72
    expect(buildPdfFilename('abc', undefined, NOW)).toBe(
      'pdf_90015098_20260304_050607.pdf',
    );
  });
});
