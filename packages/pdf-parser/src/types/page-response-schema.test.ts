import { describe, expect, test } from 'vitest';

import {
  pageSummaryFieldsSchema,
  parsePageResponse,
  stripCodeFence,
} from './page-response-schema';

describe('parsePageResponse', () => {
  test('parses a JSON object as structured content', () => {
    expect(
      parsePageResponse('{"summary":"Q3 results","keywords":["revenue"]}'),
    ).toEqual({
      kind: 'structured',
      fields: { summary: 'Q3 results', keywords: ['revenue'] },
    });
  });

  test('parses a fenced JSON object', () => {
    const text = '```json\n{"category":"earnings"}\n```';

    expect(parsePageResponse(text)).toEqual({
      kind: 'structured',
      fields: { category: 'earnings' },
    });
  });

  test('keeps unknown keys', () => {
    expect(parsePageResponse('{"content":"x","extra":1}')).toEqual({
      kind: 'structured',
      fields: { content: 'x', extra: 1 },
    });
  });

  test('keeps non-JSON text verbatim as raw', () => {
    const text = '  The page lists quarterly revenue.  ';

    expect(parsePageResponse(text)).toEqual({ kind: 'raw', text });
  });

  test('treats a JSON array as raw', () => {
    expect(parsePageResponse('["a","b"]')).toEqual({
      kind: 'raw',
      text: '["a","b"]',
    });
  });

  test('treats a JSON primitive as raw', () => {
    expect(parsePageResponse('42')).toEqual({ kind: 'raw', text: '42' });
  });
});

describe('stripCodeFence', () => {
  test('removes a plain fence', () => {
    expect(stripCodeFence('```\n{"a":1}\n```')).toBe('{"a":1}');
  });

  test('returns unfenced text trimmed', () => {
    expect(stripCodeFence('  {"a":1} ')).toBe('{"a":1}');
  });
});

describe('pageSummaryFieldsSchema', () => {
  test('drops fields of the wrong type', () => {
    expect(
      pageSummaryFieldsSchema.parse({
        summary: 12,
        keywords: 'revenue',
        category: 'earnings',
      }),
    ).toEqual({ summary: undefined, keywords: undefined, category: 'earnings' });
  });

  test('keeps only string keywords', () => {
    expect(
      pageSummaryFieldsSchema.parse({ keywords: ['revenue', 3, 'margin'] })
        .keywords,
    ).toEqual(['revenue', 'margin']);
  });
});
