import type { ParsedContent } from '@reportrag/model';

import { z } from 'zod';

/**
 * Any JSON object. Arrays and primitives are rejected.
 */
export const structuredPageSchema = z.record(z.string(), z.unknown());

/**
 * Well-known page fields used for the integrated summary.
 *
 * Values of the wrong type are dropped instead of failing the page.
 */
export const pageSummaryFieldsSchema = z.object({
  summary: z.string().optional().catch(undefined),
  keywords: z
    .array(z.unknown())
    .transform((items) =>
      items.filter((item): item is string => typeof item === 'string'),
    )
    .optional()
    .catch(undefined),
  category: z.string().optional().catch(undefined),
});

export type PageSummaryFields = z.infer<typeof pageSummaryFieldsSchema>;

const CODE_FENCE_PATTERN = /^```(?:json)?\s*\n([\s\S]*?)\n?```$/i;

/**
 * Strip a surrounding Markdown code fence, if any
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = CODE_FENCE_PATTERN.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

/**
 * Parse a completion response into ParsedContent.
 *
 * A JSON object (optionally fenced) becomes `structured`; any other response,
 * including valid JSON that is not an object, is kept verbatim as `raw`.
 */
export function parsePageResponse(text: string): ParsedContent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(text));
  } catch {
    return { kind: 'raw', text };
  }

  const result = structuredPageSchema.safeParse(parsed);
  return result.success
    ? { kind: 'structured', fields: result.data }
    : { kind: 'raw', text };
}
