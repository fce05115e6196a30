import type { ChunkPayload } from '@reportrag/model';

import { z } from 'zod';

export const chunkPayloadSchema = z.object({
  chunkId: z.string(),
  ticker: z.string(),
  chunkNumber: z.number().int(),
  content: z.string(),
  documentId: z.string(),
  filename: z.string(),
  totalPages: z.number().int(),
  successfulPages: z.number().int(),
  source: z.string(),
  embeddedAt: z.string(),
}) satisfies z.ZodType<ChunkPayload>;

/**
 * Validates a payload read back from the index.
 *
 * @throws {Error} naming the point when the payload does not match
 */
export function parseChunkPayload(pointId: string | number, payload: unknown): ChunkPayload {
  const result = chunkPayloadSchema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid chunk payload on point ${pointId}: ${issues}`);
  }
  return result.data;
}
