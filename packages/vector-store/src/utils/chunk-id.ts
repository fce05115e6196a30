import { createHash } from 'node:crypto';

/**
 * `{ticker}_{chunkNumber padded to 4 digits}`
 */
export function formatChunkId(ticker: string, chunkNumber: number): string {
  return `${ticker}_${String(chunkNumber).padStart(4, '0')}`;
}

/**
 * Deterministic UUID for a chunk id.
 *
 * Qdrant only accepts unsigned integers and UUIDs as point ids. The id is
 * built from the SHA-1 of the chunk id with the version nibble set to 5 and
 * the RFC 4122 variant bits, so the same chunk always maps to the same point.
 */
export function chunkPointId(chunkId: string): string {
  const hex = createHash('sha1').update(chunkId).digest('hex').slice(0, 32);
  const variant = ((parseInt(hex[16] ?? '0', 16) & 0x3) | 0x8).toString(16);
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    `5${hex.slice(13, 16)}`,
    `${variant}${hex.slice(17, 20)}`,
    hex.slice(20, 32),
  ].join('-');
}
