import type { ProcessingResult, SuccessFlag } from '@reportrag/model';

/**
 * `complete` when there was at least one page and all succeeded, `failed`
 * when none succeeded, `partial` otherwise.
 */
export function deriveSuccessFlag(
  result: Pick<ProcessingResult, 'totalPages' | 'successfulPages'>,
): SuccessFlag {
  if (result.successfulPages === 0) return 'failed';
  return result.successfulPages === result.totalPages ? 'complete' : 'partial';
}
