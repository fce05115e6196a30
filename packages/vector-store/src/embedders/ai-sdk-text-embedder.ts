import type { LoggerMethods } from '@reportrag/logger';
import type { EmbeddingModel } from 'ai';

import type { TextEmbedder } from './text-embedder';

import { BatchProcessor } from '@reportrag/shared';
import { embed, embedMany } from 'ai';

/** Texts sent per embedding request */
export const DEFAULT_EMBEDDING_BATCH_SIZE = 64;

export interface AiSdkTextEmbedderOptions {
  model: EmbeddingModel<string>;
  /** Texts per request (default: 64) */
  batchSize?: number;
  /** Retries performed by the AI SDK on transient errors (default: 0) */
  maxRetries?: number;
}

/**
 * TextEmbedder on top of the AI SDK embedding API.
 *
 * Documents are embedded in sequential batches; provider errors propagate.
 */
export class AiSdkTextEmbedder implements TextEmbedder {
  readonly modelName: string;
  private readonly model: EmbeddingModel<string>;
  private readonly batchSize: number;
  private readonly maxRetries: number;

  constructor(
    private readonly logger: LoggerMethods,
    options: AiSdkTextEmbedderOptions,
  ) {
    this.model = options.model;
    this.modelName =
      typeof options.model === 'string' ? options.model : options.model.modelId;
    this.batchSize = options.batchSize ?? DEFAULT_EMBEDDING_BATCH_SIZE;
    this.maxRetries = options.maxRetries ?? 0;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    return BatchProcessor.processSequential(
      texts,
      this.batchSize,
      async (batch, batchIndex) => {
        const { embeddings, usage } = await embedMany({
          model: this.model,
          values: batch,
          maxRetries: this.maxRetries,
        });
        this.logger.debug(
          `[AiSdkTextEmbedder] Batch ${batchIndex}: ${batch.length} texts, ${usage.tokens} tokens`,
        );
        return embeddings;
      },
    );
  }

  async embedQuery(text: string): Promise<number[]> {
    const { embedding } = await embed({
      model: this.model,
      value: text,
      maxRetries: this.maxRetries,
    });
    return embedding;
  }
}
