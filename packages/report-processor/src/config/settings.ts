import type { LogLevel } from '@reportrag/logger';

import { LOG_LEVELS } from '@reportrag/logger';
import { z } from 'zod';

import { ConfigError } from '../errors/config-error';

const requiredString = z.string().trim().min(1, 'is required');
const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  MONGODB_URL: requiredString,
  MONGODB_DATABASE: requiredString,
  MONGODB_COLLECTION: requiredString,
  /** Seconds */
  PDF_DOWNLOAD_TIMEOUT: positiveInt.default(30),
  PDF_MAX_SIZE_MB: positiveInt.default(50),
  DOWNLOAD_DIR: requiredString.default('downloads'),
  OPENAI_API_KEY: requiredString,
  OPENAI_MODEL: requiredString.default('gpt-4o-mini'),
  OPENAI_MAX_TOKENS: positiveInt.default(4000),
  OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  REPORT_PDF_URL: requiredString.url(),
  PAGE_CONCURRENCY: positiveInt.default(8),
  QDRANT_URL: requiredString.url().default('http://localhost:6333'),
  QDRANT_API_KEY: z.string().optional(),
  QDRANT_COLLECTION_NAME: requiredString.default('report_chunks'),
  EMBEDDING_MODEL_NAME: requiredString.default('text-embedding-3-small'),
  EMBEDDING_DIMENSION: positiveInt.default(1536),
  CHUNK_SIZE: positiveInt.default(1024),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(512),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface Settings {
  mongodb: { url: string; database: string; collection: string };
  download: {
    /** Prefix the ticker is appended to */
    reportUrl: string;
    timeoutMs: number;
    maxSizeBytes: number;
    directory: string;
  };
  openai: {
    apiKey: string;
    model: string;
    maxOutputTokens: number;
    temperature: number;
  };
  pageConcurrency: number;
  qdrant: { url: string; apiKey?: string; collectionName: string };
  embedding: {
    modelName: string;
    dimension: number;
    chunkSize: number;
    chunkOverlap: number;
  };
  logLevel: LogLevel;
}

/**
 * Read and validate settings from environment variables.
 *
 * Empty strings count as unset, so defaults apply to them.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const input = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const result = envSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    );
  }

  const vars = result.data;
  if (vars.CHUNK_OVERLAP >= vars.CHUNK_SIZE) {
    throw new ConfigError([
      `CHUNK_OVERLAP: must be smaller than CHUNK_SIZE (${vars.CHUNK_SIZE})`,
    ]);
  }

  return {
    mongodb: {
      url: vars.MONGODB_URL,
      database: vars.MONGODB_DATABASE,
      collection: vars.MONGODB_COLLECTION,
    },
    download: {
      reportUrl: vars.REPORT_PDF_URL,
      timeoutMs: vars.PDF_DOWNLOAD_TIMEOUT * 1000,
      maxSizeBytes: vars.PDF_MAX_SIZE_MB * 1024 * 1024,
      directory: vars.DOWNLOAD_DIR,
    },
    openai: {
      apiKey: vars.OPENAI_API_KEY,
      model: vars.OPENAI_MODEL,
      maxOutputTokens: vars.OPENAI_MAX_TOKENS,
      temperature: vars.OPENAI_TEMPERATURE,
    },
    pageConcurrency: vars.PAGE_CONCURRENCY,
    qdrant: {
      url: vars.QDRANT_URL,
      apiKey: vars.QDRANT_API_KEY,
      collectionName: vars.QDRANT_COLLECTION_NAME,
    },
    embedding: {
      modelName: vars.EMBEDDING_MODEL_NAME,
      dimension: vars.EMBEDDING_DIMENSION,
      chunkSize: vars.CHUNK_SIZE,
      chunkOverlap: vars.CHUNK_OVERLAP,
    },
    logLevel: vars.LOG_LEVEL,
  };
}
