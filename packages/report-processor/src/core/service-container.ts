import type { LoggerMethods } from '@reportrag/logger';

import type { Settings } from '../config/settings';
import type { ReportProcessorOptions } from './report-processor';

import { createOpenAI } from '@ai-sdk/openai';
import {
  DocumentStoreGateway,
  MongoDocumentCollection,
} from '@reportrag/document-store';
import {
  PageFanOut,
  PageProcessor,
  PageTextExtractor,
  PdfDownloader,
} from '@reportrag/pdf-parser';
import {
  AiSdkTextEmbedder,
  ChunkEmbeddingPipeline,
  QdrantVectorIndex,
  RecursiveCharacterTextSplitter,
} from '@reportrag/vector-store';
import { QdrantClient } from '@qdrant/js-client-rest';
import { MongoClient } from 'mongodb';

import { ReportProcessor } from './report-processor';

export interface ServiceContainerOptions {
  onTokenUsage?: ReportProcessorOptions['onTokenUsage'];
}

/**
 * Holds every long-lived service of the application.
 *
 * Everything is built once in `create()`; nothing connects until `start()`.
 */
export class ServiceContainer {
  private started = false;

  private constructor(
    private readonly logger: LoggerMethods,
    private readonly mongoClient: MongoClient,
    readonly documentStore: DocumentStoreGateway,
    readonly embeddingPipeline: ChunkEmbeddingPipeline,
    readonly reportProcessor: ReportProcessor,
  ) {}

  static create(
    settings: Settings,
    logger: LoggerMethods,
    options: ServiceContainerOptions = {},
  ): ServiceContainer {
    const mongoClient = new MongoClient(settings.mongodb.url);
    const documentStore = new DocumentStoreGateway(
      logger,
      MongoDocumentCollection.fromDb(
        mongoClient.db(settings.mongodb.database),
        settings.mongodb.collection,
      ),
    );

    const openai = createOpenAI({ apiKey: settings.openai.apiKey });

    const pageProcessor = new PageProcessor(logger, {
      model: openai(settings.openai.model),
      maxOutputTokens: settings.openai.maxOutputTokens,
      temperature: settings.openai.temperature,
    });
    const reportProcessor = new ReportProcessor({
      logger,
      downloader: new PdfDownloader(logger, {
        baseUrl: settings.download.reportUrl,
        downloadDir: settings.download.directory,
        timeoutMs: settings.download.timeoutMs,
        maxSizeBytes: settings.download.maxSizeBytes,
      }),
      extractor: new PageTextExtractor(logger),
      fanOut: new PageFanOut(logger, pageProcessor, {
        concurrency: settings.pageConcurrency,
      }),
      store: documentStore,
      onTokenUsage: options.onTokenUsage,
    });

    const qdrant = new QdrantClient({
      url: settings.qdrant.url,
      apiKey: settings.qdrant.apiKey,
    });
    const embeddingPipeline = new ChunkEmbeddingPipeline(logger, {
      documents: documentStore,
      index: new QdrantVectorIndex(logger, qdrant, settings.qdrant.collectionName),
      embedder: new AiSdkTextEmbedder(logger, {
        model: openai.textEmbeddingModel(settings.embedding.modelName),
      }),
      splitter: new RecursiveCharacterTextSplitter({
        chunkSize: settings.embedding.chunkSize,
        chunkOverlap: settings.embedding.chunkOverlap,
      }),
      dimension: settings.embedding.dimension,
    });

    return new ServiceContainer(
      logger,
      mongoClient,
      documentStore,
      embeddingPipeline,
      reportProcessor,
    );
  }

  /**
   * Connect to MongoDB, then prepare indexes and the vector collection.
   * The connection is closed again when preparation fails.
   */
  async start(): Promise<void> {
    if (this.started) return;

    this.logger.info('[ServiceContainer] Starting services...');
    await this.mongoClient.connect();
    try {
      await this.documentStore.ensureIndexes();
      await this.embeddingPipeline.initialize();
    } catch (error) {
      await this.mongoClient.close();
      throw error;
    }

    this.started = true;
    this.logger.info('[ServiceContainer] Services started');
  }

  async stop(): Promise<void> {
    if (!this.started) return;

    await this.mongoClient.close();
    this.started = false;
    this.logger.info('[ServiceContainer] Services stopped');
  }
}
