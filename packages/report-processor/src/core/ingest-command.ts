import type { ConsoleLoggerOptions, LoggerMethods } from '@reportrag/logger';

import type { Settings } from '../config/settings';
import type { ServiceContainerOptions } from './service-container';

import { createConsoleLogger } from '@reportrag/logger';
import { getErrorMessage } from '@reportrag/shared';

import { loadSettings } from '../config/settings';
import { ConfigError } from '../errors/config-error';
import { ServiceContainer } from './service-container';

type IngestServices = Pick<
  ServiceContainer,
  'start' | 'stop' | 'reportProcessor' | 'embeddingPipeline'
>;

export interface IngestCommandOptions {
  env?: NodeJS.ProcessEnv;
  sink?: ConsoleLoggerOptions['sink'];
  createServices?: (
    settings: Settings,
    logger: LoggerMethods,
    options: ServiceContainerOptions,
  ) => IngestServices;
}

interface IngestArgs {
  tickers: string[];
  embed: boolean;
}

const USAGE = 'Usage: ingest [--no-embed] <ticker> [ticker...]';

function parseArgs(args: string[]): IngestArgs | string {
  const tickers: string[] = [];
  let embed = true;

  for (const arg of args) {
    if (arg === '--no-embed') {
      embed = false;
    } else if (arg.startsWith('--')) {
      return `Unknown option ${arg}. ${USAGE}`;
    } else {
      tickers.push(arg);
    }
  }

  return tickers.length === 0 ? USAGE : { tickers, embed };
}

/**
 * Process the report of every ticker given on the command line, then embed
 * each document that came out complete.
 *
 * Tickers are handled one after another; a failing ticker is logged and the
 * rest still run.
 *
 * @returns Process exit code: 0 when every ticker succeeded, 1 otherwise
 */
export async function runIngestCommand(
  args: string[],
  options: IngestCommandOptions = {},
): Promise<number> {
  const parsed = parseArgs(args);
  if (typeof parsed === 'string') {
    createConsoleLogger({ sink: options.sink }).error(parsed);
    return 1;
  }

  let settings: Settings;
  try {
    settings = loadSettings(options.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      createConsoleLogger({ sink: options.sink }).error(error.message);
      return 1;
    }
    throw error;
  }

  const logger = createConsoleLogger({ level: settings.logLevel, sink: options.sink });
  const createServices =
    options.createServices ??
    ((config, serviceLogger, containerOptions) =>
      ServiceContainer.create(config, serviceLogger, containerOptions));
  const services = createServices(settings, logger, {
    onTokenUsage: (ticker, report) => {
      const { inputTokens, outputTokens, totalTokens } = report.total;
      logger.info(
        `[IngestCommand] Token usage for ${ticker}: ${inputTokens} input, ${outputTokens} output, ${totalTokens} total`,
      );
    },
  });

  let failures = 0;
  try {
    await services.start();
  } catch (error) {
    logger.error(`[IngestCommand] Failed to start services: ${getErrorMessage(error)}`);
    await services.stop();
    return 1;
  }

  try {
    for (const ticker of parsed.tickers) {
      try {
        const summary = await services.reportProcessor.processTicker(ticker);
        if (!parsed.embed) continue;

        if (summary.successFlag !== 'complete') {
          logger.warn(
            `[IngestCommand] Skipping embedding for ${ticker}: document is ${summary.successFlag}`,
          );
          continue;
        }

        const result = await services.embeddingPipeline.embedAndStore(ticker);
        if (result.success) {
          logger.info(`[IngestCommand] Embedded ${result.chunksCount} chunks for ${ticker}`);
        } else {
          failures++;
          logger.error(`[IngestCommand] ${result.error.message}`);
        }
      } catch (error) {
        failures++;
        logger.error(`[IngestCommand] Ticker ${ticker} failed: ${getErrorMessage(error)}`);
      }
    }
  } finally {
    await services.stop();
  }

  logger.info(
    `[IngestCommand] ${parsed.tickers.length - failures}/${parsed.tickers.length} tickers ingested`,
  );
  return failures === 0 ? 0 : 1;
}
