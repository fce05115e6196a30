export { loadSettings } from './config/settings';
export type { Settings } from './config/settings';
export { ReportProcessor } from './core/report-processor';
export type {
  ProcessFileOptions,
  ProcessOptions,
  ReportProcessingSummary,
  ReportProcessorOptions,
} from './core/report-processor';
export { ServiceContainer } from './core/service-container';
export type { ServiceContainerOptions } from './core/service-container';
export { ConfigError } from './errors/config-error';
export { deriveSuccessFlag } from './utils/success-flag';
export { runIngestCommand } from './core/ingest-command';
export type { IngestCommandOptions } from './core/ingest-command';
