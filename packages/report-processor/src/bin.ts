import { runIngestCommand } from './core/ingest-command';

process.exitCode = await runIngestCommand(process.argv.slice(2));
