#!/usr/bin/env node
import { IncidentGenerator } from './index.js';
import { ProgressReporter } from './reporters/ProgressReporter.js';
import { FileConfigSource, loadConfig } from '../../config/index.js';
import { logger, enableDebugLogging } from '../../utils/logger.js';
import { ConfigurationError, CorruptStateError } from '../../utils/errors.js';
import type { GenerateSummary, OutputFormat } from './types.js';

interface CliArgs {
  count?: number;
  config?: string;
  fresh?: boolean;
  exportOnly?: boolean;
  clearCache?: boolean;
  debug?: boolean;
  format?: OutputFormat;
  help?: boolean;
}

const HELP = `
Incident Generator - Produce synthetic IT incident records with an LLM

Usage:
  incident-datagen --count <n> [options]

Options:
  --count <n>          Total number of incidents wanted (optional when resuming)
  --config <path>      Configuration file (default: config.json)
  --fresh              Discard the cache and start a new run
  --export-only        Export whatever the cache holds, without generating
  --clear-cache        Delete the cache after a successful export
  --debug              Log prompts and raw model responses
  --format <fmt>       Output format: table or json (default: table)
  --help               Show this help message

Exit codes:
  0  completed
  2  paused or cancelled (rerun to resume)
  1  error

Examples:
  incident-datagen --count 200
  incident-datagen --count 500 --config ./configs/gemini.json
  incident-datagen --export-only
  incident-datagen --count 50 --fresh --format json
`;

const positiveInt = (flag: string, value: string | undefined): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${flag} expects a positive integer, got "${value ?? ''}"`);
  }
  return parsed;
};

const parseFormat = (value: string | undefined): OutputFormat => {
  if (value === 'table' || value === 'json') return value;
  throw new ConfigurationError(`--format expects table or json, got "${value ?? ''}"`);
};

const parseArgs = (argv: string[]): CliArgs => {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--count':
      case '-n':
        args.count = positiveInt(arg, argv[++i]);
        break;
      case '--config':
        args.config = argv[++i];
        break;
      case '--fresh':
        args.fresh = true;
        break;
      case '--export-only':
        args.exportOnly = true;
        break;
      case '--clear-cache':
        args.clearCache = true;
        break;
      case '--debug':
        args.debug = true;
        break;
      case '--format':
        args.format = parseFormat(argv[++i]);
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new ConfigurationError(`Unknown option: ${arg}`);
    }
  }

  return args;
};

const STATUS_LABELS: Record<GenerateSummary['status'], string> = {
  completed: 'Completed',
  paused: 'Paused (rerun to resume)',
  cancelled: 'Cancelled (rerun to resume)',
  exported: 'Exported',
};

const printSummary = (summary: GenerateSummary) => {
  console.log('\nSummary:');
  console.log(`  Status:      ${STATUS_LABELS[summary.status]}`);
  if (summary.runId) console.log(`  Run:         ${summary.runId}`);
  if (summary.provider) console.log(`  Provider:    ${summary.provider} (${summary.model ?? 'default model'})`);
  console.log(`  Records:     ${summary.records}/${summary.target}`);
  console.log(`  Appended:    ${summary.appended}`);
  console.log(`  Rejected:    ${summary.softErrors}`);
  console.log(`  Batches:     ${summary.batchesSucceeded} ok, ${summary.batchesFailed} failed`);
  console.log(`  Cache:       ${summary.cacheFile}${summary.cacheCleared ? ' (cleared)' : ''}`);
  if (summary.export) {
    console.log(`  Export:      ${summary.export.path} (${summary.export.rows} rows, ${summary.export.format})`);
  }
  if (summary.error) console.log(`  Last error:  ${summary.error}`);
};

const main = async (): Promise<void> => {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    console.log(HELP);
    process.exit(1);
  }

  if (args.help) {
    console.log(HELP);
    process.exit(0);
  }

  if (args.debug) {
    enableDebugLogging();
  }

  const format = args.format ?? 'table';
  const reporter = new ProgressReporter(format !== 'json');

  const controller = new AbortController();
  const interrupt = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      logger.warn({ signal }, 'Second interrupt, exiting without waiting');
      process.exit(130);
    }
    logger.warn({ signal }, 'Interrupt received; stopping after the current checkpoint');
    controller.abort();
  };
  process.on('SIGINT', interrupt);
  process.on('SIGTERM', interrupt);

  try {
    const config = await loadConfig(new FileConfigSource(args.config ?? 'config.json'));
    const generator = new IncidentGenerator(config);

    logger.info({ count: args.count, fresh: args.fresh ?? false, exportOnly: args.exportOnly ?? false }, 'Starting incident generation');

    const summary = await generator.run(
      {
        count: args.count,
        fresh: args.fresh ?? false,
        exportOnly: args.exportOnly ?? false,
        clearCache: args.clearCache ?? false,
      },
      reporter,
      controller.signal
    );

    if (format === 'json') {
      console.log(JSON.stringify(summary, null, 2));
    } else {
      printSummary(summary);
    }

    process.exitCode = summary.status === 'completed' || summary.status === 'exported' ? 0 : 2;
  } catch (error) {
    logger.error({ error }, 'Incident generation failed');
    reporter.error(error instanceof Error ? error.message : String(error));
    if (error instanceof ConfigurationError) {
      error.issues.forEach(issue => console.error(`  ${issue}`));
    }
    if (error instanceof CorruptStateError) {
      console.error(`  Fix or remove ${error.path}, or rerun with --fresh to start over.`);
    }
    process.exitCode = 1;
  } finally {
    process.off('SIGINT', interrupt);
    process.off('SIGTERM', interrupt);
  }
};

void main();
