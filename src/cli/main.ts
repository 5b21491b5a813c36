import { processBatch } from '../batch/processBatch.js';
import { readEnv } from '../config/env.js';
import { loadEnvFile } from '../config/loadEnv.js';
import { buildUploaderConfig } from '../config/uploaderConfig.js';
import { findDocuments } from '../documents/findDocuments.js';
import { assertOutputLocation } from '../documents/outputPath.js';
import { ConfigurationError, UsageError } from '../shared/errors.js';
import { createUploaderProvider } from '../uploaders/index.js';
import { createLogger, type LogSink } from '../utils/logger.js';
import { parseCliArgs, USAGE, type CliOptions } from './args.js';
import { formatBatchSummary } from './summary.js';

export type CliIo = {
  stdout: LogSink;
  stderr: LogSink;
  /** Skip reading `.env`; tests set the environment themselves. */
  skipEnvFile?: boolean;
};

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/**
 * Runs the command line and returns the exit code: 0 when every document succeeded, 1 when a
 * document failed or the configuration is invalid, 2 for usage errors.
 */
export async function main(argv: string[], io: CliIo = defaultIo): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${error.message}\n\n${USAGE}`);
      return 2;
    }
    throw error;
  }

  if (options.command === 'help') {
    io.stdout(USAGE);
    return 0;
  }

  if (!io.skipEnvFile) loadEnvFile();
  const log = createLogger({
    level: options.verbose > 0 ? 'debug' : undefined,
    stdout: io.stdout,
    stderr: io.stderr,
  });

  try {
    const config = buildUploaderConfig(options.uploader, options.uploaderFlags, readEnv());
    const files = await findDocuments(options.path, { pattern: options.pattern, exclude: options.exclude });

    if (options.location) await assertOutputLocation(options.location);
    const dest = options.dest;
    if (dest && files.length !== 1) {
      throw new UsageError('--dest can only be used with a single markdown file');
    }

    const provider = createUploaderProvider(config, { logger: log });
    const result = await processBatch({
      files,
      provider,
      concurrency: options.concurrency,
      override: config.kind === 's3' ? config.override : false,
      outputPattern: options.output,
      location: options.location,
      outputPathFor: dest ? () => dest : undefined,
      logger: log,
    });

    io.stdout(`\n${formatBatchSummary(result)}`);
    return result.failed.length > 0 ? 1 : 0;
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${error.message}\n\n${USAGE}`);
      return 2;
    }
    if (error instanceof ConfigurationError) {
      log.error('config.invalid', { issues: error.issues });
      return 1;
    }
    throw error;
  }
}
