import { resolveOutputPath } from '../documents/outputPath.js';
import type { UploadResult } from '../markdown/substituteImageRefs.js';
import { uploadRelativeImages } from '../markdown/uploadRelativeImages.js';
import { describeError } from '../shared/errors.js';
import type { UploaderProvider } from '../uploaders/types.js';
import { errorMessage } from '../utils/httpErrors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { Semaphore, poolSize } from '../utils/semaphore.js';

export type DocumentSuccess = {
  file: string;
  outputPath: string;
  images: UploadResult;
};

export type DocumentFailure = {
  file: string;
  error: unknown;
  /** `Name: message` of the captured error. */
  message: string;
};

export type BatchResult = {
  succeeded: DocumentSuccess[];
  failed: DocumentFailure[];
};

export type BatchOptions = {
  files: string[];
  provider: UploaderProvider;
  /** Maximum number of documents in flight. Capped at the number of files. */
  concurrency?: number;
  override?: boolean;
  outputPattern?: string;
  location?: string | null;
  /** Replaces the pattern/location naming, e.g. for an explicit destination file. */
  outputPathFor?: (markdownPath: string) => string;
  /** Shared by all workers; every progress line goes through it. */
  logger?: Logger;
};

/**
 * Runs the single-document pipeline for every file on a bounded pool. Each document ends up in
 * exactly one of the two lists; a failing document never stops the others.
 */
export async function processBatch(options: BatchOptions): Promise<BatchResult> {
  const { files, provider } = options;
  const log = options.logger ?? defaultLogger;
  const override = Boolean(options.override);
  const outputPathFor =
    options.outputPathFor ??
    ((markdownPath: string) =>
      resolveOutputPath({ markdownPath, outputPattern: options.outputPattern, location: options.location }));

  const result: BatchResult = { succeeded: [], failed: [] };
  if (files.length === 0) {
    log.warn('batch.empty', { uploader: provider.kind });
    return result;
  }

  const sem = new Semaphore(poolSize(options.concurrency, files.length));
  log.info('batch.start', { files: files.length, concurrency: sem.capacity, uploader: provider.kind, override });

  const processOne = async (file: string): Promise<void> => {
    try {
      const outputPath = outputPathFor(file);
      const images = await uploadRelativeImages({
        markdownPath: file,
        outputPath,
        uploader: provider.uploaderFor(file),
        override,
        logger: log,
      });
      result.succeeded.push({ file, outputPath, images });
      log.info('document.succeeded', { file, outputPath, images: Object.keys(images).length });
    } catch (error) {
      result.failed.push({ file, error, message: describeError(error) });
      log.error('document.failed', {
        file,
        errorName: error instanceof Error ? error.name : null,
        errorMessage: errorMessage(error),
      });
    }
  };

  await Promise.all(files.map((file) => sem.use(() => processOne(file))));

  log.info('batch.done', { succeeded: result.succeeded.length, failed: result.failed.length });
  return result;
}
