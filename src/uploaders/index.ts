import type { UploaderConfig } from '../config/uploaderConfig.js';
import type { Logger } from '../utils/logger.js';
import { ImgurUploaderProvider } from './imgurUploader.js';
import { S3UploaderProvider } from './s3Uploader.js';
import type { UploaderProvider } from './types.js';

/** Builds the uploader provider for a batch. Call once; the result is shared by all workers. */
export function createUploaderProvider(config: UploaderConfig, options: { logger?: Logger } = {}): UploaderProvider {
  switch (config.kind) {
    case 's3':
      return new S3UploaderProvider(config, options);
    case 'imgur':
      return new ImgurUploaderProvider(config, options);
  }
}
