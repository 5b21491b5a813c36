export * from './batch/processBatch.js';
export * from './config/uploaderConfig.js';
export * from './documents/findDocuments.js';
export * from './documents/outputPath.js';
export * from './markdown/extractImageRefs.js';
export * from './markdown/resolveImagePaths.js';
export * from './markdown/substituteImageRefs.js';
export * from './markdown/uploadRelativeImages.js';
export * from './shared/errors.js';
export * from './uploaders/imgurUploader.js';
export * from './uploaders/index.js';
export * from './uploaders/keyPrefix.js';
export * from './uploaders/s3Uploader.js';
export * from './uploaders/types.js';
export * from './uploaders/uploadPolicy.js';
export { createLogger, type Logger, type LogLevel } from './utils/logger.js';
