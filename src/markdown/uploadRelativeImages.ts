import fs from 'node:fs';
import type { ImageUploader } from '../uploaders/types.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { extractImageRefs } from './extractImageRefs.js';
import { resolveImagePaths } from './resolveImagePaths.js';
import { substituteImageRefs, type UploadResult } from './substituteImageRefs.js';

/**
 * Reads a markdown file, uploads every local image it references and writes a copy with the image
 * links replaced by their URLs to `outputPath`, overwriting any file there.
 *
 * Missing images abort the document before anything is uploaded. An upload failure aborts it
 * without writing the output; images uploaded before the failure stay uploaded.
 */
export async function uploadRelativeImages(params: {
  markdownPath: string;
  outputPath: string;
  uploader: ImageUploader;
  override?: boolean;
  logger?: Logger;
}): Promise<UploadResult> {
  const { markdownPath, outputPath, uploader } = params;
  const override = Boolean(params.override);
  const log = params.logger ?? defaultLogger;

  const content = await fs.promises.readFile(markdownPath, 'utf8');
  const images = await resolveImagePaths(extractImageRefs(content), markdownPath);

  const results: UploadResult = {};
  for (const image of images) {
    results[image.raw] = await uploader.uploadImage(image.absolutePath, override);
  }

  await fs.promises.writeFile(outputPath, substituteImageRefs(content, results), 'utf8');
  log.debug('document.written', { markdownPath, outputPath, images: images.length, uploader: uploader.kind });

  return results;
}
