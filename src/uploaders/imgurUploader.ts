import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { ImgurUploaderConfig } from '../config/uploaderConfig.js';
import { UploadTransportError } from '../shared/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { guessMimeType } from '../utils/mimeTypes.js';
import type { ImageUploader, UploaderProvider } from './types.js';

export const IMGUR_UPLOAD_URL = 'https://api.imgur.com/3/image';

const imgurUploadResponseSchema = z.object({
  data: z.object({
    link: z.string().url(),
  }),
});

async function readBodySafe(resp: Response): Promise<string | null> {
  try {
    return await resp.text();
  } catch {
    return null;
  }
}

export class ImgurImageUploader implements ImageUploader {
  kind: 'imgur' = 'imgur';
  private readonly cfg: ImgurUploaderConfig;
  private readonly log: Logger;

  constructor(cfg: ImgurUploaderConfig, log: Logger = defaultLogger) {
    this.cfg = cfg;
    this.log = log;
  }

  /**
   * Imgur has no way to look an image up by name, so every call uploads and `override` has no
   * effect.
   */
  async uploadImage(imagePath: string, _override: boolean): Promise<string> {
    const bytes = await fs.promises.readFile(imagePath);
    const form = new FormData();
    form.append(
      'image',
      new Blob([new Uint8Array(bytes)], { type: guessMimeType(imagePath) ?? 'application/octet-stream' }),
      path.basename(imagePath)
    );

    let resp: Response;
    try {
      resp = await fetch(IMGUR_UPLOAD_URL, {
        method: 'POST',
        headers: {
          Accept: 'application/json',
          Authorization: `Bearer ${this.cfg.accessToken}`,
        },
        body: form,
      });
    } catch (error) {
      throw UploadTransportError.wrap('imgur_upload', error);
    }

    if (!resp.ok) {
      const bodyText = await readBodySafe(resp);
      throw new UploadTransportError(`Imgur upload failed with HTTP ${resp.status}`, {
        operation: 'imgur_upload',
        status: resp.status,
        cause: bodyText,
      });
    }

    let json: unknown;
    try {
      json = await resp.json();
    } catch (error) {
      throw UploadTransportError.wrap('imgur_upload', error);
    }

    const parsed = imgurUploadResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new UploadTransportError('Imgur response did not include data.link', {
        operation: 'imgur_upload',
        status: resp.status,
        cause: parsed.error,
      });
    }

    this.log.debug('image.uploaded', { imagePath, url: parsed.data.data.link });
    return parsed.data.data.link;
  }
}

/** The Imgur uploader holds nothing per document, so one instance serves the whole batch. */
export class ImgurUploaderProvider implements UploaderProvider {
  kind: 'imgur' = 'imgur';
  private readonly uploader: ImgurImageUploader;

  constructor(cfg: ImgurUploaderConfig, options: { logger?: Logger } = {}) {
    this.uploader = new ImgurImageUploader(cfg, options.logger ?? defaultLogger);
  }

  uploaderFor(_markdownPath: string): ImgurImageUploader {
    return this.uploader;
  }
}
