import fs from 'node:fs';
import path from 'node:path';
import { HeadObjectCommand, PutObjectCommand, S3Client, type PutObjectCommandInput } from '@aws-sdk/client-s3';
import { fromIni } from '@aws-sdk/credential-providers';
import type { S3UploaderConfig } from '../config/uploaderConfig.js';
import { UploadTransportError } from '../shared/errors.js';
import { calculateFileMd5 } from '../utils/fileHash.js';
import { isNotFoundError } from '../utils/httpErrors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { guessMimeType } from '../utils/mimeTypes.js';
import { quoteKey } from '../utils/url.js';
import { expandKeyPrefix, keyPrefixValues } from './keyPrefix.js';
import type { ImageUploader, UploaderProvider } from './types.js';
import { decideUpload, normalizeEtag, type RemoteObjectState } from './uploadPolicy.js';

export function createS3Client(cfg: S3UploaderConfig, log: Logger = defaultLogger): S3Client {
  const hasKeys = Boolean(cfg.accessKeyId && cfg.secretAccessKey);
  if (hasKeys && cfg.profile) {
    log.warn('s3.profile_ignored', { profile: cfg.profile, reason: 'explicit access keys are set' });
  }
  if (!hasKeys && cfg.sessionToken) {
    log.warn('s3.session_token_ignored', { reason: 'no access key id and secret are set' });
  }

  const credentials =
    cfg.accessKeyId && cfg.secretAccessKey
      ? {
          accessKeyId: cfg.accessKeyId,
          secretAccessKey: cfg.secretAccessKey,
          sessionToken: cfg.sessionToken ?? undefined,
        }
      : cfg.profile
        ? fromIni({ profile: cfg.profile })
        : undefined;

  // Region and credentials left undefined fall back to the SDK's default provider chains.
  return new S3Client({
    region: cfg.region ?? undefined,
    endpoint: cfg.endpoint ?? undefined,
    forcePathStyle: cfg.forcePathStyle,
    credentials,
  });
}

export function s3PublicHost(cfg: Pick<S3UploaderConfig, 'bucket' | 'cloudfrontDomain'>): string {
  return cfg.cloudfrontDomain || `${cfg.bucket}.s3.amazonaws.com`;
}

export class S3ImageUploader implements ImageUploader {
  kind: 's3' = 's3';
  private readonly client: S3Client;
  private readonly cfg: S3UploaderConfig;
  private readonly log: Logger;
  /** Expanded base key, without leading or trailing slashes. */
  readonly keyPrefix: string;

  constructor(client: S3Client, cfg: S3UploaderConfig, keyPrefix: string, log: Logger = defaultLogger) {
    this.client = client;
    this.cfg = cfg;
    this.keyPrefix = keyPrefix;
    this.log = log;
  }

  objectKey(imagePath: string): string {
    const name = path.basename(imagePath);
    return this.keyPrefix ? `${this.keyPrefix}/${name}` : name;
  }

  publicUrl(key: string): string {
    return `https://${s3PublicHost(this.cfg)}/${quoteKey(key)}`;
  }

  async uploadImage(imagePath: string, override: boolean): Promise<string> {
    const key = this.objectKey(imagePath);
    const url = this.publicUrl(key);

    const decision = await decideUpload({
      override,
      validateEtag: this.cfg.validateEtag,
      probeRemote: () => this.headObject(key),
      localDigest: () => calculateFileMd5(imagePath),
    });

    if (decision.action === 'skip') {
      this.log.debug('image.skipped', { imagePath, bucket: this.cfg.bucket, key, reason: decision.reason });
      return url;
    }

    await this.putObject(imagePath, key);
    this.log.debug('image.uploaded', { imagePath, bucket: this.cfg.bucket, key, reason: decision.reason });
    return url;
  }

  private async headObject(key: string): Promise<RemoteObjectState> {
    try {
      const resp = await this.client.send(new HeadObjectCommand({ Bucket: this.cfg.bucket, Key: key }));
      return { exists: true, etag: normalizeEtag(resp.ETag) };
    } catch (error) {
      if (isNotFoundError(error)) return { exists: false };
      throw UploadTransportError.wrap('head_object', error, key);
    }
  }

  private async putObject(imagePath: string, key: string): Promise<void> {
    const input: PutObjectCommandInput = {
      Bucket: this.cfg.bucket,
      Key: key,
      Body: await fs.promises.readFile(imagePath),
      ContentType: guessMimeType(imagePath) ?? undefined,
      CacheControl: this.cfg.cacheControl ?? undefined,
      ACL: this.cfg.acl ?? undefined,
    };

    try {
      await this.client.send(new PutObjectCommand(input));
    } catch (error) {
      throw UploadTransportError.wrap('put_object', error, key);
    }
  }
}

/**
 * Holds the single S3 client of a batch. Every document gets its own S3ImageUploader with the base
 * key expanded for that document; all of them share the client.
 */
export class S3UploaderProvider implements UploaderProvider {
  kind: 's3' = 's3';
  readonly client: S3Client;
  private readonly cfg: S3UploaderConfig;
  private readonly log: Logger;

  constructor(cfg: S3UploaderConfig, options: { client?: S3Client; logger?: Logger } = {}) {
    this.cfg = cfg;
    this.log = options.logger ?? defaultLogger;
    this.client = options.client ?? createS3Client(cfg, this.log);
  }

  uploaderFor(markdownPath: string): S3ImageUploader {
    const keyPrefix = expandKeyPrefix(this.cfg.baseKey, keyPrefixValues(markdownPath));
    return new S3ImageUploader(this.client, this.cfg, keyPrefix, this.log);
  }
}
