import { z } from 'zod';
import { ConfigurationError } from '../shared/errors.js';
import { findUnknownPlaceholders } from '../uploaders/keyPrefix.js';
import type { UploaderKind } from '../uploaders/types.js';
import { formatZodIssues, parseBooleanFlag, type Env } from './env.js';

export const DEFAULT_ACL = 'private';
export const DEFAULT_CACHE_CONTROL = 'public, max-age=31536000';

export const S3_CANNED_ACLS = [
  'private',
  'public-read',
  'public-read-write',
  'authenticated-read',
  'aws-exec-read',
  'bucket-owner-read',
  'bucket-owner-full-control',
] as const;

const nullableString = z.string().trim().min(1).nullable();

export const S3UploaderConfigSchema = z.object({
  kind: z.literal('s3'),
  bucket: z.string().trim().min(1, 'S3 bucket is required'),
  // Supports {filename}, {parent_0} and {random_hex}.
  baseKey: z
    .string()
    .trim()
    .min(1, 'S3 base key is required')
    .superRefine((value, ctx) => {
      const unknown = findUnknownPlaceholders(value);
      if (unknown.length > 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `unknown placeholder(s): ${unknown.join(', ')}`,
        });
      }
    }),
  acl: z.enum(S3_CANNED_ACLS).nullable(),
  cloudfrontDomain: nullableString.refine((value) => value === null || !/^https?:\/\//i.test(value), {
    message: 'custom domain must not include http:// or https://',
  }),
  cacheControl: nullableString,
  override: z.boolean(),
  validateEtag: z.boolean(),

  profile: nullableString,
  accessKeyId: nullableString,
  secretAccessKey: nullableString,
  sessionToken: nullableString,
  region: nullableString,
  endpoint: z.string().url().nullable(),
  forcePathStyle: z.boolean(),
});

export const ImgurUploaderConfigSchema = z.object({
  kind: z.literal('imgur'),
  accessToken: z.string().trim().min(1, 'Imgur access token is required'),
});

export const UploaderConfigSchema = z.discriminatedUnion('kind', [S3UploaderConfigSchema, ImgurUploaderConfigSchema]);

export type S3UploaderConfig = Readonly<z.infer<typeof S3UploaderConfigSchema>>;
export type ImgurUploaderConfig = Readonly<z.infer<typeof ImgurUploaderConfigSchema>>;
export type UploaderConfig = S3UploaderConfig | ImgurUploaderConfig;

/** Validates and freezes an uploader configuration. */
export function parseUploaderConfig(input: unknown): UploaderConfig {
  const result = UploaderConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(formatZodIssues(result.error));
  }
  return Object.freeze(result.data);
}

/**
 * Uploader settings given on the command line. An empty string for `acl` or `cacheControl`
 * switches that header off; any unset value falls back to the environment.
 */
export type UploaderFlags = {
  bucket?: string;
  baseKey?: string;
  acl?: string;
  cloudfrontDomain?: string;
  cacheControl?: string;
  override?: string;
  validateEtag?: string;
  profile?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  sessionToken?: string;
  region?: string;
  endpoint?: string;
  forcePathStyle?: string;
  imgurAccessToken?: string;
};

function pick(flag: string | undefined, envValue: string | undefined): string | null {
  const v = String(flag ?? envValue ?? '').trim();
  return v ? v : null;
}

/** Unset falls back to `fallback`; a flag or variable that is set but blank yields null. */
function pickWithDefault(flag: string | undefined, envValue: string | undefined, fallback: string): string | null {
  const v = flag ?? envValue;
  if (v === undefined) return fallback;
  return v.trim() ? v.trim() : null;
}

export function buildUploaderConfig(kind: UploaderKind, flags: UploaderFlags, env: Env): UploaderConfig {
  if (kind === 'imgur') {
    return parseUploaderConfig({
      kind,
      accessToken: pick(flags.imgurAccessToken, env.IMGUR_ACCESS_TOKEN) ?? '',
    });
  }

  const endpoint = pick(flags.endpoint, env.S3_ENDPOINT);
  return parseUploaderConfig({
    kind,
    bucket: pick(flags.bucket, env.S3_BUCKET) ?? '',
    baseKey: pick(flags.baseKey, env.S3_BASE_KEY) ?? '',
    acl: pickWithDefault(flags.acl, env.S3_ACL, DEFAULT_ACL),
    cloudfrontDomain: pick(flags.cloudfrontDomain, env.S3_CLOUDFRONT_DOMAIN),
    cacheControl: pickWithDefault(flags.cacheControl, env.S3_CACHE_CONTROL, DEFAULT_CACHE_CONTROL),
    override: parseBooleanFlag(flags.override ?? env.S3_OVERRIDE, false),
    validateEtag: parseBooleanFlag(flags.validateEtag ?? env.S3_VALIDATE_ETAG, true),
    profile: pick(flags.profile, env.S3_PROFILE),
    accessKeyId: pick(flags.accessKeyId, env.S3_ACCESS_KEY_ID),
    secretAccessKey: pick(flags.secretAccessKey, env.S3_SECRET_ACCESS_KEY),
    sessionToken: pick(flags.sessionToken, env.S3_SESSION_TOKEN),
    region: pick(flags.region, env.S3_REGION),
    endpoint,
    // Custom endpoints (MinIO and friends) usually need path-style addressing.
    forcePathStyle: parseBooleanFlag(flags.forcePathStyle ?? env.S3_FORCE_PATH_STYLE, Boolean(endpoint)),
  });
}
