import { z } from 'zod';
import { ConfigurationError } from '../shared/errors.js';

const optionalString = z.string().trim().min(1).optional();
// Set but blank means "send no header".
const switchableString = z.string().trim().optional();

const envSchemaBase = z.object({
  S3_BUCKET: optionalString,
  S3_BASE_KEY: optionalString,
  S3_ACL: switchableString,
  S3_CLOUDFRONT_DOMAIN: optionalString,
  S3_CACHE_CONTROL: switchableString,
  S3_OVERRIDE: optionalString,
  S3_VALIDATE_ETAG: optionalString,

  S3_PROFILE: optionalString,
  S3_ACCESS_KEY_ID: optionalString,
  S3_SECRET_ACCESS_KEY: optionalString,
  S3_SESSION_TOKEN: optionalString,
  S3_REGION: optionalString,
  S3_ENDPOINT: z.string().url().optional(),
  S3_FORCE_PATH_STYLE: optionalString,

  IMGUR_ACCESS_TOKEN: optionalString,

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

const envSchema = envSchemaBase.superRefine((env, ctx) => {
  if (Boolean(env.S3_ACCESS_KEY_ID) !== Boolean(env.S3_SECRET_ACCESS_KEY)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'S3_ACCESS_KEY_ID and S3_SECRET_ACCESS_KEY must be set together',
      path: ['S3_SECRET_ACCESS_KEY'],
    });
  }
});

export type Env = z.infer<typeof envSchema>;

const ENV_KEYS = Object.keys(envSchemaBase.shape);
const BLANK_MEANS_OFF = new Set(['S3_ACL', 'S3_CACHE_CONTROL']);

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

/**
 * Reads the variables this tool knows about. Blank values (as left by a copied `.env.example`)
 * count as unset, except `S3_ACL` and `S3_CACHE_CONTROL`, where a blank value switches the header
 * off.
 */
export function readEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const picked: Record<string, string> = {};
  for (const key of ENV_KEYS) {
    const raw = source[key];
    if (raw === undefined) continue;
    const value = raw.trim();
    if (value || BLANK_MEANS_OFF.has(key)) picked[key] = value;
  }

  const result = envSchema.safeParse(picked);
  if (!result.success) {
    throw new ConfigurationError(formatZodIssues(result.error));
  }
  return result.data;
}

export function isTruthy(value: string | undefined): boolean {
  const v = String(value || '')
    .trim()
    .toLowerCase();
  return v === '1' || v === 'true' || v === 'yes';
}

/** Like isTruthy, but an unset value yields `fallback` and `0`/`false`/`no` yield false. */
export function parseBooleanFlag(value: string | undefined, fallback: boolean): boolean {
  const v = String(value ?? '')
    .trim()
    .toLowerCase();
  if (!v) return fallback;
  if (v === '0' || v === 'false' || v === 'no') return false;
  return isTruthy(v) ? true : fallback;
}
