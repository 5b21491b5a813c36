import type { UploaderFlags } from '../config/uploaderConfig.js';
import { DEFAULT_EXCLUDE, DEFAULT_PATTERN } from '../documents/findDocuments.js';
import { DEFAULT_OUTPUT_PATTERN } from '../documents/outputPath.js';
import { UsageError } from '../shared/errors.js';
import type { UploaderKind } from '../uploaders/types.js';

export const USAGE = `Usage: markdown-abs rel-to-abs <path> [options]

Uploads the local images referenced by markdown files and writes copies whose
image links point at the uploaded URLs.

  <path>                        A markdown file, or a directory to scan

Options:
  -p, --pattern <glob>          Files to pick when <path> is a directory (default: ${DEFAULT_PATTERN})
  -e, --exclude <text>          Skip files whose name contains <text>; "" keeps all (default: ${DEFAULT_EXCLUDE})
  -o, --output <pattern>        Output file name, {filename} is the input's stem (default: ${DEFAULT_OUTPUT_PATTERN})
  -l, --location <dir>          Existing directory for output files (default: beside each input)
      --dest <file>             Exact output file; only when <path> is a single file
  -x, --concurrency <n>         Documents processed at the same time (default: 1)
  -u, --uploader <s3|imgur>     Upload backend (default: s3)
  -v, --verbose                 Debug logging
  -h, --help                    Show this help

S3 (environment variables in brackets):
      --s3-bucket <name>              [S3_BUCKET]
      --s3-base-key <pattern>         Key prefix; {filename}, {parent_0}, {random_hex} [S3_BASE_KEY]
      --s3-acl <acl>                  Canned ACL, "" for none (default: private) [S3_ACL]
      --s3-cloudfront-domain <host>   Host used in URLs instead of the bucket host [S3_CLOUDFRONT_DOMAIN]
      --s3-cache-control <value>      (default: public, max-age=31536000) [S3_CACHE_CONTROL]
      --s3-override [true|false]      Upload even when the object exists [S3_OVERRIDE]
      --s3-validate-etag [true|false] Re-upload existing objects whose ETag differs from the local MD5 (default: true) [S3_VALIDATE_ETAG]
      --s3-profile-name <name>        [S3_PROFILE]
      --s3-aws-access-key-id <id>     [S3_ACCESS_KEY_ID]
      --s3-aws-secret-access-key <k>  [S3_SECRET_ACCESS_KEY]
      --s3-aws-session-token <t>      [S3_SESSION_TOKEN]
      --s3-region-name <region>       [S3_REGION]
      --s3-endpoint <url>             S3-compatible endpoint [S3_ENDPOINT]
      --s3-force-path-style [true|false] [S3_FORCE_PATH_STYLE]

Imgur:
      --imgur-access-token <token>    [IMGUR_ACCESS_TOKEN]
`;

type ValueKey = 'pattern' | 'exclude' | 'output' | 'location' | 'dest' | 'concurrency' | 'uploader' | keyof UploaderFlags;

type OptionSpec = {
  key: ValueKey;
  /** Boolean switch: bare means "true"; takes `=value` or a following true/false word. */
  flag?: boolean;
};

const OPTIONS: Record<string, OptionSpec> = {
  '-p': { key: 'pattern' },
  '--pattern': { key: 'pattern' },
  '-e': { key: 'exclude' },
  '--exclude': { key: 'exclude' },
  '-o': { key: 'output' },
  '--output': { key: 'output' },
  '-l': { key: 'location' },
  '--location': { key: 'location' },
  '--dest': { key: 'dest' },
  '-x': { key: 'concurrency' },
  '--concurrency': { key: 'concurrency' },
  '-u': { key: 'uploader' },
  '--uploader': { key: 'uploader' },

  '--s3-bucket': { key: 'bucket' },
  '--s3-base-key': { key: 'baseKey' },
  '--s3-acl': { key: 'acl' },
  '--s3-cloudfront-domain': { key: 'cloudfrontDomain' },
  '--s3-cache-control': { key: 'cacheControl' },
  '--s3-override': { key: 'override', flag: true },
  '--s3-validate-etag': { key: 'validateEtag', flag: true },
  '--s3-profile-name': { key: 'profile' },
  '--s3-profile': { key: 'profile' },
  '--s3-aws-access-key-id': { key: 'accessKeyId' },
  '--s3-access-key-id': { key: 'accessKeyId' },
  '--s3-aws-secret-access-key': { key: 'secretAccessKey' },
  '--s3-secret-access-key': { key: 'secretAccessKey' },
  '--s3-aws-session-token': { key: 'sessionToken' },
  '--s3-session-token': { key: 'sessionToken' },
  '--s3-region-name': { key: 'region' },
  '--s3-region': { key: 'region' },
  '--s3-endpoint': { key: 'endpoint' },
  '--s3-force-path-style': { key: 'forcePathStyle', flag: true },

  '--imgur-access-token': { key: 'imgurAccessToken' },
};

const BOOLEAN_WORD = /^(?:true|false|yes|no|1|0)$/i;

const UPLOADER_FLAG_KEYS: Array<keyof UploaderFlags> = [
  'bucket',
  'baseKey',
  'acl',
  'cloudfrontDomain',
  'cacheControl',
  'override',
  'validateEtag',
  'profile',
  'accessKeyId',
  'secretAccessKey',
  'sessionToken',
  'region',
  'endpoint',
  'forcePathStyle',
  'imgurAccessToken',
];

export type RelToAbsOptions = {
  command: 'rel-to-abs';
  path: string;
  pattern: string;
  exclude: string;
  output: string;
  location: string | null;
  dest: string | null;
  concurrency: number;
  uploader: UploaderKind;
  verbose: number;
  uploaderFlags: UploaderFlags;
};

export type CliOptions = { command: 'help' } | RelToAbsOptions;

/** `--s3_bucket` and `--S3-ACL` are accepted as spellings of `--s3-bucket` and `--s3-acl`. */
function normalizeOptionName(name: string): string {
  if (!name.startsWith('--')) return name;
  return `--${name.slice(2).replace(/_/g, '-').toLowerCase()}`;
}

function parseConcurrency(raw: string | undefined): number {
  if (raw === undefined) return 1;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new UsageError(`--concurrency must be a positive integer, got "${raw}"`);
  }
  return n;
}

function parseUploader(raw: string | undefined): UploaderKind {
  const v = String(raw ?? 's3')
    .trim()
    .toLowerCase();
  if (v === 's3' || v === 'imgur') return v;
  throw new UsageError(`--uploader must be one of s3, imgur; got "${raw}"`);
}

export function parseCliArgs(argv: string[]): CliOptions {
  const positionals: string[] = [];
  const values: Partial<Record<ValueKey, string>> = {};
  let verbose = 0;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (arg === '-h' || arg === '--help') {
      help = true;
      continue;
    }
    if (/^-v+$/.test(arg)) {
      verbose += arg.length - 1;
      continue;
    }
    if (arg === '--verbose') {
      verbose += 1;
      continue;
    }
    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const hasInline = arg.startsWith('--') && eq > 0;
    const name = normalizeOptionName(hasInline ? arg.slice(0, eq) : arg);
    const inline = hasInline ? arg.slice(eq + 1) : undefined;

    const spec = OPTIONS[name];
    if (!spec) throw new UsageError(`Unknown option: ${arg}`);

    if (spec.flag) {
      const next = argv[i + 1];
      if (inline === undefined && next !== undefined && BOOLEAN_WORD.test(next)) {
        values[spec.key] = next;
        i += 1;
      } else {
        values[spec.key] = inline ?? 'true';
      }
      continue;
    }

    const value = inline ?? argv[i + 1];
    if (inline === undefined) i += 1;
    if (value === undefined) throw new UsageError(`Missing value for ${name}`);
    values[spec.key] = value;
  }

  if (help) return { command: 'help' };

  const [command, target, ...extra] = positionals;
  if (!command) throw new UsageError('Missing command');
  if (command !== 'rel-to-abs') throw new UsageError(`Unknown command: ${command}`);
  if (!target) throw new UsageError('Missing <path>');
  if (extra.length > 0) throw new UsageError(`Unexpected argument: ${extra[0]}`);

  const uploaderFlags: UploaderFlags = {};
  for (const key of UPLOADER_FLAG_KEYS) {
    uploaderFlags[key] = values[key];
  }

  return {
    command,
    path: target,
    pattern: values.pattern || DEFAULT_PATTERN,
    exclude: values.exclude ?? DEFAULT_EXCLUDE,
    output: values.output || DEFAULT_OUTPUT_PATTERN,
    location: values.location || null,
    dest: values.dest || null,
    concurrency: parseConcurrency(values.concurrency),
    uploader: parseUploader(values.uploader),
    verbose,
    uploaderFlags,
  };
}
