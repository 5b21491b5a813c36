import { errorMessage, extractHttpStatus } from '../utils/httpErrors.js';

/** One or more images referenced by a document do not exist on disk. Raised before any upload. */
export class MissingImageError extends Error {
  readonly documentPath: string;
  readonly missingPaths: string[];

  constructor(documentPath: string, missingPaths: string[]) {
    super(`Missing images: ${missingPaths.join(',')}`);
    this.name = 'MissingImageError';
    this.documentPath = documentPath;
    this.missingPaths = missingPaths;
  }
}

export type UploadOperation = 'head_object' | 'put_object' | 'imgur_upload';

export class UploadTransportError extends Error {
  readonly operation: UploadOperation;
  readonly key?: string;
  readonly status: number | null;

  constructor(
    message: string,
    options: {
      operation: UploadOperation;
      key?: string;
      status?: number | null;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options.cause });
    this.name = 'UploadTransportError';
    this.operation = options.operation;
    this.key = options.key;
    this.status = options.status ?? extractHttpStatus(options.cause);
  }

  static wrap(operation: UploadOperation, error: unknown, key?: string): UploadTransportError {
    if (error instanceof UploadTransportError) return error;
    return new UploadTransportError(`${operation} failed${key ? ` for ${key}` : ''}: ${errorMessage(error)}`, {
      operation,
      key,
      cause: error,
    });
  }
}

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/** Malformed command line; reported with the usage text. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** `Name: message` for batch summaries. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return errorMessage(error);
}
