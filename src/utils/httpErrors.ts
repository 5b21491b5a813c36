type ErrorLike = {
  status?: number;
  statusCode?: number;
  response?: { status?: number };
  $metadata?: { httpStatusCode?: number };
  name?: string;
  message?: string;
};

function asErrorLike(error: unknown): ErrorLike | null {
  if (!error || typeof error !== 'object') return null;
  return error;
}

/** HTTP status carried by an error from fetch wrappers or the AWS SDK (`$metadata.httpStatusCode`). */
export function extractHttpStatus(error: unknown): number | null {
  const err = asErrorLike(error);
  if (!err) return null;
  const status =
    (typeof err.status === 'number' ? err.status : undefined) ??
    (typeof err.statusCode === 'number' ? err.statusCode : undefined) ??
    (typeof err.response?.status === 'number' ? err.response.status : undefined) ??
    (typeof err.$metadata?.httpStatusCode === 'number' ? err.$metadata.httpStatusCode : undefined);
  if (status === undefined || !Number.isFinite(status)) return null;
  return Math.floor(status);
}

/** HeadObject answers a missing key with a bare 404 (`NotFound`), or `NoSuchKey` on some S3-compatible stores. */
export function isNotFoundError(error: unknown): boolean {
  if (extractHttpStatus(error) === 404) return true;
  const name = asErrorLike(error)?.name;
  return name === 'NotFound' || name === 'NoSuchKey';
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message) return error.message;
  const err = asErrorLike(error);
  if (err && typeof err.message === 'string' && err.message) return err.message;
  return String(error);
}
