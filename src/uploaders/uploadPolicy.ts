export type RemoteObjectState = { exists: false } | { exists: true; etag: string | null };

export type UploadDecision =
  | { action: 'skip'; reason: 'exists' | 'unchanged' }
  | { action: 'upload'; reason: 'override' | 'missing' | 'changed' };

/**
 * Decides whether an image has to be (re)uploaded.
 *
 * With `override` the remote is not consulted. Otherwise a missing object is uploaded, an existing
 * one is kept unless `validateEtag` is set and the local digest differs from the remote ETag.
 * An object without an ETag is treated as up to date. Errors from `probeRemote` propagate.
 */
export async function decideUpload(params: {
  override: boolean;
  validateEtag: boolean;
  probeRemote: () => Promise<RemoteObjectState>;
  localDigest: () => Promise<string>;
}): Promise<UploadDecision> {
  if (params.override) return { action: 'upload', reason: 'override' };

  const remote = await params.probeRemote();
  if (!remote.exists) return { action: 'upload', reason: 'missing' };
  if (!remote.etag || !params.validateEtag) return { action: 'skip', reason: 'exists' };

  const local = await params.localDigest();
  if (local === remote.etag) return { action: 'skip', reason: 'unchanged' };
  return { action: 'upload', reason: 'changed' };
}

/** S3 returns ETags wrapped in double quotes. */
export function normalizeEtag(etag: string | undefined | null): string | null {
  const v = String(etag ?? '')
    .trim()
    .replace(/^"+|"+$/g, '');
  return v ? v : null;
}
