import { describe, expect, it, vi } from 'vitest';
import { decideUpload, normalizeEtag, type RemoteObjectState } from '../src/uploaders/uploadPolicy.js';

function run(params: { override?: boolean; validateEtag?: boolean; remote: RemoteObjectState | Error; local?: string }) {
  const probeRemote = vi.fn(async () => {
    if (params.remote instanceof Error) throw params.remote;
    return params.remote;
  });
  const localDigest = vi.fn(async () => params.local ?? 'local-md5');
  const decision = decideUpload({
    override: params.override ?? false,
    validateEtag: params.validateEtag ?? true,
    probeRemote,
    localDigest,
  });
  return { decision, probeRemote, localDigest };
}

describe('decideUpload', () => {
  it('uploads without probing when override is set', async () => {
    const { decision, probeRemote } = run({ override: true, remote: { exists: true, etag: 'local-md5' } });

    await expect(decision).resolves.toEqual({ action: 'upload', reason: 'override' });
    expect(probeRemote).not.toHaveBeenCalled();
  });

  it('uploads when the object is missing', async () => {
    const { decision } = run({ remote: { exists: false } });
    await expect(decision).resolves.toEqual({ action: 'upload', reason: 'missing' });
  });

  it('skips an existing object without an ETag', async () => {
    const { decision, localDigest } = run({ remote: { exists: true, etag: null } });

    await expect(decision).resolves.toEqual({ action: 'skip', reason: 'exists' });
    expect(localDigest).not.toHaveBeenCalled();
  });

  it('skips an existing object when validation is off', async () => {
    const { decision, localDigest } = run({ validateEtag: false, remote: { exists: true, etag: 'other' } });

    await expect(decision).resolves.toEqual({ action: 'skip', reason: 'exists' });
    expect(localDigest).not.toHaveBeenCalled();
  });

  it('skips when the digest matches the ETag', async () => {
    const { decision } = run({ remote: { exists: true, etag: 'local-md5' } });
    await expect(decision).resolves.toEqual({ action: 'skip', reason: 'unchanged' });
  });

  it('re-uploads when the content changed', async () => {
    const { decision } = run({ remote: { exists: true, etag: 'remote-md5' } });
    await expect(decision).resolves.toEqual({ action: 'upload', reason: 'changed' });
  });

  it('propagates probe errors', async () => {
    const { decision } = run({ remote: new Error('access denied') });
    await expect(decision).rejects.toThrow('access denied');
  });
});

describe('normalizeEtag', () => {
  it('strips quotes and maps empty values to null', () => {
    expect(normalizeEtag('"9e107d9d372bb6826bd81d3542a419d6"')).toBe('9e107d9d372bb6826bd81d3542a419d6');
    expect(normalizeEtag('""')).toBeNull();
    expect(normalizeEtag(undefined)).toBeNull();
  });
});
