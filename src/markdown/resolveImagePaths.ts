import path from 'node:path';
import { MissingImageError } from '../shared/errors.js';
import { fileExists } from '../utils/fileHash.js';
import { percentDecode } from '../utils/url.js';

export type ImageReference = {
  /** Target exactly as written in the document. */
  raw: string;
  absolutePath: string;
};

/**
 * Resolves raw targets against the document's directory. Throws MissingImageError naming every
 * target that does not exist, so a document with any missing image is never partially uploaded.
 */
export async function resolveImagePaths(refs: string[], documentPath: string): Promise<ImageReference[]> {
  const baseDir = path.dirname(path.resolve(documentPath));
  const resolved = refs.map((raw) => ({ raw, absolutePath: path.resolve(baseDir, percentDecode(raw)) }));

  const exists = await Promise.all(resolved.map((ref) => fileExists(ref.absolutePath)));
  const missing = resolved.filter((_, i) => !exists[i]).map((ref) => ref.absolutePath);
  if (missing.length > 0) {
    throw new MissingImageError(documentPath, missing);
  }

  return resolved;
}
