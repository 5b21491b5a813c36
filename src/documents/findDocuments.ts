import fs from 'node:fs';
import path from 'node:path';
import { UsageError } from '../shared/errors.js';

export const DEFAULT_PATTERN = '**/*.md';
export const DEFAULT_EXCLUDE = 'absolute';

/**
 * `**` followed by `/` spans zero or more directories, `*` and `?` stay within one path segment.
 * Paths are matched with `/` separators.
 */
export function globToRegex(glob: string): RegExp {
  let re = '';
  for (let i = 0; i < glob.length; i++) {
    const c = glob[i];
    if (c === '*') {
      if (glob[i + 1] === '*') {
        if (glob[i + 2] === '/') {
          re += '(?:.*/)?';
          i += 2;
        } else {
          re += '.*';
          i += 1;
        }
      } else {
        re += '[^/]*';
      }
    } else if (c === '?') {
      re += '[^/]';
    } else {
      re += c.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${re}$`);
}

/**
 * Markdown files to process. A file path selects itself. A directory selects the files below it
 * that match `pattern`, minus those whose name contains `exclude` (an empty `exclude` keeps all),
 * sorted by path.
 */
export async function findDocuments(
  target: string,
  options: { pattern?: string; exclude?: string } = {}
): Promise<string[]> {
  const pattern = options.pattern || DEFAULT_PATTERN;
  const exclude = options.exclude ?? DEFAULT_EXCLUDE;

  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(target);
  } catch {
    throw new UsageError(`Path does not exist: ${target}`);
  }
  if (!stat.isDirectory()) return [target];

  const matcher = globToRegex(pattern);
  const entries = await fs.promises.readdir(target, { recursive: true });
  const files: string[] = [];

  for (const entry of entries) {
    const rel = entry.split(path.sep).join('/');
    if (!matcher.test(rel)) continue;
    if (exclude && path.basename(rel).includes(exclude)) continue;

    const filePath = path.join(target, entry);
    const entryStat = await fs.promises.stat(filePath);
    if (!entryStat.isFile()) continue;
    files.push(filePath);
  }

  return files.sort();
}
