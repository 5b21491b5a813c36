import fs from 'node:fs';
import path from 'node:path';
import { ConfigurationError } from '../shared/errors.js';

export const DEFAULT_OUTPUT_PATTERN = '{filename}.absolute.md';

export function expandOutputName(pattern: string, markdownPath: string): string {
  return pattern.replace(/\{filename\}/g, path.parse(markdownPath).name);
}

/** The output directory is never created; it has to exist before a batch starts. */
export async function assertOutputLocation(location: string): Promise<void> {
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(location);
  } catch {
    throw new ConfigurationError([`output location does not exist: ${location}`]);
  }
  if (!stat.isDirectory()) {
    throw new ConfigurationError([`output location is not a directory: ${location}`]);
  }
}

/**
 * Where the rewritten copy of `markdownPath` goes: beside it, or under `location` when given.
 * A pattern that would overwrite the input is rejected.
 */
export function resolveOutputPath(params: {
  markdownPath: string;
  outputPattern?: string;
  location?: string | null;
}): string {
  const name = expandOutputName(params.outputPattern || DEFAULT_OUTPUT_PATTERN, params.markdownPath);
  const dir = params.location ?? path.dirname(params.markdownPath);
  const outputPath = path.join(dir, name);

  if (path.resolve(outputPath) === path.resolve(params.markdownPath)) {
    throw new ConfigurationError([`output path would overwrite the input: ${params.markdownPath}`]);
  }
  return outputPath;
}
