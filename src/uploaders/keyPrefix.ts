import crypto from 'node:crypto';
import path from 'node:path';
import { ConfigurationError } from '../shared/errors.js';

export type KeyPrefixValues = {
  filename: string;
  parent_0: string;
  random_hex: string;
};

const PLACEHOLDER = /\{([^{}]*)\}/g;

function isKnownPlaceholder(name: string): name is keyof KeyPrefixValues {
  return name === 'filename' || name === 'parent_0' || name === 'random_hex';
}

/**
 * Placeholder values for one markdown file: its stem, the stem of its directory, and a fresh
 * 8-character hex token.
 */
export function keyPrefixValues(markdownPath: string): KeyPrefixValues {
  const abs = path.resolve(markdownPath);
  return {
    filename: path.parse(abs).name,
    parent_0: path.parse(path.dirname(abs)).name,
    random_hex: crypto.randomUUID().split('-')[0] ?? '',
  };
}

export function findUnknownPlaceholders(pattern: string): string[] {
  const unknown: string[] = [];
  for (const match of pattern.matchAll(PLACEHOLDER)) {
    const name = match[1] ?? '';
    if (!isKnownPlaceholder(name)) unknown.push(`{${name}}`);
  }
  return unknown;
}

/** Expands a key pattern and trims leading and trailing slashes. */
export function expandKeyPrefix(pattern: string, values: KeyPrefixValues): string {
  const unknown = findUnknownPlaceholders(pattern);
  if (unknown.length > 0) {
    throw new ConfigurationError([`unknown placeholder(s) in S3 base key: ${unknown.join(', ')}`]);
  }
  const expanded = pattern.replace(PLACEHOLDER, (_, name: string) => (isKnownPlaceholder(name) ? values[name] : ''));
  return expanded.replace(/^\/+|\/+$/g, '');
}

