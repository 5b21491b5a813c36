/** Maps each raw image target to the URL it was uploaded to. */
export type UploadResult = Record<string, string>;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Replaces every occurrence of every raw target with its URL in one pass over the original text.
 * Longer targets win over targets they contain (`./img/a.png` over `img/a.png`), and inserted URLs
 * are never rewritten again. The replacement is literal: `$` sequences in a URL are kept as is.
 */
export function substituteImageRefs(markdown: string, results: UploadResult): string {
  const targets = Object.keys(results)
    .filter((raw) => raw.length > 0)
    .sort((a, b) => b.length - a.length);
  if (targets.length === 0) return markdown;

  const pattern = new RegExp(targets.map(escapeRegExp).join('|'), 'g');
  return markdown.replace(pattern, (match) => results[match] ?? match);
}
