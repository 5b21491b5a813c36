import type { BatchResult } from '../batch/processBatch.js';

const RULE = '-'.repeat(30);

export function countReplacedImages(result: BatchResult): number {
  return result.succeeded.reduce((sum, doc) => sum + Object.keys(doc.images).length, 0);
}

/** Plain-text report printed after a batch: successes, then failures with their error text. */
export function formatBatchSummary(result: BatchResult): string {
  const lines: string[] = ['Successful jobs:'];
  if (result.succeeded.length === 0) lines.push('\t-');
  for (const doc of result.succeeded) {
    lines.push(`\t${doc.file}`);
  }

  lines.push(RULE, 'Errored jobs:');
  if (result.failed.length === 0) lines.push('\t-');
  for (const doc of result.failed) {
    lines.push(`\t**${doc.file}**: ${doc.message}`);
  }

  lines.push('', `Replaced ${countReplacedImages(result)} images`);
  return lines.join('\n') + '\n';
}
