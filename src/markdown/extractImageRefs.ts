import { hasNetworkLocation } from '../utils/url.js';

/**
 * `![alt](target)`. Both captures are lazy and `.` stops at line ends, so a `)` inside alt text or
 * inside the target ends the match early. Targets with a `"title"` part keep it in the capture.
 */
const IMAGE_PATTERN = /!\[(?:.*?)\]\((.*?)\)/g;

/**
 * Distinct local image targets of a markdown text, in order of first appearance.
 * Targets that name a host, and empty targets, are left alone.
 */
export function extractImageRefs(markdown: string): string[] {
  const refs = new Set<string>();
  for (const match of markdown.matchAll(IMAGE_PATTERN)) {
    const target = match[1] ?? '';
    if (!target || hasNetworkLocation(target)) continue;
    refs.add(target);
  }
  return [...refs];
}
