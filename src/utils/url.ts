const NETWORK_LOCATION = /^(?:[A-Za-z][A-Za-z0-9+.-]*:)?\/\/[^/?#]/;

/**
 * True when the link names a host (`https://cdn/x.png`, `//cdn/x.png`).
 * `file:///x.png`, `data:...` and plain paths have no host and count as local.
 */
export function hasNetworkLocation(target: string): boolean {
  return NETWORK_LOCATION.test(target);
}

/**
 * Percent-decodes runs of `%XX` escapes. A run that is not valid UTF-8 is kept as written.
 */
export function percentDecode(value: string): string {
  return value.replace(/(?:%[0-9A-Fa-f]{2})+/g, (run) => {
    try {
      return decodeURIComponent(run);
    } catch {
      return run;
    }
  });
}

/**
 * Percent-encodes an object key for use in a URL path. Leaves `/` and the unreserved characters
 * (`A-Z a-z 0-9 _ . - ~`) as they are.
 */
export function quoteKey(key: string): string {
  return key
    .split('/')
    .map((segment) =>
      encodeURIComponent(segment).replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    )
    .join('/');
}
