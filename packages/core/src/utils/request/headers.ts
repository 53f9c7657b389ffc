import type { HttpHeaders } from '@session-guard/models';

/**
 * Looks up a header value by name, ignoring letter case.
 * @param headers - Header mapping to search
 * @param name - Header name in any case
 * @returns The value, or undefined when the header is absent
 * @public
 */
export function getHeader(headers: HttpHeaders, name: string): string | undefined {
  const target = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === target) {
      return value;
    }
  }
  return undefined;
}

/**
 * Returns a new header mapping with `additions` applied. An existing header
 * whose name matches an addition in any case is replaced.
 * @public
 */
export function mergeHeaders(
  headers: HttpHeaders,
  additions: Readonly<Record<string, string>>,
): HttpHeaders {
  const replaced = new Set(Object.keys(additions).map((name) => name.toLowerCase()));
  const merged: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (!replaced.has(key.toLowerCase())) {
      merged[key] = value;
    }
  }
  return Object.freeze({ ...merged, ...additions });
}
