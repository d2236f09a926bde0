/**
 * URL helpers for heading and pagination links.
 */

const PLACEHOLDER_ORIGIN = 'http://carpenter.invalid';

/**
 * Return `url` with the given query parameters set (null removes one).
 * Relative URLs stay relative; existing parameters keep their order.
 */
export function withQuery(url: string, params: Record<string, string | null>): string {
  const parsed = new URL(url, PLACEHOLDER_ORIGIN);

  for (const [name, value] of Object.entries(params)) {
    if (value === null) {
      parsed.searchParams.delete(name);
    } else {
      parsed.searchParams.set(name, value);
    }
  }

  if (parsed.origin === PLACEHOLDER_ORIGIN && !url.startsWith(PLACEHOLDER_ORIGIN)) {
    return `${parsed.pathname}${parsed.search}${parsed.hash}`;
  }
  return parsed.toString();
}
