/**
 * Path Pattern Utilities
 *
 * Patterns are `/`-delimited templates; a segment written `{name}` is a
 * wildcard that matches any single path segment and binds it to `name`.
 */

export type PatternParams = Record<string, string>;

/**
 * Split a path or pattern into its segments.
 * Empty segments are kept, so `/a/` has three segments.
 */
export function splitSegments(path: string): string[] {
  return path.split('/');
}

/**
 * Check whether a pattern segment is a wildcard
 */
export function isWildcard(segment: string): boolean {
  return segment.startsWith('{') && segment.endsWith('}');
}

/**
 * Name bound by a wildcard segment (`{id}` -> `id`)
 */
export function wildcardName(segment: string): string {
  return segment.slice(1, -1);
}

/**
 * Strip the query suffix from a path
 */
export function stripQuery(path: string): string {
  const idx = path.indexOf('?');
  return idx < 0 ? path : path.slice(0, idx);
}

/**
 * Test whether a path is structurally compatible with a pattern:
 * same segment count, and every segment either a wildcard or equal.
 */
export function compare(path: string, pattern: string): boolean {
  const pathSegments = splitSegments(path);
  const patternSegments = splitSegments(pattern);

  if (pathSegments.length !== patternSegments.length) {
    return false;
  }

  return patternSegments.every(
    (segment, i) => isWildcard(segment) || segment === pathSegments[i]
  );
}

/**
 * Bind each wildcard in the pattern to the path segment at its position.
 * Values are taken verbatim, never URL-decoded.
 */
export function extract(path: string, pattern: string): PatternParams {
  const pathSegments = splitSegments(path);
  const params: PatternParams = Object.create(null);

  splitSegments(pattern).forEach((segment, i) => {
    if (i < pathSegments.length && isWildcard(segment)) {
      params[wildcardName(segment)] = pathSegments[i];
    }
  });

  return params;
}
