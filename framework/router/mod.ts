/**
 * Routing Layer
 *
 * Maps (method, path) pairs to handlers and extracts wildcard
 * parameters from the path.
 */

export { Router, type RouteDefinition, type RouteMatch } from './router.ts';
export {
  compare,
  extract,
  isWildcard,
  splitSegments,
  stripQuery,
  type PatternParams,
} from './patterns.ts';
