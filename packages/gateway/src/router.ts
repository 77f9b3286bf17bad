/**
 * Router -- maps method + path patterns to JSON handlers.
 *
 * Patterns use `:name` segments (e.g. `/connections/:id`). The first route
 * whose method and pattern match wins; params are URI-decoded.
 */

export interface RouteRequest {
  params: Record<string, string>;
  query: URLSearchParams;
  /** Parsed JSON body, or undefined when the request had none. */
  body: unknown;
}

export interface RouteResponse {
  status: number;
  body: unknown;
}

export type RouteHandler = (req: RouteRequest) => RouteResponse | Promise<RouteResponse>;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

interface Route {
  method: HttpMethod;
  segments: string[];
  handler: RouteHandler;
}

export interface RouteMatch {
  handler: RouteHandler;
  params: Record<string, string>;
}

export class Router {
  private readonly routes: Route[] = [];

  add(method: HttpMethod, pattern: string, handler: RouteHandler): this {
    this.routes.push({ method, segments: splitPath(pattern), handler });
    return this;
  }

  /**
   * Find the handler for a request. Returns `'method-not-allowed'` when the
   * path is known under a different method, null when it is unknown.
   */
  match(method: string, pathname: string): RouteMatch | 'method-not-allowed' | null {
    const segments = splitPath(pathname);
    let pathKnown = false;

    for (const route of this.routes) {
      const params = matchSegments(route.segments, segments);
      if (!params) continue;
      if (route.method === method) {
        return { handler: route.handler, params };
      }
      pathKnown = true;
    }

    return pathKnown ? 'method-not-allowed' : null;
  }
}

// ---------------------------------------------------------------------------
// Private helpers
// ---------------------------------------------------------------------------

function splitPath(path: string): string[] {
  return path.split('/').filter((s) => s.length > 0);
}

function matchSegments(pattern: string[], actual: string[]): Record<string, string> | null {
  if (pattern.length !== actual.length) return null;

  const params: Record<string, string> = {};
  for (let i = 0; i < pattern.length; i++) {
    const expected = pattern[i];
    const value = actual[i];
    if (expected === undefined || value === undefined) return null;

    if (expected.startsWith(':')) {
      params[expected.slice(1)] = decodeURIComponent(value);
    } else if (expected !== value) {
      return null;
    }
  }
  return params;
}
