import { HttpMethod, RouteAccess } from "./types";

export interface RouteDefinition<TContext, TResult> {
  name: string;
  method: HttpMethod;
  pattern: RegExp;
  access: RouteAccess;
  handler: (context: TContext, params: string[]) => TResult;
}

export interface RouteMatch<TContext, TResult> {
  route: RouteDefinition<TContext, TResult>;
  params: string[];
}

/**
 * Evaluates the table top to bottom and returns the first entry whose method and
 * path pattern both match. Captured groups are returned still percent-encoded.
 */
export function matchRoute<TContext, TResult>(
  routes: ReadonlyArray<RouteDefinition<TContext, TResult>>,
  method: string,
  pathname: string,
): RouteMatch<TContext, TResult> | null {
  const normalizedMethod = method.toUpperCase();

  for (const route of routes) {
    if (route.method !== normalizedMethod) {
      continue;
    }

    const match = pathname.match(route.pattern);
    if (!match) {
      continue;
    }

    return {
      route,
      params: match.slice(1),
    };
  }

  return null;
}

/**
 * Drops the query string and any trailing slash (root excepted).
 */
export function normalizePathname(path: string): string {
  const queryIndex = path.search(/[?#]/);
  const withoutQuery = queryIndex >= 0 ? path.slice(0, queryIndex) : path;
  const withLeadingSlash = withoutQuery.startsWith("/") ? withoutQuery : `/${withoutQuery}`;

  if (withLeadingSlash.length > 1 && withLeadingSlash.endsWith("/")) {
    return withLeadingSlash.replace(/\/+$/, "") || "/";
  }

  return withLeadingSlash;
}

/**
 * Decodes a captured path segment. Throws `URIError` on malformed escapes.
 */
export function decodePathParam(raw: string | undefined, label: string): string {
  if (raw === undefined) {
    throw new Error(`Missing path parameter '${label}'.`);
  }

  return decodeURIComponent(raw);
}
