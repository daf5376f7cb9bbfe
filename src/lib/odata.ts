/**
 * OData Query Builder Module
 * Builds Microsoft Graph request URLs and OData query parameters
 */

import type { GraphVersion } from '../types/graph.js';

export const GRAPH_BASE_URL = 'https://graph.microsoft.com';

/** Default `$top` used when a caller asks for paged reads without a size */
export const DEFAULT_PAGE_SIZE = 500;

export type QueryValue = string | number | boolean;

/**
 * OData query hints accepted by `fetchAll`
 */
export interface GraphQueryOptions {
  top?: number;
  orderby?: string;
  filter?: string;
}

/**
 * Build an absolute URL from a base host, an API version, a resource path and
 * query parameters. The base's own path and query are replaced.
 * @example buildUrl('https://graph.microsoft.com', 'v1.0', 'users', { $top: 10 })
 *          => "https://graph.microsoft.com/v1.0/users?%24top=10"
 */
export function buildUrl(
  base: string,
  version: GraphVersion | string,
  path: string,
  params: Record<string, QueryValue>
): string {
  const url = new URL(base);
  url.pathname = `${version}/${path}`;
  url.search = toSearchParams(params).toString();
  url.hash = '';
  return url.toString();
}

/**
 * Merge query parameters into an existing absolute URL.
 * Keys already present are overwritten.
 */
export function appendQuery(target: string, query: Record<string, QueryValue>): string {
  const url = new URL(target);
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/**
 * Build the `$top` / `$orderby` / `$filter` map, in that order.
 * Empty hints (undefined, 0, '') are left out.
 */
export function buildGraphQuery(options: GraphQueryOptions): Record<string, QueryValue> {
  const query: Record<string, QueryValue> = {};

  if (options.top) {
    query['$top'] = options.top;
  }

  if (options.orderby) {
    query['$orderby'] = options.orderby;
  }

  if (options.filter) {
    query['$filter'] = options.filter;
  }

  return query;
}

function toSearchParams(params: Record<string, QueryValue>): URLSearchParams {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    search.append(key, String(value));
  }
  return search;
}
