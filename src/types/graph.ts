/**
 * Microsoft Graph API versions
 */
export type GraphVersion = 'beta' | 'v1.0';

export const GRAPH_VERSIONS: readonly GraphVersion[] = ['beta', 'v1.0'];

/**
 * One page of a Graph collection response.
 * Only the cursor and the result container are read; records stay opaque.
 */
export interface GraphPage {
  records: unknown[];
  nextLink: string | null;
}

export type HttpMethod = 'GET' | 'POST';
