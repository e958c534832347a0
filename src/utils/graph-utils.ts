/**
 * Microsoft Graph API Utility Functions
 * Request building, response parsing and error mapping shared by Graph queries
 */

import { GraphRequest } from '@microsoft/microsoft-graph-client';
import { QueryError, toError } from '../services/base/errors';

export interface GraphQueryOptions {
  select?: readonly string[];
  top?: number;
}

export interface GraphPage {
  data: unknown[];
  nextLink?: string;
}

/**
 * Apply $select and $top to a Graph API request
 */
export function buildGraphRequest(
  request: GraphRequest,
  options: GraphQueryOptions
): GraphRequest {
  if (options.select?.length) {
    request = request.select(options.select.join(','));
  }

  if (options.top) {
    request = request.top(options.top);
  }

  return request;
}

/**
 * Parse Graph API response to extract data array and paging links
 */
export function parseGraphResponse(response: unknown): GraphPage {
  if (response === null || response === undefined) {
    return { data: [] };
  }

  if (Array.isArray(response)) {
    return { data: response };
  }

  if (typeof response !== 'object') {
    return { data: [response] };
  }

  // Collection responses wrap items in `value`
  if ('value' in response) {
    const nextLink = readProperty(response, '@odata.nextLink');
    return {
      data: Array.isArray(response.value) ? response.value : [],
      nextLink: typeof nextLink === 'string' && nextLink ? nextLink : undefined
    };
  }

  return { data: [response] };
}

const GRAPH_ERROR_MESSAGES: Record<string, string> = {
  Request_ResourceNotFound: 'Resource not found',
  Authorization_RequestDenied: 'Insufficient permissions to perform this operation',
  Request_UnsupportedQuery: 'The query is not supported',
  InvalidAuthenticationToken: 'Authentication token is invalid or expired',
  Request_Timeout: 'Request timed out'
};

/**
 * Map a Graph client error onto a QueryError with a short message
 */
export function mapGraphError(error: unknown): QueryError {
  const cause = toError(error);
  const code = readProperty(error, 'code');
  if (typeof code === 'string' && GRAPH_ERROR_MESSAGES[code]) {
    return new QueryError(GRAPH_ERROR_MESSAGES[code], cause);
  }

  const statusCode = readProperty(error, 'statusCode');
  const detail = cause.message && cause.message !== '[object Object]' ? cause.message : 'Unknown Graph API error';
  const prefix = typeof statusCode === 'number' && statusCode > 0
    ? `Graph API error (${statusCode})`
    : 'Graph API error';

  return new QueryError(`${prefix}: ${detail}`, cause);
}

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  return Reflect.get(value, key);
}

/**
 * Common Graph API endpoints
 */
export const GRAPH_ENDPOINTS = {
  APPLICATIONS: '/applications'
} as const;

/**
 * Common select fields for different entity types
 */
export const GRAPH_SELECT_FIELDS = {
  APPLICATION_CREDENTIALS: [
    'id',
    'appId',
    'displayName',
    'tags',
    'passwordCredentials'
  ]
} as const;
