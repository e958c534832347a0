/**
 * Microsoft Graph API Query Types and Interfaces
 */

import { GraphQueryOptions } from '../../utils/graph-utils';

export interface GraphQueryDefinition {
  id: string;
  name: string;
  description: string;

  // Graph API query configuration
  query: GraphQueryOptions & {
    endpoint: string;                    // Graph API endpoint (e.g., '/applications')
    apiVersion?: 'v1.0' | 'beta';       // API version, defaults to v1.0
  };

  pagination?: {
    maxPages: number;                   // Upper bound on @odata.nextLink requests
  };
}

// Common Graph API response types

export interface GraphPasswordCredential {
  keyId?: string | null;
  endDateTime?: string | null;
}

export interface GraphApplication {
  id: string;
  appId?: string | null;
  displayName?: string | null;
  tags: string[];
  passwordCredentials: GraphPasswordCredential[];
}

// Normalizers for raw Graph payloads

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null | undefined {
  if (value === null) return null;
  return typeof value === 'string' ? value : undefined;
}

/**
 * Normalize a raw password credential; anything that is not an object is dropped
 */
export function toGraphPasswordCredential(raw: unknown): GraphPasswordCredential | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  return {
    keyId: optionalString(raw.keyId),
    endDateTime: optionalString(raw.endDateTime)
  };
}

/**
 * Normalize a raw application registration. Missing tag and credential
 * collections become empty arrays; non-string tags are ignored.
 */
export function toGraphApplication(raw: unknown): GraphApplication | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }

  const tags = Array.isArray(raw.tags)
    ? raw.tags.filter((tag): tag is string => typeof tag === 'string')
    : [];

  const passwordCredentials = Array.isArray(raw.passwordCredentials)
    ? raw.passwordCredentials
        .map(toGraphPasswordCredential)
        .filter((cred): cred is GraphPasswordCredential => cred !== undefined)
    : [];

  return {
    id: typeof raw.id === 'string' ? raw.id : '',
    appId: optionalString(raw.appId),
    displayName: optionalString(raw.displayName),
    tags,
    passwordCredentials
  };
}
