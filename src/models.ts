/**
 * Search Keys SDK - Models
 *
 * Type definitions for the keys resource.
 */

import { InvalidResponseError } from './exceptions';
import type { Key } from './key';

// =============================================================================
// Enums
// =============================================================================

/**
 * Permission scopes a key may grant. Values are the wire tokens.
 */
export enum Action {
  /** Access to every route */
  ALL = '*',
  /** Search routes (GET and POST) on authorized indexes */
  SEARCH = 'search',
  DOCUMENTS_ADD = 'documents.add',
  DOCUMENTS_GET = 'documents.get',
  DOCUMENTS_DELETE = 'documents.delete',
  INDEXES_CREATE = 'indexes.create',
  /** Non-authorized indexes are omitted from index listings */
  INDEXES_GET = 'indexes.get',
  INDEXES_UPDATE = 'indexes.update',
  INDEXES_DELETE = 'indexes.delete',
  /** Tasks of non-authorized indexes are omitted */
  TASKS_GET = 'tasks.get',
  SETTINGS_GET = 'settings.get',
  SETTINGS_UPDATE = 'settings.update',
  STATS_GET = 'stats.get',
  /** Not restricted by indexes */
  DUMPS_CREATE = 'dumps.create',
  /** Not restricted by indexes */
  DUMPS_GET = 'dumps.get',
  VERSION = 'version',
}

const actionTokens: ReadonlySet<string> = new Set(Object.values(Action));

export function isAction(value: unknown): value is Action {
  return typeof value === 'string' && actionTokens.has(value);
}

/**
 * Map a wire token to its {@link Action}. Unknown tokens are rejected.
 */
export function parseAction(token: string): Action {
  if (isAction(token)) {
    return token;
  }
  throw new InvalidResponseError(`Unknown action token: "${token}"`);
}

// =============================================================================
// Keys
// =============================================================================

/**
 * Fields of a key as held in memory.
 */
export interface KeyData {
  actions: Action[];
  createdAt: Date;
  description?: string;
  name?: string;
  /** Absent when the key never expires */
  expiresAt?: Date;
  indexes: string[];
  key: string;
  uid?: string;
  updatedAt: Date;
}

/**
 * Outbound body of create and update requests.
 *
 * Server-managed fields (`key`, `uid`, `createdAt`, `updatedAt`) have no place
 * here, and empty lists are left out.
 */
export interface KeyWritePayload {
  actions?: Action[];
  description?: string;
  name?: string;
  /** RFC3339 timestamp */
  expiresAt?: string;
  indexes?: string[];
}

export type KeyCreatePayload = KeyWritePayload;

export type KeyUpdatePayload = KeyWritePayload;

/**
 * A key secret, a key uid, or a {@link Key} standing in for its secret.
 */
export type KeyIdentifier = string | Key;

// =============================================================================
// Listing
// =============================================================================

export interface KeysQueryParams {
  /** Number of keys to skip (server default: 0) */
  offset?: number;
  /** Maximum number of keys returned (server default: 20) */
  limit?: number;
}

export interface KeysResults {
  results: Key[];
  limit: number;
  offset: number;
  /** Total number of keys, when the server reports it */
  total?: number;
}
