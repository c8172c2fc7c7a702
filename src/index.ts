/**
 * Search Keys SDK
 *
 * Typed client for the API key routes of a search engine service.
 *
 * @example
 * ```typescript
 * import { SearchClient, KeyBuilder, Action } from 'search-keys-sdk';
 *
 * const client = new SearchClient({ host: 'http://localhost:7700', apiKey: 'masterKey' });
 *
 * const key = await new KeyBuilder()
 *   .withActions([Action.SEARCH, Action.DOCUMENTS_GET])
 *   .withIndexes(['movies', 'books'])
 *   .execute(client);
 * ```
 *
 * @packageDocumentation
 */

// Main client
export { SearchClient, VERSION } from './client';
export type { SearchClientConfig, RequestOptions, FetchLike, QueryParams } from './client';

// Keys
export { Key, KeyBuilder, KeysQuery } from './key';

// Models
export * from './models';

// Resources
export { KeysResource } from './resources/keys';

// Exceptions
export * from './exceptions';

// Configuration and logging
export { loadConfig } from './config';
export type { Config, LogLevel } from './config';
export { createLogger } from './logger';
export type { Logger, LoggerOptions } from './logger';
