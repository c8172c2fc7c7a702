/**
 * Search Keys SDK - Keys
 *
 * The {@link Key} read model, the {@link KeyBuilder} used to create keys and
 * the {@link KeysQuery} used to page through them.
 */

import type { SearchClient } from './client';
import type {
  Action,
  KeyCreatePayload,
  KeyData,
  KeysQueryParams,
  KeysResults,
  KeyUpdatePayload,
  KeyWritePayload,
} from './models';
import { decode, keyResponseSchema, type KeyResponse } from './schemas';

interface WritableKeyFields {
  actions: readonly Action[];
  description?: string;
  name?: string;
  expiresAt?: Date;
  indexes: readonly string[];
}

function toWritePayload(fields: WritableKeyFields): KeyWritePayload {
  const payload: KeyWritePayload = {};
  if (fields.actions.length > 0) {
    payload.actions = [...fields.actions];
  }
  if (fields.description !== undefined) {
    payload.description = fields.description;
  }
  if (fields.name !== undefined) {
    payload.name = fields.name;
  }
  if (fields.expiresAt !== undefined) {
    payload.expiresAt = fields.expiresAt.toISOString();
  }
  if (fields.indexes.length > 0) {
    payload.indexes = [...fields.indexes];
  }
  return payload;
}

/**
 * An API key as returned by the server.
 *
 * A `Key` can be passed anywhere a key identifier is expected; its string form
 * is the key secret.
 *
 * @example
 * ```typescript
 * const key = await client.getKey('my-key-uid');
 * key.withDescription('Front-end search key');
 * const updated = await key.update(client);
 * ```
 */
export class Key implements KeyData {
  public actions: Action[];
  public readonly createdAt: Date;
  public description?: string;
  public name?: string;
  public expiresAt?: Date;
  public indexes: string[];
  public readonly key: string;
  public readonly uid?: string;
  public readonly updatedAt: Date;

  constructor(data: KeyData) {
    this.actions = [...data.actions];
    this.createdAt = data.createdAt;
    this.description = data.description;
    this.name = data.name;
    this.expiresAt = data.expiresAt;
    this.indexes = [...data.indexes];
    this.key = data.key;
    this.uid = data.uid;
    this.updatedAt = data.updatedAt;
  }

  /**
   * Build a key from a raw server payload.
   *
   * @throws {InvalidResponseError} If the payload is not a valid key
   */
  static fromResponse(payload: unknown): Key {
    return Key.fromDecoded(decode(keyResponseSchema, payload, 'key'));
  }

  /** @internal */
  static fromDecoded(decoded: KeyResponse): Key {
    return new Key({
      actions: decoded.actions,
      createdAt: decoded.createdAt,
      description: decoded.description ?? undefined,
      name: decoded.name ?? undefined,
      expiresAt: decoded.expiresAt ?? undefined,
      indexes: decoded.indexes,
      key: decoded.key,
      uid: decoded.uid ?? undefined,
      updatedAt: decoded.updatedAt,
    });
  }

  withDescription(description: string): this {
    this.description = description;
    return this;
  }

  withName(name: string): this {
    this.name = name;
    return this;
  }

  /**
   * Send the local description/name (and the other writable fields) to the
   * server.
   *
   * @returns The key as stored after the update
   */
  async update(client: SearchClient): Promise<Key> {
    return client.updateKey(this);
  }

  /**
   * Delete this key on the server. The local object is left as is.
   */
  async delete(client: SearchClient): Promise<void> {
    await client.deleteKey(this);
  }

  toUpdatePayload(): KeyUpdatePayload {
    return toWritePayload(this);
  }

  toJSON(): KeyUpdatePayload {
    return this.toUpdatePayload();
  }

  toString(): string {
    return this.key;
  }
}

/**
 * Request for a new key. Holds only the fields a client may set.
 *
 * @example
 * ```typescript
 * const key = await new KeyBuilder()
 *   .withAction(Action.DOCUMENTS_ADD)
 *   .withIndex('movies')
 *   .withExpiresAt(new Date('2030-01-01T00:00:00Z'))
 *   .execute(client);
 * ```
 */
export class KeyBuilder {
  public actions: Action[] = [];
  public description?: string;
  public name?: string;
  public expiresAt?: Date;
  public indexes: string[] = [];

  /**
   * Add actions to the ones already declared. Duplicates are kept.
   */
  withActions(actions: Iterable<Action>): this {
    this.actions.push(...actions);
    return this;
  }

  withAction(action: Action): this {
    this.actions.push(action);
    return this;
  }

  withExpiresAt(expiresAt: Date): this {
    this.expiresAt = expiresAt;
    return this;
  }

  /**
   * Replace the indexes the key is scoped to.
   */
  withIndexes(indexes: Iterable<string>): this {
    this.indexes = Array.from(indexes);
    return this;
  }

  withIndex(index: string): this {
    this.indexes.push(index);
    return this;
  }

  withDescription(description: string): this {
    this.description = description;
    return this;
  }

  withName(name: string): this {
    this.name = name;
    return this;
  }

  /**
   * Create the key on the server.
   *
   * @returns The new key, carrying its secret and timestamps
   */
  async execute(client: SearchClient): Promise<Key> {
    return client.createKey(this);
  }

  toCreatePayload(): KeyCreatePayload {
    return toWritePayload(this);
  }

  toJSON(): KeyCreatePayload {
    return this.toCreatePayload();
  }
}

/**
 * Paginated listing of keys.
 *
 * @example
 * ```typescript
 * const page = await new KeysQuery(client).withOffset(20).withLimit(10).execute();
 * ```
 */
export class KeysQuery {
  public offset?: number;
  public limit?: number;

  constructor(public readonly client: SearchClient) {}

  withOffset(offset: number): this {
    this.offset = offset;
    return this;
  }

  withLimit(limit: number): this {
    this.limit = limit;
    return this;
  }

  /**
   * Query parameters for the set fields only.
   */
  toParams(): KeysQueryParams {
    const params: KeysQueryParams = {};
    if (this.offset !== undefined) {
      params.offset = this.offset;
    }
    if (this.limit !== undefined) {
      params.limit = this.limit;
    }
    return params;
  }

  async execute(): Promise<KeysResults> {
    return this.client.executeGetKeys(this);
  }
}
