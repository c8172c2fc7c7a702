import type { SearchClient } from '../client';
import { Key, KeyBuilder, KeysQuery } from '../key';
import type { KeyIdentifier, KeysQueryParams, KeysResults } from '../models';
import { decode, keysResultsResponseSchema } from '../schemas';

function keyPath(keyOrUid: KeyIdentifier): string {
  const identifier = typeof keyOrUid === 'string' ? keyOrUid : keyOrUid.key;
  return `/keys/${encodeURIComponent(identifier)}`;
}

export class KeysResource {
  constructor(private readonly client: SearchClient) {}

  async list(query: KeysQuery | KeysQueryParams = {}): Promise<KeysResults> {
    const params = query instanceof KeysQuery ? query.toParams() : query;
    const payload = await this.client.request({
      method: 'GET',
      path: '/keys',
      params: { offset: params.offset, limit: params.limit },
    });
    const decoded = decode(keysResultsResponseSchema, payload, 'keys list');
    return {
      results: decoded.results.map((result) => Key.fromDecoded(result)),
      limit: decoded.limit,
      offset: decoded.offset,
      ...(decoded.total !== undefined ? { total: decoded.total } : {}),
    };
  }

  async get(keyOrUid: KeyIdentifier): Promise<Key> {
    const payload = await this.client.request({ method: 'GET', path: keyPath(keyOrUid) });
    return Key.fromResponse(payload);
  }

  async create(builder: KeyBuilder): Promise<Key> {
    const payload = await this.client.request({ method: 'POST', path: '/keys', body: builder.toCreatePayload() });
    return Key.fromResponse(payload);
  }

  async update(key: Key): Promise<Key> {
    const payload = await this.client.request({ method: 'PATCH', path: keyPath(key), body: key.toUpdatePayload() });
    return Key.fromResponse(payload);
  }

  async delete(keyOrUid: KeyIdentifier): Promise<void> {
    await this.client.request({ method: 'DELETE', path: keyPath(keyOrUid) });
  }
}
