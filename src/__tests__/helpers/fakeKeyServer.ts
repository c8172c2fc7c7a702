/**
 * In-process stand-in for the /keys routes, used as the client's fetch.
 */
import { z } from 'zod';
import type { FetchLike } from '../../client';
import { isAction } from '../../models';

export interface StoredKey {
  uid: string;
  key: string;
  actions: string[];
  indexes: string[];
  description: string | null;
  name: string | null;
  expiresAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface RecordedRequest {
  method: string;
  pathname: string;
  search: string;
  headers: Record<string, string>;
  body: unknown;
}

export interface FakeKeyServer {
  fetch: FetchLike;
  keys: StoredKey[];
  requests: RecordedRequest[];
  /** Insert a key directly, bypassing the API */
  seed(fields?: Partial<Omit<StoredKey, 'uid' | 'key' | 'createdAt' | 'updatedAt'>>): StoredKey;
}

const writeBodySchema = z.object({
  actions: z.array(z.string()).optional(),
  indexes: z.array(z.string()).optional(),
  description: z.string().optional(),
  name: z.string().optional(),
  expiresAt: z.string().optional(),
});

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function notFound(identifier: string): Response {
  return json(
    {
      message: `API key \`${identifier}\` not found.`,
      code: 'api_key_not_found',
      type: 'invalid_request',
      link: 'https://docs.example.test/errors#api_key_not_found',
    },
    404
  );
}

function badRequest(message: string, code: string): Response {
  return json({ message, code, type: 'invalid_request', link: `https://docs.example.test/errors#${code}` }, 400);
}

function toHeaderRecord(headers: RequestInit['headers']): Record<string, string> {
  const record: Record<string, string> = {};
  new Headers(headers).forEach((value, name) => {
    record[name] = value;
  });
  return record;
}

/**
 * The clock starts at 2024-01-01T00:00:00.000Z and moves one second on every
 * write, so successive timestamps always differ.
 */
export function createFakeKeyServer(): FakeKeyServer {
  const keys: StoredKey[] = [];
  const requests: RecordedRequest[] = [];
  let clock = Date.parse('2024-01-01T00:00:00.000Z');
  let sequence = 0;

  const tick = (): string => {
    clock += 1000;
    return new Date(clock).toISOString();
  };

  const insert = (fields: Partial<Omit<StoredKey, 'uid' | 'key' | 'createdAt' | 'updatedAt'>>): StoredKey => {
    sequence += 1;
    const now = tick();
    const stored: StoredKey = {
      uid: `uid-${sequence}`,
      key: `test-key-${sequence}`,
      actions: fields.actions ?? [],
      indexes: fields.indexes ?? [],
      description: fields.description ?? null,
      name: fields.name ?? null,
      expiresAt: fields.expiresAt ?? null,
      createdAt: now,
      updatedAt: now,
    };
    keys.push(stored);
    return stored;
  };

  const find = (identifier: string): StoredKey | undefined =>
    keys.find((candidate) => candidate.key === identifier || candidate.uid === identifier);

  const fetch: FetchLike = async (input, init) => {
    const url = new URL(input);
    const method = init?.method ?? 'GET';
    const rawBody: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
    requests.push({
      method,
      pathname: url.pathname,
      search: url.search,
      headers: toHeaderRecord(init?.headers),
      body: rawBody,
    });

    if (url.pathname === '/keys') {
      if (method === 'GET') {
        const offset = Number(url.searchParams.get('offset') ?? '0');
        const limit = Number(url.searchParams.get('limit') ?? '20');
        return json({ results: keys.slice(offset, offset + limit), offset, limit, total: keys.length });
      }
      if (method === 'POST') {
        const parsed = writeBodySchema.safeParse(rawBody);
        if (!parsed.success) {
          return badRequest('Malformed key payload.', 'bad_request');
        }
        const unknownAction = (parsed.data.actions ?? []).find((action) => !isAction(action));
        if (unknownAction !== undefined) {
          return badRequest(`Unknown value \`${unknownAction}\` at \`.actions[0]\`.`, 'invalid_api_key_actions');
        }
        return json(insert(parsed.data), 201);
      }
    }

    const match = /^\/keys\/([^/]+)$/.exec(url.pathname);
    if (match) {
      const identifier = decodeURIComponent(match[1] ?? '');
      const stored = find(identifier);
      if (!stored) {
        return notFound(identifier);
      }
      if (method === 'GET') {
        return json(stored);
      }
      if (method === 'PATCH') {
        const parsed = writeBodySchema.safeParse(rawBody);
        if (!parsed.success) {
          return badRequest('Malformed key payload.', 'bad_request');
        }
        stored.description = parsed.data.description ?? stored.description;
        stored.name = parsed.data.name ?? stored.name;
        stored.updatedAt = tick();
        return json(stored);
      }
      if (method === 'DELETE') {
        keys.splice(keys.indexOf(stored), 1);
        return new Response(null, { status: 204 });
      }
    }

    return json({ message: `Route ${method} ${url.pathname} not found.`, code: 'not_found' }, 404);
  };

  return { fetch, keys, requests, seed: (fields = {}) => insert(fields) };
}
