import { describe, it, expect, beforeEach } from 'vitest';
import { Action } from '../models';
import { Key, KeyBuilder, KeysQuery } from '../key';
import { SearchClient } from '../client';
import { createLogger } from '../logger';

describe('KeyBuilder', () => {
  let builder: KeyBuilder;

  beforeEach(() => {
    builder = new KeyBuilder();
  });

  it('should start empty', () => {
    expect(builder.actions).toEqual([]);
    expect(builder.indexes).toEqual([]);
    expect(builder.description).toBeUndefined();
    expect(builder.name).toBeUndefined();
    expect(builder.expiresAt).toBeUndefined();
    expect(builder.toCreatePayload()).toEqual({});
  });

  it('should append actions and keep duplicates', () => {
    builder.withAction(Action.SEARCH).withAction(Action.SEARCH);
    builder.withActions([Action.DOCUMENTS_ADD, Action.SEARCH]);

    expect(builder.actions).toEqual([Action.SEARCH, Action.SEARCH, Action.DOCUMENTS_ADD, Action.SEARCH]);
  });

  it('should accept any iterable of actions', () => {
    builder.withActions(new Set([Action.STATS_GET, Action.VERSION]));
    expect(builder.actions).toEqual([Action.STATS_GET, Action.VERSION]);
  });

  it('should replace indexes with withIndexes', () => {
    builder.withIndexes(['movies', 'books']).withIndexes(['songs']);
    expect(builder.indexes).toEqual(['songs']);
  });

  it('should append an index with withIndex', () => {
    builder.withIndexes(['movies', 'books']).withIndex('songs');
    expect(builder.indexes).toEqual(['movies', 'books', 'songs']);
  });

  it('should replace the expiry', () => {
    builder.withExpiresAt(new Date('2030-01-01T00:00:00.000Z')).withExpiresAt(new Date('2031-01-01T00:00:00.000Z'));
    expect(builder.toCreatePayload().expiresAt).toBe('2031-01-01T00:00:00.000Z');
  });

  it('should build the create payload', () => {
    builder
      .withName('Indexing key')
      .withDescription('Adds documents to movies')
      .withAction(Action.DOCUMENTS_ADD)
      .withIndex('movies')
      .withExpiresAt(new Date('2030-01-01T00:00:00.000Z'));

    expect(JSON.parse(JSON.stringify(builder))).toEqual({
      actions: ['documents.add'],
      description: 'Adds documents to movies',
      name: 'Indexing key',
      expiresAt: '2030-01-01T00:00:00.000Z',
      indexes: ['movies'],
    });
  });
});

describe('Key', () => {
  const key = () =>
    new Key({
      actions: [Action.ALL],
      createdAt: new Date('2024-01-01T00:00:00.000Z'),
      description: 'A',
      indexes: ['*'],
      key: 'test-key',
      updatedAt: new Date('2024-01-01T00:00:00.000Z'),
    });

  it('should set description and name fluently', () => {
    const target = key();
    const returned = target.withDescription('B').withName('renamed');

    expect(returned).toBe(target);
    expect(target.description).toBe('B');
    expect(target.name).toBe('renamed');
  });

  it('should stand in for its secret', () => {
    expect(String(key())).toBe('test-key');
    expect(`${key()}`).toBe('test-key');
  });

  it('should copy the lists it is given', () => {
    const actions = [Action.SEARCH];
    const target = new Key({
      actions,
      createdAt: new Date(),
      indexes: [],
      key: 'test-key',
      updatedAt: new Date(),
    });
    actions.push(Action.VERSION);

    expect(target.actions).toEqual([Action.SEARCH]);
  });
});

describe('KeysQuery', () => {
  const client = new SearchClient({ host: 'http://localhost:7700', logger: createLogger({ level: 'silent' }) });

  it('should send no parameters when none are set', () => {
    const query = new KeysQuery(client);
    expect(query.toParams()).toEqual({});
  });

  it('should overwrite offset and limit', () => {
    const query = new KeysQuery(client).withOffset(10).withLimit(5).withOffset(1).withLimit(2);
    expect(query.toParams()).toEqual({ offset: 1, limit: 2 });
  });

  it('should keep a zero offset', () => {
    expect(new KeysQuery(client).withOffset(0).toParams()).toEqual({ offset: 0 });
  });
});
