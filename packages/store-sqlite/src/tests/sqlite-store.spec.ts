import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  ContactService,
  InMemoryContactStore,
  NotFoundError,
  StoreUnavailableError,
} from '@rolodex/core';
import { SqliteContactStore } from '../sqlite-store.js';

const base = {
  last_name: 'Doe',
  phone_number: '555-0000',
};

describe('SqliteContactStore', () => {
  let store: SqliteContactStore;

  beforeEach(() => {
    store = new SqliteContactStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  describe('insert / findById', () => {
    it('should assign ids and default the address to null', async () => {
      const a = await store.insert({ ...base, first_name: 'A', email: 'a@example.com' });
      const b = await store.insert({ ...base, first_name: 'B', email: 'b@example.com', address: 'Elm St' });

      expect(a).toEqual({ id: 1, ...base, first_name: 'A', email: 'a@example.com', address: null });
      expect(b.id).toBe(2);
      expect(b.address).toBe('Elm St');
    });

    it('should read back what was written', async () => {
      const created = await store.insert({ ...base, first_name: 'A', email: 'a@example.com' });

      expect(await store.findById(created.id)).toEqual(created);
      expect(await store.findById(999)).toBeNull();
    });

    it('should store values exactly as supplied', async () => {
      const created = await store.insert({ ...base, first_name: ' Mixed Case ', email: 'MiXeD@Example.com' });

      expect((await store.findById(created.id))?.first_name).toBe(' Mixed Case ');
      expect((await store.findById(created.id))?.email).toBe('MiXeD@Example.com');
    });
  });

  describe('list', () => {
    it('should page in insertion order', async () => {
      for (const name of ['A', 'B', 'C']) {
        await store.insert({ ...base, first_name: name, email: `${name.toLowerCase()}@example.com` });
      }

      const page = await store.list({ skip: 1, limit: 1 });
      expect(page.map((c) => c.first_name)).toEqual(['B']);
      expect((await store.list({ skip: 0, limit: 2 })).map((c) => c.first_name)).toEqual(['A', 'B']);
      expect(await store.list({ skip: 5, limit: 10 })).toEqual([]);
    });

    it('should match the search case-insensitively on names or email', async () => {
      const foo = await store.insert({ ...base, first_name: 'Foo', email: 'f@example.com' });
      const xoo = await store.insert({ ...base, first_name: 'Xena', email: 'xoo@y.com' });
      const doolittle = await store.insert({ ...base, first_name: 'Eliza', last_name: 'DOOLITTLE', email: 'e@example.com' });
      await store.insert({ ...base, first_name: 'Bar', last_name: 'Baz', email: 'bar@baz.com' });

      expect(await store.list({ skip: 0, limit: 100, search: 'oo' })).toEqual([foo, xoo, doolittle]);
      expect(await store.list({ skip: 0, limit: 100, search: 'OO' })).toEqual([foo, xoo, doolittle]);
    });

    it('should fold non-ASCII letters the same way as the in-memory store', async () => {
      const emile = await store.insert({ ...base, first_name: 'Émile', email: 'e@example.com' });
      await store.insert({ ...base, first_name: 'Emily', email: 'em@example.com' });
      const memory = new InMemoryContactStore();
      await memory.insert({ ...base, first_name: 'Émile', email: 'e@example.com' });
      await memory.insert({ ...base, first_name: 'Emily', email: 'em@example.com' });

      for (const search of ['Émile', 'éMILE', 'ÉMILE']) {
        expect(await store.list({ skip: 0, limit: 100, search })).toEqual([emile]);
        expect(await memory.list({ skip: 0, limit: 100, search })).toEqual([emile]);
      }
    });

    it('should apply skip and limit after the search', async () => {
      await store.insert({ ...base, first_name: 'Foo', email: 'f@example.com' });
      await store.insert({ ...base, first_name: 'Bar', email: 'b@example.com' });
      const second = await store.insert({ ...base, first_name: 'Boo', email: 'boo@example.com' });

      expect(await store.list({ skip: 1, limit: 5, search: 'oo' })).toEqual([second]);
    });

    it('should treat wildcard characters literally', async () => {
      const underscored = await store.insert({ ...base, first_name: 'Under_Score', email: 'u@example.com' });
      await store.insert({ ...base, first_name: 'Plain', email: 'p@example.com' });

      expect(await store.list({ skip: 0, limit: 100, search: '_' })).toEqual([underscored]);
      expect(await store.list({ skip: 0, limit: 100, search: '%' })).toEqual([]);
    });
  });

  describe('update', () => {
    it('should merge supplied fields and persist the result', async () => {
      const created = await store.insert({
        first_name: 'A',
        last_name: 'B',
        email: 'a@b.com',
        phone_number: '1',
        address: 'Old Road',
      });

      const updated = await store.update(created.id, { first_name: 'Z', address: null });

      expect(updated).toEqual({ ...created, first_name: 'Z', address: null });
      expect(await store.findById(created.id)).toEqual(updated);
    });

    it('should return null for an unknown id', async () => {
      expect(await store.update(42, { first_name: 'Z' })).toBeNull();
    });
  });

  describe('remove', () => {
    it('should return the prior state and delete the row', async () => {
      const created = await store.insert({ ...base, first_name: 'A', email: 'a@example.com' });

      expect(await store.remove(created.id)).toEqual(created);
      expect(await store.findById(created.id)).toBeNull();
      expect(await store.remove(created.id)).toBeNull();
    });

    it('should not reuse the id of a deleted contact', async () => {
      const first = await store.insert({ ...base, first_name: 'A', email: 'a@example.com' });
      await store.remove(first.id);
      const second = await store.insert({ ...base, first_name: 'B', email: 'b@example.com' });

      expect(second.id).toBe(2);
    });
  });

  it('should report a closed database as StoreUnavailableError', async () => {
    const closed = new SqliteContactStore(':memory:');
    closed.close();

    await expect(closed.findById(1)).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(closed.insert({ ...base, first_name: 'A', email: 'a@example.com' })).rejects.toThrow(
      'SQLite insert failed'
    );
  });
});

describe('ContactService over SqliteContactStore', () => {
  it('should create, fetch and delete a contact', async () => {
    const store = new SqliteContactStore();
    const service = new ContactService({ store });

    const created = await service.create({
      first_name: 'Test',
      last_name: 'User',
      email: 'test@example.com',
      phone_number: '1234567890',
    });

    expect(created.id).toBe(1);
    expect(created.email).toBe('test@example.com');
    expect(await service.get(created.id)).toEqual(created);

    await service.delete(created.id);
    await expect(service.get(created.id)).rejects.toBeInstanceOf(NotFoundError);

    store.close();
  });
});
