import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import { expect } from 'expect';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { IndexMetadataStore } from '../src/db.js';
import { IndexMetadataRow } from '../src/types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const row = (table: string, name: string, target: string): IndexMetadataRow => ({
  _id: `${table}-${name}`,
  table_name: table,
  index_name: name,
  kind: 'composites',
  options: JSON.stringify({ target }),
});

describe('IndexMetadataStore', () => {
  const tempDbPath = path.join(__dirname, 'temp-db-test.db');

  const removeTempFiles = () => {
    for (const file of [tempDbPath, `${tempDbPath}-wal`, `${tempDbPath}-shm`]) {
      if (fs.existsSync(file)) {
        fs.unlinkSync(file);
      }
    }
  };

  beforeEach(removeTempFiles);
  afterEach(removeTempFiles);

  it('should connect to an in-memory database', async () => {
    const store = new IndexMetadataStore(':memory:');
    await store.connect();
    expect(store.isOpen).toBe(true);
    await store.close();
    expect(store.isOpen).toBe(false);
  });

  it('should connect to a file database', async () => {
    const store = new IndexMetadataStore(tempDbPath);
    await store.connect();

    expect(fs.existsSync(tempDbPath)).toBe(true);

    await store.close();
  });

  it('should log lifecycle events in verbose mode', async () => {
    const log = mock.method(console, 'log', () => {});

    try {
      const store = new IndexMetadataStore({ filePath: ':memory:', verbose: true });
      await store.connect();
      await store.close();

      const messages = log.mock.calls.map((call) => String(call.arguments[0]));
      expect(messages).toContain('SQLite database opened: :memory:');
      expect(messages).toContain('SQLite database closed: :memory:');
    } finally {
      log.mock.restore();
    }
  });

  it('should insert, find and list rows', async () => {
    const store = new IndexMetadataStore(':memory:');

    expect(await store.insert(row('users', 'users_name_idx', 'name'))).toBe(true);
    expect(await store.insert(row('users', 'users_email_idx', 'email'))).toBe(true);
    expect(await store.insert(row('orders', 'orders_email_idx', 'email'))).toBe(true);

    expect(await store.find('users', 'users_email_idx')).toEqual(row('users', 'users_email_idx', 'email'));
    expect(await store.find('orders', 'users_email_idx')).toBeUndefined();
    expect((await store.listByTable('users')).map((found) => found.index_name)).toEqual([
      'users_email_idx',
      'users_name_idx',
    ]);

    await store.close();
  });

  it('should not overwrite a row with the same table and index name', async () => {
    const store = new IndexMetadataStore(':memory:');

    await store.insert(row('users', 'by_email', 'email'));
    const second = { ...row('users', 'by_email', 'name'), _id: 'another-id' };

    expect(await store.insert(second)).toBe(false);
    expect(await store.find('users', 'by_email')).toEqual(row('users', 'by_email', 'email'));

    await store.close();
  });

  it('should remove one row or every row of a table', async () => {
    const store = new IndexMetadataStore(':memory:');
    await store.insert(row('users', 'a', 'name'));
    await store.insert(row('users', 'b', 'email'));
    await store.insert(row('orders', 'c', 'email'));

    expect(await store.remove('users', 'a')).toBe(1);
    expect(await store.remove('users', 'a')).toBe(0);
    expect(await store.removeByTable('users')).toBe(1);
    expect(await store.listByTable('users')).toEqual([]);
    expect(await store.listByTable('orders')).toHaveLength(1);

    await store.close();
  });

  it('should refuse writes on a read-only database', async () => {
    const writer = new IndexMetadataStore(tempDbPath);
    await writer.insert(row('users', 'by_name', 'name'));
    await writer.close();

    const error = mock.method(console, 'error', () => {});
    const reader = new IndexMetadataStore({ filePath: tempDbPath, readOnly: true });

    try {
      expect(reader.isReadOnly).toBe(true);
      await expect(reader.insert(row('users', 'by_email', 'email'))).rejects.toThrow();
      expect(error.mock.calls[0].arguments[0]).toBe('Error inserting index by_email of table users:');
      expect(await reader.listByTable('users')).toEqual([row('users', 'by_name', 'name')]);
    } finally {
      error.mock.restore();
      await reader.close();
    }
  });

  it('should connect again after a failed open', async () => {
    const error = mock.method(console, 'error', () => {});
    const store = new IndexMetadataStore({ filePath: tempDbPath, readOnly: true });

    try {
      // A read-only open does not create the file
      await expect(store.connect()).rejects.toThrow();
      expect(store.isOpen).toBe(false);
      expect(error.mock.calls[0].arguments[0]).toBe(`Error opening database ${tempDbPath}:`);

      const writer = new IndexMetadataStore(tempDbPath);
      await writer.connect();
      await writer.close();

      await store.connect();
      expect(store.isOpen).toBe(true);
      expect(await store.listByTable('users')).toEqual([]);
    } finally {
      error.mock.restore();
      await store.close();
    }
  });

  it('should close quietly after a failed open', async () => {
    const error = mock.method(console, 'error', () => {});
    const store = new IndexMetadataStore({ filePath: tempDbPath, readOnly: true });

    try {
      await expect(store.connect()).rejects.toThrow();
      await expect(store.close()).resolves.toBeUndefined();
    } finally {
      error.mock.restore();
    }
  });

  it('should allow closing a store that was never opened', async () => {
    const store = new IndexMetadataStore(':memory:');
    await store.close();
  });
});
