import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { convertParams, SqliteDatabase } from './database';

describe('convertParams', () => {
  it('replaces numbered placeholders in order of appearance', () => {
    expect(convertParams('SELECT * FROM t WHERE a = $2 AND b = $1', ['x', 'y'])).toEqual({
      query: 'SELECT * FROM t WHERE a = ? AND b = ?',
      params: ['y', 'x'],
    });
  });

  it('repeats a value referenced twice', () => {
    expect(convertParams('SELECT $1, $1', [5])).toEqual({ query: 'SELECT ?, ?', params: [5, 5] });
  });

  it('leaves queries without placeholders unchanged', () => {
    expect(convertParams('SELECT 1', [])).toEqual({ query: 'SELECT 1', params: [] });
  });

  it('throws when a referenced value is missing', () => {
    expect(() => convertParams('SELECT $2', ['a'])).toThrow('Missing value for parameter $2');
  });
});

describe('SqliteDatabase', () => {
  it('executes statements and selects rows as objects', async () => {
    const db = await SqliteDatabase.open();
    await db.execute('CREATE TABLE t (id TEXT PRIMARY KEY, n INTEGER)');

    const inserted = await db.execute('INSERT INTO t (id, n) VALUES ($1, $2)', ['a', 1]);

    expect(inserted.rowsAffected).toBe(1);
    expect(db.isPersistent).toBe(false);
    expect(await db.select('SELECT * FROM t')).toEqual([{ id: 'a', n: 1 }]);
    await db.close();
  });

  it('returns an empty list when nothing matches', async () => {
    const db = await SqliteDatabase.open();
    await db.execute('CREATE TABLE t (id TEXT PRIMARY KEY)');

    expect(await db.select('SELECT * FROM t WHERE id = $1', ['missing'])).toEqual([]);
    await db.close();
  });

  it('persists to a file and loads it again', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'field-sync-'));
    const path = join(dir, 'nested', 'field.sqlite');

    try {
      const db = await SqliteDatabase.open({ path });
      expect(db.isPersistent).toBe(true);
      await db.execute('CREATE TABLE t (n INTEGER)');
      await db.execute('INSERT INTO t (n) VALUES ($1)', [7]);
      await db.close();

      const reopened = await SqliteDatabase.open({ path });
      expect(await reopened.select('SELECT n FROM t')).toEqual([{ n: 7 }]);
      await reopened.close();
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('rejects queries after close', async () => {
    const db = await SqliteDatabase.open();
    await db.close();

    await expect(db.select('SELECT 1')).rejects.toThrow('Database is closed');
  });
});
