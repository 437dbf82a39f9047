/**
 * Tests for compile record stores.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync, writeFileSync, readFileSync, rmSync, existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  JsonFileCacheStore,
  MemoryCacheStore,
  createCacheStore,
} from '../../../../src/core/cache/store.js';
import { CACHE_VERSION } from '../../../../src/core/cache/types.js';

describe('MemoryCacheStore', () => {
  let store: MemoryCacheStore;

  beforeEach(() => {
    store = new MemoryCacheStore(() => 5_000);
  });

  it('returns null for unknown keys', async () => {
    expect(await store.get('sonar-bartik-x')).toBeNull();
  });

  it('stores and retrieves records', async () => {
    await store.set({ key: 'sonar-bartik-x', lastCompiledAt: 1_000, expiresAt: null });

    expect(await store.get('sonar-bartik-x')).toEqual({
      key: 'sonar-bartik-x',
      lastCompiledAt: 1_000,
      expiresAt: null,
    });
  });

  it('overwrites records for the same key', async () => {
    await store.set({ key: 'k', lastCompiledAt: 1_000, expiresAt: null });
    await store.set({ key: 'k', lastCompiledAt: 2_000, expiresAt: null });

    expect((await store.get('k'))?.lastCompiledAt).toBe(2_000);
  });

  it('hides expired records', async () => {
    await store.set({ key: 'old', lastCompiledAt: 1_000, expiresAt: 4_000 });
    await store.set({ key: 'new', lastCompiledAt: 1_000, expiresAt: 9_000 });

    expect(await store.get('old')).toBeNull();
    expect(await store.get('new')).not.toBeNull();
  });

  it('returns copies so callers cannot mutate stored records', async () => {
    await store.set({ key: 'k', lastCompiledAt: 1_000, expiresAt: null });
    const record = await store.get('k');
    if (record) record.lastCompiledAt = 0;

    expect((await store.get('k'))?.lastCompiledAt).toBe(1_000);
  });

  it('deletes single records', async () => {
    await store.set({ key: 'k', lastCompiledAt: 1_000, expiresAt: null });

    expect(await store.delete('k')).toBe(true);
    expect(await store.delete('k')).toBe(false);
    expect(await store.get('k')).toBeNull();
  });

  it('clears by key prefix', async () => {
    await store.set({ key: 'sonar-bartik-a', lastCompiledAt: 1, expiresAt: null });
    await store.set({ key: 'sonar-bartik-b', lastCompiledAt: 1, expiresAt: null });
    await store.set({ key: 'sonar-seven-a', lastCompiledAt: 1, expiresAt: null });

    expect(await store.clear('sonar-bartik-')).toBe(2);
    expect(await store.keys()).toEqual(['sonar-seven-a']);
  });

  it('clears everything without a prefix', async () => {
    await store.set({ key: 'a', lastCompiledAt: 1, expiresAt: null });
    await store.set({ key: 'b', lastCompiledAt: 1, expiresAt: null });

    expect(await store.clear()).toBe(2);
    expect(await store.keys()).toEqual([]);
  });
});

describe('JsonFileCacheStore', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `sonar-store-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('resolves the default path under .sonar/cache', () => {
    const store = new JsonFileCacheStore(testDir);

    expect(store.getPath()).toBe(join(testDir, '.sonar', 'cache', 'records.json'));
  });

  it('reads as empty when the file does not exist', async () => {
    const store = new JsonFileCacheStore(testDir);

    expect(await store.get('k')).toBeNull();
    expect(await store.keys()).toEqual([]);
  });

  it('persists records to a versioned JSON file', async () => {
    const store = new JsonFileCacheStore(testDir, 'records.json', () => Date.UTC(2026, 0, 1));
    await store.set({ key: 'sonar-bartik-x', lastCompiledAt: 1_000, expiresAt: null });

    const written = JSON.parse(readFileSync(join(testDir, 'records.json'), 'utf-8'));
    expect(written).toEqual({
      version: CACHE_VERSION,
      updatedAt: '2026-01-01T00:00:00.000Z',
      records: {
        'sonar-bartik-x': { key: 'sonar-bartik-x', lastCompiledAt: 1_000, expiresAt: null },
      },
    });
  });

  it('shares records between instances on the same file', async () => {
    await new JsonFileCacheStore(testDir).set({ key: 'k', lastCompiledAt: 42, expiresAt: null });

    expect(await new JsonFileCacheStore(testDir).get('k')).toEqual({
      key: 'k',
      lastCompiledAt: 42,
      expiresAt: null,
    });
  });

  it('keeps every record when sets run concurrently', async () => {
    const store = new JsonFileCacheStore(testDir);
    await Promise.all(
      ['a', 'b', 'c', 'd'].map((key, i) => store.set({ key, lastCompiledAt: i, expiresAt: null }))
    );

    expect((await store.keys()).sort()).toEqual(['a', 'b', 'c', 'd']);
  });

  it('starts fresh when the file is corrupt', async () => {
    mkdirSync(join(testDir, '.sonar', 'cache'), { recursive: true });
    writeFileSync(join(testDir, '.sonar', 'cache', 'records.json'), '{ not json');
    const store = new JsonFileCacheStore(testDir);

    expect(await store.get('k')).toBeNull();
    await store.set({ key: 'k', lastCompiledAt: 1, expiresAt: null });
    expect(await store.get('k')).not.toBeNull();
  });

  it('ignores files written by another format version', async () => {
    writeFileSync(
      join(testDir, 'records.json'),
      JSON.stringify({ version: '0.1', updatedAt: 'x', records: { k: { key: 'k', lastCompiledAt: 1, expiresAt: null } } })
    );

    expect(await new JsonFileCacheStore(testDir, 'records.json').get('k')).toBeNull();
  });

  it('deletes and clears by prefix', async () => {
    const store = new JsonFileCacheStore(testDir);
    await store.set({ key: 'sonar-bartik-a', lastCompiledAt: 1, expiresAt: null });
    await store.set({ key: 'sonar-bartik-b', lastCompiledAt: 1, expiresAt: null });
    await store.set({ key: 'sonar-seven-a', lastCompiledAt: 1, expiresAt: null });

    expect(await store.delete('sonar-bartik-a')).toBe(true);
    expect(await store.delete('sonar-bartik-a')).toBe(false);
    expect(await store.clear('sonar-bartik-')).toBe(1);
    expect(await store.keys()).toEqual(['sonar-seven-a']);
  });
});

describe('createCacheStore', () => {
  it('builds a memory store', () => {
    expect(createCacheStore({ store: 'memory', path: 'unused.json' }, '/project')).toBeInstanceOf(
      MemoryCacheStore
    );
  });

  it('builds a file store at the configured path', () => {
    const store = createCacheStore({ store: 'file', path: 'var/records.json' }, '/project');

    expect(store).toBeInstanceOf(JsonFileCacheStore);
    expect(store instanceof JsonFileCacheStore && store.getPath()).toBe('/project/var/records.json');
  });

  it('does not touch the filesystem until used', () => {
    createCacheStore({ store: 'file', path: 'never/records.json' }, tmpdir());

    expect(existsSync(join(tmpdir(), 'never'))).toBe(false);
  });
});
