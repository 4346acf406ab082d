import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileCacheStore, MemoryCacheStore, StageCache } from '../cache';

const asNumber = (v: unknown) => (typeof v === 'number' ? v : null);

describe('MemoryCacheStore', () => {
  it('stores a copy of the value', async () => {
    const store = new MemoryCacheStore();
    const value = { tiers: ['Starter'] };
    await store.put('k', value);
    value.tiers.push('Pro');
    expect(await store.get('k')).toEqual({ tiers: ['Starter'] });
    expect(await store.exists('k')).toBe(true);
    expect(await store.get('missing')).toBeUndefined();
  });
});

describe('FileCacheStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'intel-cache-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('round-trips values and leaves no temp files', async () => {
    const store = new FileCacheStore(path.join(dir, 'nested'));
    expect(await store.exists('acme:discovery:head')).toBe(false);
    expect(await store.get('acme:discovery:head')).toBeUndefined();

    await store.put('acme:discovery:head', { hash: 'abc', storedAt: '2024-01-01T00:00:00.000Z' });

    expect(await store.exists('acme:discovery:head')).toBe(true);
    expect(await store.get('acme:discovery:head')).toEqual({ hash: 'abc', storedAt: '2024-01-01T00:00:00.000Z' });
    const files = await readdir(path.join(dir, 'nested'));
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^[0-9a-f]{64}\.json$/);
  });
});

describe('StageCache', () => {
  it('writes entries once and reads them back', async () => {
    const store = new MemoryCacheStore();
    const cache = new StageCache(store);

    expect(await cache.writeEntry('acme', 'categorize', 'h1', 1)).toBe(true);
    expect(await cache.writeEntry('acme', 'categorize', 'h1', 2)).toBe(false);
    expect(await cache.read('acme', 'categorize', 'h1', asNumber)).toBe(1);
    expect(await cache.read('acme', 'categorize', 'h2', asNumber)).toBeNull();
    expect(await store.exists(StageCache.headKey('acme', 'categorize'))).toBe(false);
  });

  it('serves the head entry while it is fresh', async () => {
    const cache = new StageCache(new MemoryCacheStore());
    const storedAt = new Date('2024-03-01T12:00:00.000Z');
    await cache.write('acme', 'discovery', 'h1', 42, storedAt);

    const fresh = await cache.readFresh('acme', 'discovery', 60_000, asNumber, storedAt.getTime() + 59_000);
    expect(fresh).toEqual({ hash: 'h1', value: 42 });

    const stale = await cache.readFresh('acme', 'discovery', 60_000, asNumber, storedAt.getTime() + 61_000);
    expect(stale).toBeNull();
  });

  it('moves the head without overwriting older entries', async () => {
    const cache = new StageCache(new MemoryCacheStore());
    const now = new Date('2024-03-01T12:00:00.000Z');
    await cache.write('acme', 'discovery', 'h1', 1, now);
    await cache.write('acme', 'discovery', 'h2', 2, now);

    expect(await cache.readFresh('acme', 'discovery', 1_000, asNumber, now.getTime())).toEqual({ hash: 'h2', value: 2 });
    expect(await cache.read('acme', 'discovery', 'h1', asNumber)).toBe(1);
  });

  it('keeps competitors apart', async () => {
    const cache = new StageCache(new MemoryCacheStore());
    await cache.write('acme', 'discovery', 'h1', 1);
    expect(await cache.readFresh('globex', 'discovery', 60_000, asNumber)).toBeNull();
  });
});
