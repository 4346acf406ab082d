import { mkdir, readFile, rename, writeFile, access, unlink } from 'node:fs/promises';
import path from 'node:path';
import { log } from './logger';
import { contentHash } from './normalize';

/**
 * Content-addressed key/value persistence. Implementations guarantee per-key
 * atomicity only: a reader sees either nothing or a complete value.
 */
export interface CacheStore {
  get(key: string): Promise<unknown | undefined>;
  put(key: string, value: unknown): Promise<void>;
  exists(key: string): Promise<boolean>;
}

export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, string>();

  async get(key: string) {
    const raw = this.entries.get(key);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async put(key: string, value: unknown) {
    // Serialised up front so later mutation of `value` cannot leak into the store.
    this.entries.set(key, JSON.stringify(value));
  }

  async exists(key: string) {
    return this.entries.has(key);
  }

  get size() {
    return this.entries.size;
  }
}

/** One JSON file per key; writes land in a temp file and are renamed into place. */
export class FileCacheStore implements CacheStore {
  constructor(private readonly dir: string) {}

  private fileFor(key: string) {
    return path.join(this.dir, `${contentHash(key)}.json`);
  }

  async get(key: string) {
    try {
      const raw = await readFile(this.fileFor(key), 'utf8');
      return JSON.parse(raw);
    } catch (error) {
      if (isMissing(error)) return undefined;
      throw error;
    }
  }

  async put(key: string, value: unknown) {
    await mkdir(this.dir, { recursive: true });
    const target = this.fileFor(key);
    const tmp = `${target}.${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2, 8)}.tmp`;
    await writeFile(tmp, JSON.stringify(value), 'utf8');
    try {
      await rename(tmp, target);
    } catch (error) {
      await unlink(tmp).catch((cleanupError: unknown) => {
        log.warn({ error: cleanupError, tmp }, 'Failed to remove temp cache file');
      });
      throw error;
    }
  }

  async exists(key: string) {
    try {
      await access(this.fileFor(key));
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }
}

function isMissing(error: unknown) {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

type HeadPointer = { hash: string; storedAt: string };

/**
 * Stage cache over a CacheStore. Entries live at `competitor:stage:hash` and
 * are written once; `competitor:stage:head` points at the newest hash.
 */
export class StageCache {
  constructor(private readonly store: CacheStore) {}

  static entryKey(competitorId: string, stage: string, hash: string) {
    return `${competitorId}:${stage}:${hash}`;
  }

  static headKey(competitorId: string, stage: string) {
    return `${competitorId}:${stage}:head`;
  }

  async read<T>(competitorId: string, stage: string, hash: string, parse: (value: unknown) => T | null): Promise<T | null> {
    const value = await this.store.get(StageCache.entryKey(competitorId, stage, hash));
    if (value === undefined) return null;
    return parse(value);
  }

  /** Stores the entry unless one already exists for this hash. */
  async writeEntry(competitorId: string, stage: string, hash: string, value: unknown) {
    const key = StageCache.entryKey(competitorId, stage, hash);
    if (await this.store.exists(key)) return false;
    await this.store.put(key, value);
    return true;
  }

  /** Writes the entry (once) and moves the stage's head pointer to it. */
  async write(competitorId: string, stage: string, hash: string, value: unknown, now = new Date()) {
    await this.writeEntry(competitorId, stage, hash, value);
    const head: HeadPointer = { hash, storedAt: now.toISOString() };
    await this.store.put(StageCache.headKey(competitorId, stage), head);
  }

  /** Latest entry for the stage when it is younger than `maxAgeMs`. */
  async readFresh<T>(
    competitorId: string,
    stage: string,
    maxAgeMs: number,
    parse: (value: unknown) => T | null,
    now = Date.now()
  ): Promise<{ hash: string; value: T } | null> {
    const head = parseHead(await this.store.get(StageCache.headKey(competitorId, stage)));
    if (!head) return null;
    if (now - Date.parse(head.storedAt) > maxAgeMs) return null;
    const value = await this.read(competitorId, stage, head.hash, parse);
    return value === null ? null : { hash: head.hash, value };
  }
}

function parseHead(value: unknown): HeadPointer | null {
  if (!value || typeof value !== 'object') return null;
  const hash = 'hash' in value ? value.hash : undefined;
  const storedAt = 'storedAt' in value ? value.storedAt : undefined;
  if (typeof hash !== 'string' || typeof storedAt !== 'string') return null;
  return { hash, storedAt };
}
