/**
 * Key-value stores for compile records.
 */
import * as path from 'node:path';
import { readFile, writeFileAtomic, fileExists } from '../../utils/file-system.js';
import { CacheStoreError } from '../../utils/errors.js';
import { KeyedLock } from '../../utils/keyed-lock.js';
import { logger } from '../../utils/logger.js';
import type { CacheSettings } from '../config/schema.js';
import type { CacheRecord, RecordFile } from './types.js';
import { CACHE_VERSION, CACHE_PATH, RecordFileSchema } from './types.js';

const log = logger.child('cache');

/**
 * Storage for compile records keyed by cache key.
 */
export interface CacheStore {
  get(key: string): Promise<CacheRecord | null>;
  set(record: CacheRecord): Promise<void>;
  /** Returns whether a record was removed */
  delete(key: string): Promise<boolean>;
  /**
   * Remove records whose key starts with `keyPrefix` (all records when omitted).
   * Returns the number removed.
   */
  clear(keyPrefix?: string): Promise<number>;
  keys(): Promise<string[]>;
}

function isLive(record: CacheRecord, now: number): boolean {
  return record.expiresAt === null || record.expiresAt > now;
}

/**
 * Process-local store. Used by tests and by `cache.store: memory`.
 */
export class MemoryCacheStore implements CacheStore {
  private records = new Map<string, CacheRecord>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<CacheRecord | null> {
    const record = this.records.get(key);
    if (!record || !isLive(record, this.now())) return null;
    return { ...record };
  }

  async set(record: CacheRecord): Promise<void> {
    this.records.set(record.key, { ...record });
  }

  async delete(key: string): Promise<boolean> {
    return this.records.delete(key);
  }

  async clear(keyPrefix?: string): Promise<number> {
    let removed = 0;
    for (const key of [...this.records.keys()]) {
      if (keyPrefix === undefined || key.startsWith(keyPrefix)) {
        this.records.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async keys(): Promise<string[]> {
    return [...this.records.keys()];
  }
}

/**
 * Persistent store backed by a versioned JSON file.
 * Every operation re-reads the file so separate processes see each other's records;
 * writes from this instance are serialized and land through an atomic rename.
 */
export class JsonFileCacheStore implements CacheStore {
  private readonly filePath: string;
  private readonly writes = new KeyedLock();

  constructor(
    projectRoot: string,
    filePath: string = CACHE_PATH,
    private readonly now: () => number = Date.now
  ) {
    this.filePath = path.resolve(projectRoot, filePath);
  }

  getPath(): string {
    return this.filePath;
  }

  async get(key: string): Promise<CacheRecord | null> {
    const file = await this.load();
    const record = file.records[key];
    if (!record || !isLive(record, this.now())) return null;
    return { ...record };
  }

  async set(record: CacheRecord): Promise<void> {
    await this.update((file) => {
      file.records[record.key] = { ...record };
    });
  }

  async delete(key: string): Promise<boolean> {
    let removed = false;
    await this.update((file) => {
      if (file.records[key]) {
        delete file.records[key];
        removed = true;
      }
    });
    return removed;
  }

  async clear(keyPrefix?: string): Promise<number> {
    let removed = 0;
    await this.update((file) => {
      for (const key of Object.keys(file.records)) {
        if (keyPrefix === undefined || key.startsWith(keyPrefix)) {
          delete file.records[key];
          removed++;
        }
      }
    });
    return removed;
  }

  async keys(): Promise<string[]> {
    const file = await this.load();
    return Object.keys(file.records);
  }

  /**
   * Read the record file. Missing, corrupt or old-version files read as empty.
   */
  private async load(): Promise<RecordFile> {
    if (!(await fileExists(this.filePath))) {
      return this.createEmpty();
    }

    try {
      const parsed = RecordFileSchema.safeParse(JSON.parse(await readFile(this.filePath)));
      if (!parsed.success || parsed.data.version !== CACHE_VERSION) {
        log.warn(`Ignoring unreadable record file ${this.filePath}`);
        return this.createEmpty();
      }
      return parsed.data;
    } catch (error) {
      log.warn(`Ignoring unreadable record file ${this.filePath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return this.createEmpty();
    }
  }

  private async update(mutate: (file: RecordFile) => void): Promise<void> {
    await this.writes.run(this.filePath, async () => {
      const file = await this.load();
      mutate(file);
      file.updatedAt = new Date(this.now()).toISOString();

      try {
        await writeFileAtomic(this.filePath, JSON.stringify(file, null, 2));
      } catch (error) {
        throw new CacheStoreError(
          `Failed to write record file ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`,
          { path: this.filePath }
        );
      }
    });
  }

  private createEmpty(): RecordFile {
    return {
      version: CACHE_VERSION,
      updatedAt: new Date(this.now()).toISOString(),
      records: {},
    };
  }
}

/**
 * Build the store named by `cache.store`.
 */
export function createCacheStore(settings: CacheSettings, projectRoot: string): CacheStore {
  return settings.store === 'memory'
    ? new MemoryCacheStore()
    : new JsonFileCacheStore(projectRoot, settings.path);
}
