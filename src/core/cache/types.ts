/**
 * Types for compile records.
 * Records are stored in .sonar/cache/records.json by the file store.
 */
import { z } from 'zod';

/**
 * When a key was last compiled successfully.
 */
export interface CacheRecord {
  key: string;
  /** Epoch ms of the request that produced the current artifact */
  lastCompiledAt: number;
  /** Epoch ms after which the record lapses; null keeps it until cleared */
  expiresAt: number | null;
}

export const CacheRecordSchema = z.object({
  key: z.string(),
  lastCompiledAt: z.number(),
  expiresAt: z.number().nullable().default(null),
});

/**
 * Root structure of the record file.
 */
export const RecordFileSchema = z.object({
  version: z.string(),
  updatedAt: z.string(),
  records: z.record(z.string(), CacheRecordSchema),
});

export type RecordFile = z.infer<typeof RecordFileSchema>;

/**
 * Record file format version for compatibility.
 */
export const CACHE_VERSION = '1.0';

/**
 * Default record file path relative to project root.
 */
export const CACHE_PATH = '.sonar/cache/records.json';
