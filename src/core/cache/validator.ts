/**
 * Cache Validator - decides whether an artifact must be regenerated.
 *
 * Checks run cheapest first and stop at the first decisive answer:
 * missing artifact, missing record, live mode, then source modification times.
 */
import { fileExists, getModifiedTime } from '../../utils/file-system.js';
import { resolveFragmentPath } from '../fragments/normalizer.js';
import type { FragmentSet } from '../fragments/types.js';
import type { CacheRecord } from './types.js';

export interface RecompileCheck {
  key: string;
  outputPath: string;
  fragments: FragmentSet;
  record: CacheRecord | null;
  /** Skip source mtime scanning once an artifact and record exist */
  liveMode: boolean;
  /** Directory relative file fragments are resolved against */
  baseDir: string;
}

export type RecompileReason =
  | 'missing-artifact'
  | 'missing-record'
  | 'source-modified'
  | null;

export interface RecompileDecision {
  recompile: boolean;
  reason: RecompileReason;
  /** Fragment ids whose sources changed after the last compile */
  modified: string[];
}

/**
 * Explain the recompile decision.
 */
export async function checkRecompile(check: RecompileCheck): Promise<RecompileDecision> {
  if (!(await fileExists(check.outputPath))) {
    return { recompile: true, reason: 'missing-artifact', modified: [] };
  }

  if (!check.record || check.record.key !== check.key) {
    return { recompile: true, reason: 'missing-record', modified: [] };
  }

  if (check.liveMode) {
    return { recompile: false, reason: null, modified: [] };
  }

  const lastCompiledAt = check.record.lastCompiledAt;
  const modified: string[] = [];
  for (const [id, fragment] of check.fragments) {
    // Inline fragments have no backing file
    if (fragment.kind !== 'file') continue;

    const mtime = await getModifiedTime(resolveFragmentPath(fragment, check.baseDir));
    if (mtime === null || mtime > lastCompiledAt) {
      modified.push(id);
    }
  }

  return modified.length > 0
    ? { recompile: true, reason: 'source-modified', modified }
    : { recompile: false, reason: null, modified };
}

export async function needsRecompile(check: RecompileCheck): Promise<boolean> {
  return (await checkRecompile(check)).recompile;
}
