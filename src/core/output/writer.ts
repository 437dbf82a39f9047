/**
 * Output Writer - filesystem steps of a compile: destination directory, temporary source,
 * final artifact commit and cleanup. Each step maps failures to its own error type.
 */
import * as path from 'node:path';
import {
  ensureWritableDir,
  globFiles,
  removeFile,
  writeFile,
  writeFileAtomic,
} from '../../utils/file-system.js';
import { DirectoryError, OutputWriteError, TempWriteError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('output');

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create the theme directory if needed and check it is writable.
 */
export async function ensureDestination(directory: string): Promise<void> {
  try {
    await ensureWritableDir(directory);
  } catch (error) {
    throw new DirectoryError(
      `Destination directory ${directory} could not be created or is not writable: ${errorMessage(error)}`,
      { directory }
    );
  }
}

/**
 * Write the normalized source next to the artifact. A leftover file of the same name is overwritten.
 */
export async function writeTempSource(tempPath: string, source: string): Promise<void> {
  try {
    await writeFile(tempPath, source);
  } catch (error) {
    throw new TempWriteError(
      `Temporary source ${tempPath} could not be written: ${errorMessage(error)}`,
      { tempPath }
    );
  }
}

/**
 * Best-effort removal of the temporary source. Returns false (and logs) on failure.
 */
export async function removeTempSource(tempPath: string): Promise<boolean> {
  try {
    await removeFile(tempPath);
    return true;
  } catch (error) {
    log.warn(`Could not delete temporary source ${tempPath}`, { error: errorMessage(error) });
    return false;
  }
}

/**
 * Replace the artifact with the compiled CSS in one rename.
 */
export async function commitArtifact(outputPath: string, css: string): Promise<void> {
  try {
    await writeFileAtomic(outputPath, css);
  } catch (error) {
    throw new OutputWriteError(
      `Compiled stylesheet ${outputPath} could not be written: ${errorMessage(error)}`,
      { outputPath }
    );
  }
}

export interface PurgeResult {
  artifacts: string[];
  tempSources: string[];
}

/**
 * Delete compiled artifacts and leftover temporary sources under the destination root,
 * optionally limited to one theme.
 */
export async function purgeArtifacts(destinationRoot: string, theme?: string): Promise<PurgeResult> {
  const cwd = theme ? path.join(destinationRoot, theme) : destinationRoot;
  const scope = theme ? '' : '*/';

  const [artifacts, tempSources] = await Promise.all([
    globFiles(`${scope}*.css`, { cwd }),
    globFiles(`${scope}tmp.*.scss`, { cwd }),
  ]);

  await Promise.all([...artifacts, ...tempSources].map((file) => removeFile(file)));
  log.debug('Purged artifacts', { root: cwd, artifacts: artifacts.length, tempSources: tempSources.length });

  return { artifacts, tempSources };
}
