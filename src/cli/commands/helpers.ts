/**
 * Shared plumbing for commands that operate on a fragment manifest.
 */
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { loadManifest, manifestToRequest } from '../../core/request/manifest.js';
import type { CompilationRequest } from '../../core/request/request.js';
import { logger as log } from '../../utils/logger.js';

export interface ProjectOptions {
  config?: string;
  verbose?: boolean;
}

export interface LoadedProject {
  projectRoot: string;
  config: Config;
}

export async function loadProject(options: ProjectOptions): Promise<LoadedProject> {
  if (options.verbose) {
    log.setLevel('debug');
  }
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  return { projectRoot, config };
}

export async function loadRequest(projectRoot: string, manifestPath: string): Promise<CompilationRequest> {
  const manifest = await loadManifest(path.resolve(projectRoot, manifestPath));
  return manifestToRequest(manifest);
}

/**
 * Report a command failure and exit.
 */
export function exitWithError(error: unknown): never {
  log.error(error instanceof Error ? error.message : 'Unknown error');
  process.exit(1);
}
