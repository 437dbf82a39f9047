/**
 * `sonar compile <manifest>` - compile a fragment manifest if its artifact is stale.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { StylesheetCompiler } from '../../core/pipeline/compiler.js';
import type { CompileOutcome } from '../../core/pipeline/types.js';
import { BufferedNoticeSink } from '../../core/reporting/reporter.js';
import { logger as log } from '../../utils/logger.js';
import { exitWithError, loadProject, loadRequest } from './helpers.js';

interface CompileOptions {
  config?: string;
  json?: boolean;
  live?: boolean;
  verbose?: boolean;
}

export function createCompileCommand(): Command {
  return new Command('compile')
    .description('Compile a fragment manifest, reusing the cached stylesheet when it is current')
    .argument('<manifest>', 'Path to the fragment manifest (YAML)')
    .option('-c, --config <path>', 'Path to config file', '.sonar/config.yaml')
    .option('--live', 'Trust existing artifacts without checking source modification times')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Show debug logging')
    .action(async (manifest: string, options: CompileOptions) => {
      try {
        const ok = await runCompile(manifest, options);
        if (!ok) process.exit(1);
      } catch (error) {
        exitWithError(error);
      }
    });
}

async function runCompile(manifestPath: string, options: CompileOptions): Promise<boolean> {
  const { projectRoot, config } = await loadProject(options);
  const loaded = await loadRequest(projectRoot, manifestPath);
  const request = options.live ? { ...loaded, liveMode: true } : loaded;

  const notices = new BufferedNoticeSink();
  const compiler = new StylesheetCompiler({
    projectRoot,
    config,
    // The CLI is run by whoever owns the project, so error detail is always shown
    audience: { canViewErrors: () => true },
    notices,
  });

  const outcome = await compiler.compile(request);

  if (options.json) {
    console.log(JSON.stringify(serializeOutcome(outcome), null, 2));
    return outcome.ok;
  }

  const relative = path.relative(projectRoot, outcome.outputPath);
  if (outcome.ok) {
    if (outcome.state === 'committed') {
      log.success(`Compiled ${chalk.bold(outcome.key)} → ${relative}`);
    } else {
      log.success(`Up to date: ${relative}`);
    }
    return true;
  }

  for (const notice of notices.notices) {
    log.fail(`[${notice.code}] ${notice.message}`);
  }
  if (outcome.fallbackPath) {
    log.warn(`Serving previous artifact: ${relative}`);
  }
  return false;
}

function serializeOutcome(outcome: CompileOutcome): Record<string, unknown> {
  return outcome.ok ? { ...outcome } : { ...outcome, error: outcome.error.toJSON() };
}
