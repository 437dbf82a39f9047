/**
 * `sonar status <manifest>` - show whether a manifest's artifact would be recompiled.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { StylesheetCompiler } from '../../core/pipeline/compiler.js';
import { exitWithError, loadProject, loadRequest } from './helpers.js';

interface StatusOptions {
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show whether the cached stylesheet for a manifest is current')
    .argument('<manifest>', 'Path to the fragment manifest (YAML)')
    .option('-c, --config <path>', 'Path to config file', '.sonar/config.yaml')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Show debug logging')
    .action(async (manifest: string, options: StatusOptions) => {
      try {
        await runStatus(manifest, options);
      } catch (error) {
        exitWithError(error);
      }
    });
}

async function runStatus(manifestPath: string, options: StatusOptions): Promise<void> {
  const { projectRoot, config } = await loadProject(options);
  const request = await loadRequest(projectRoot, manifestPath);
  const compiler = new StylesheetCompiler({ projectRoot, config });

  const status = await compiler.status(request);

  if (options.json) {
    console.log(JSON.stringify(status, null, 2));
    return;
  }

  console.log(`${chalk.bold('Key:')}      ${status.key}`);
  console.log(`${chalk.bold('Artifact:')} ${path.relative(projectRoot, status.outputPath)}`);

  if (status.decision.recompile) {
    console.log(`${chalk.bold('State:')}    ${chalk.yellow(`stale (${status.decision.reason})`)}`);
    for (const id of status.decision.modified) {
      console.log(chalk.dim(`  modified: ${id}`));
    }
  } else {
    console.log(`${chalk.bold('State:')}    ${chalk.green('current')}`);
  }

  for (const missing of status.missing) {
    console.log(chalk.red(`  missing: ${missing.id} (${missing.path})`));
  }
}
