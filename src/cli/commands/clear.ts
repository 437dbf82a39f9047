/**
 * `sonar clear` - drop compile records so the next request recompiles.
 * Needed after source edits in live mode, where modification times are not checked.
 */
import { Command } from 'commander';
import { createCacheStore } from '../../core/cache/store.js';
import { ThemeSchema } from '../../core/request/request.js';
import { purgeArtifacts } from '../../core/output/writer.js';
import { resolvePath } from '../../utils/file-system.js';
import { logger as log } from '../../utils/logger.js';
import { exitWithError, loadProject } from './helpers.js';

interface ClearOptions {
  config?: string;
  theme?: string;
  purge?: boolean;
  verbose?: boolean;
}

export function createClearCommand(): Command {
  return new Command('clear')
    .description('Clear compile records (and optionally compiled artifacts)')
    .option('-c, --config <path>', 'Path to config file', '.sonar/config.yaml')
    .option('-t, --theme <theme>', 'Only clear records for one theme')
    .option('--purge', 'Also delete compiled stylesheets and leftover temporary sources')
    .option('-v, --verbose', 'Show debug logging')
    .action(async (options: ClearOptions) => {
      try {
        await runClear(options);
      } catch (error) {
        exitWithError(error);
      }
    });
}

async function runClear(options: ClearOptions): Promise<void> {
  const { projectRoot, config } = await loadProject(options);
  const theme = options.theme === undefined ? undefined : ThemeSchema.parse(options.theme);

  const store = createCacheStore(config.cache, projectRoot);
  const prefix = theme ? `${config.key_prefix}-${theme}-` : `${config.key_prefix}-`;
  const removed = await store.clear(prefix);
  log.success(`Cleared ${removed} compile record${removed === 1 ? '' : 's'}`);

  if (options.purge) {
    const purged = await purgeArtifacts(resolvePath(projectRoot, config.destination), theme);
    log.success(
      `Deleted ${purged.artifacts.length} stylesheet(s) and ${purged.tempSources.length} temporary source(s)`
    );
  }
}
