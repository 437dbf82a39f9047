/**
 * `sonar key <manifest>` - print the cache key and artifact path for a manifest.
 */
import { Command } from 'commander';
import { computeKey } from '../../core/identity/key.js';
import { getArtifactPaths } from '../../core/output/paths.js';
import { resolvePath } from '../../utils/file-system.js';
import { exitWithError, loadProject, loadRequest } from './helpers.js';

interface KeyOptions {
  config?: string;
  json?: boolean;
}

export function createKeyCommand(): Command {
  return new Command('key')
    .description('Print the cache key and artifact path for a manifest')
    .argument('<manifest>', 'Path to the fragment manifest (YAML)')
    .option('-c, --config <path>', 'Path to config file', '.sonar/config.yaml')
    .option('--json', 'Output as JSON')
    .action(async (manifest: string, options: KeyOptions) => {
      try {
        const { projectRoot, config } = await loadProject(options);
        const request = await loadRequest(projectRoot, manifest);
        const key = computeKey(request.theme, request.fragments.keys(), config.key_prefix);
        const { outputPath } = getArtifactPaths(
          resolvePath(projectRoot, config.destination),
          request.theme,
          key,
          request.requestedAt
        );

        if (options.json) {
          console.log(JSON.stringify({ key, outputPath }, null, 2));
        } else {
          console.log(key);
          console.log(outputPath);
        }
      } catch (error) {
        exitWithError(error);
      }
    });
}
