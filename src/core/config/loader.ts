/**
 * Loads `.sonar/config.yaml`, falling back to schema defaults.
 */
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigSchema, type CacheSettings, type Config, type SassSettings } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';

export const DEFAULT_CONFIG_PATH = '.sonar/config.yaml';

/**
 * Config with every field optional, nested blocks included.
 */
export type ConfigInput = Partial<Omit<Config, 'cache' | 'backends'>> & {
  cache?: Partial<CacheSettings>;
  backends?: { sass?: Partial<SassSettings> };
};

/**
 * Default configuration values.
 * Used when no config file exists.
 */
export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration from a file.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadConfig(
  projectRoot: string,
  configPath?: string
): Promise<Config> {
  const fullPath = configPath
    ? path.resolve(projectRoot, configPath)
    : path.resolve(projectRoot, DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  try {
    // An empty YAML document parses to null
    return await loadYamlWithSchema(fullPath, z.preprocess((val) => val ?? {}, ConfigSchema));
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Merge partial config with defaults.
 */
export function mergeConfig(partial: ConfigInput): Config {
  const result = ConfigSchema.safeParse(partial);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Invalid config: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return result.data;
}
