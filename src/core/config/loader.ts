/**
 * Configuration loading from `.tracemark/config.yaml`.
 */
import * as path from 'node:path';
import { ConfigSchema, type Config, type ConfigInput } from './schema.js';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { fileExists } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes, errorMessage } from '../../utils/errors.js';

export const DEFAULT_CONFIG_PATH = '.tracemark/config.yaml';

/**
 * Load configuration from a file. Unlike optional settings files, a missing
 * config is an error: without specs there is nothing to index.
 */
export async function loadConfig(projectRoot: string, configPath?: string): Promise<Config> {
  const fullPath = getConfigPath(projectRoot, configPath);

  if (!(await fileExists(fullPath))) {
    throw new ConfigError(
      ErrorCodes.CONFIG_NOT_FOUND,
      `Config file not found: ${fullPath}`,
      { path: fullPath }
    );
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Failed to load config from ${fullPath}: ${errorMessage(error)}`,
      { path: fullPath, originalError: errorMessage(error) }
    );
  }
}

/**
 * Apply schema defaults to an in-memory config (used by embedders and tests
 * that never touch a config file).
 */
export function defineConfig(input: ConfigInput): Config {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_LOAD_ERROR,
      `Invalid config: ${result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      { issues: result.error.issues }
    );
  }
  return result.data;
}

/**
 * Absolute path of the config file for a project.
 */
export function getConfigPath(projectRoot: string, configPath?: string): string {
  return path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);
}
