/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig } from 'cosmiconfig';
import { parse as parseYaml } from 'yaml';
import { ConfigSchema, type Config } from './schema.js';
import { CONFIG_FILE_NAMES, DEFAULT_CONFIG, ENV_VARS } from './defaults.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig('wheelwright', {
  searchPlaces: CONFIG_FILE_NAMES,
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load project-specific configuration
 */
async function loadProjectConfig(cwd?: string): Promise<{ config: ConfigRecord; filepath?: string }> {
  const result = await explorer.search(cwd);
  if (result && !result.isEmpty && isRecord(result.config)) {
    return { config: result.config, filepath: result.filepath };
  }
  return { config: {} };
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const config: ConfigRecord = {};

  const python = env[ENV_VARS.PYTHON];
  if (python) {
    config.tools = { python };
  }

  const workspaceDir = env[ENV_VARS.WORKSPACE_DIR];
  if (workspaceDir) {
    config.workspace = { base_dir: workspaceDir };
  }

  if (env[ENV_VARS.LOG_LEVEL] === 'debug') {
    config.output = { verbose: true };
  }

  return config;
}

/**
 * Deep merge configuration objects
 */
export function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

export interface LoadedConfig {
  config: Config;
  /** Config file the project values came from, if any */
  filepath?: string;
}

/**
 * Load and merge configuration from all sources
 * Priority: env vars > project config > defaults
 */
export async function loadConfig(cwd?: string, env: NodeJS.ProcessEnv = process.env): Promise<LoadedConfig> {
  const project = await loadProjectConfig(cwd);

  let merged = deepMerge({ ...DEFAULT_CONFIG }, project.config);
  merged = deepMerge(merged, loadEnvConfig(env));

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration${project.filepath ? ` in ${project.filepath}` : ''}: ${issues.join('; ')}`);
  }

  return { config: result.data, filepath: project.filepath };
}
