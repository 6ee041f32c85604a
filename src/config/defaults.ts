/**
 * Default configuration values
 */

import type { Config } from './schema.js';

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  tools: {
    python: 'python3',
    ruff: 'ruff',
    twine: 'twine',
  },
  timeouts: {
    lint: 5 * 60 * 1000, // 5 minutes
    test: 10 * 60 * 1000, // 10 minutes
    build: 20 * 60 * 1000, // 20 minutes
    publish: 5 * 60 * 1000, // 5 minutes
  },
  workspace: {
    prefix: 'wheelwright-',
  },
  manifest: {
    author_name: 'Wheelwright Packager',
    author_email: 'packager@example.com',
    license: 'MIT',
    description: 'Python package generated by wheelwright',
  },
  output: {
    verbose: false,
  },
};

/**
 * Configuration file names to search for
 */
export const CONFIG_FILE_NAMES = [
  'wheelwright.config.yaml',
  'wheelwright.config.yml',
  '.wheelwrightrc.yaml',
  '.wheelwrightrc.yml',
  '.wheelwrightrc',
];

/**
 * Environment variable names
 */
export const ENV_VARS = {
  PYTHON: 'WHEELWRIGHT_PYTHON',
  WORKSPACE_DIR: 'WHEELWRIGHT_WORKSPACE_DIR',
  LOG_LEVEL: 'WHEELWRIGHT_LOG_LEVEL',
  PYPI_TOKEN: 'WHEELWRIGHT_PYPI_TOKEN',
} as const;

/**
 * CLI version
 */
export const CLI_VERSION = '0.1.0';
