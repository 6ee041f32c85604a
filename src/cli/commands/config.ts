/**
 * Config command
 * Inspect the effective CLI configuration
 */

import { Command } from 'commander';
import { loadConfig, DEFAULT_CONFIG, CONFIG_FILE_NAMES } from '../../config/index.js';
import { printHeader, printSection, printError, printInfo, printKeyValue } from '../output.js';

/**
 * Create the config command
 */
export function createConfigCommand(): Command {
  const config = new Command('config')
    .description('Inspect configuration');

  // Show current config
  config
    .command('show')
    .description('Show the effective configuration')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      try {
        const { config: loadedConfig, filepath } = await loadConfig();

        if (options.json) {
          console.log(JSON.stringify(loadedConfig, null, 2));
          return;
        }

        printHeader('Current Configuration');
        printInfo(filepath ? `Config file: ${filepath}` : 'Using default configuration');
        printConfigSection('Tools', loadedConfig.tools);
        printConfigSection('Timeouts (ms)', loadedConfig.timeouts);
        printConfigSection('Workspace', loadedConfig.workspace);
        printConfigSection('Manifest', loadedConfig.manifest);
        printConfigSection('Output', loadedConfig.output);
      } catch (error) {
        printError(error instanceof Error ? error.message : 'Unknown error');
        process.exitCode = 1;
      }
    });

  // Show defaults
  config
    .command('defaults')
    .description('Show default configuration values')
    .action(() => {
      console.log(JSON.stringify(DEFAULT_CONFIG, null, 2));
    });

  // Show config file path
  config
    .command('path')
    .description('Show configuration file path')
    .action(async () => {
      try {
        const { filepath } = await loadConfig();
        if (filepath) {
          console.log(filepath);
        } else {
          printInfo('No configuration file found');
          printInfo(`Create one of: ${CONFIG_FILE_NAMES.join(', ')}`);
        }
      } catch (error) {
        printError(error instanceof Error ? error.message : 'Unknown error');
        process.exitCode = 1;
      }
    });

  return config;
}

/**
 * Print a configuration section
 */
function printConfigSection(name: string, section: Record<string, unknown>): void {
  printSection(name);
  for (const [key, value] of Object.entries(section)) {
    if (value !== undefined) {
      printKeyValue(key, String(value));
    }
  }
}
