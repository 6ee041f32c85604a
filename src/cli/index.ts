/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import { Command } from 'commander';
import { CLI_VERSION } from '../config/defaults.js';
import { createConfigCommand, createDoctorCommand, createPackageCommand } from './commands/index.js';
import { printError } from './output.js';

// Re-export
export * from './output.js';
export * from './commands/index.js';

export const VERSION: string = CLI_VERSION;

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('wheelwright')
    .description('Turn Python code into a validated, optionally published package')
    .version(VERSION);

  program.addCommand(createPackageCommand());
  program.addCommand(createConfigCommand());
  program.addCommand(createDoctorCommand());

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exitCode = 1;
  }
}
