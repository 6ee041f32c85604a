/**
 * CLI output utilities
 * Handles formatted output, spinners, and report display
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { LogEntry } from '../pipeline/pipeline-logger.js';
import type { PipelineReport, StageStatus } from '../pipeline/types.js';
import { summarizeOutput } from '../pipeline/check-runner.js';

/**
 * Output theme colors
 */
export const theme = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  highlight: chalk.bold.white,
  dim: chalk.dim,
};

/**
 * Spinner instance for progress display
 */
let spinner: Ora | null = null;

/**
 * Start a spinner with a message
 *
 * @param message - Initial message
 * @returns Spinner instance
 */
export function startSpinner(message: string): Ora {
  if (spinner) {
    spinner.stop();
  }
  spinner = ora({
    text: message,
    spinner: 'dots',
  }).start();
  return spinner;
}

/**
 * Stop spinner with success
 */
export function succeedSpinner(message?: string): void {
  if (spinner) {
    spinner.succeed(message);
    spinner = null;
  }
}

/**
 * Stop spinner with failure
 */
export function failSpinner(message?: string): void {
  if (spinner) {
    spinner.fail(message);
    spinner = null;
  }
}

/**
 * Stop spinner without status
 */
export function stopSpinner(): void {
  if (spinner) {
    spinner.stop();
    spinner = null;
  }
}

/**
 * Print a header
 */
export function printHeader(title: string): void {
  console.log();
  console.log(theme.primary.bold(`=== ${title} ===`));
  console.log();
}

/**
 * Print a section header
 */
export function printSection(title: string): void {
  console.log();
  console.log(theme.highlight(`--- ${title} ---`));
}

export function printSuccess(message: string): void {
  console.log(theme.success(`[OK] ${message}`));
}

export function printWarning(message: string): void {
  console.log(theme.warning(`[WARN] ${message}`));
}

export function printError(message: string): void {
  console.log(theme.error(`[ERROR] ${message}`));
}

export function printInfo(message: string): void {
  console.log(theme.info(`[INFO] ${message}`));
}

/**
 * Print a key-value pair
 */
export function printKeyValue(key: string, value: string | number | boolean): void {
  console.log(`  ${theme.secondary(key + ':')} ${value}`);
}

/**
 * Print a list item
 */
export function printListItem(item: string, indent: number = 0): void {
  const prefix = '  '.repeat(indent) + '- ';
  console.log(theme.secondary(prefix) + item);
}

/**
 * Get status icon
 */
export function getStatusIcon(status: StageStatus): string {
  switch (status) {
    case 'passed':
      return theme.success('[OK]');
    case 'failed':
      return theme.error('[X]');
    default:
      return theme.dim('[-]');
  }
}

/**
 * Print a single log entry
 */
export function printLogEntry(entry: LogEntry): void {
  const line = `${theme.dim(entry.timestamp)} ${entry.state}: ${entry.message}`;
  switch (entry.level) {
    case 'error':
      console.log(theme.error(line));
      break;
    case 'warn':
      console.log(theme.warning(line));
      break;
    case 'debug':
      console.log(theme.dim(line));
      break;
    default:
      console.log(line);
  }
}

/**
 * Print a packaging report
 *
 * @param report - Final pipeline report
 * @param verbose - Include full stage output
 */
export function printReport(report: PipelineReport, verbose = false): void {
  printHeader(`${report.packageName} ${report.version}`);

  printSection('Stages');
  for (const stage of report.stages) {
    const detail = stage.error ? theme.secondary(` - ${stage.error.message}`) : '';
    console.log(`  ${getStatusIcon(stage.status)} ${stage.stage}${detail}`);
    const showOutput = stage.output && (verbose || stage.status === 'failed');
    if (showOutput) {
      console.log(theme.dim(summarizeOutput(stage.output).replace(/^/gm, '      ')));
    }
  }

  if (report.artifacts.length > 0) {
    printSection('Artifacts');
    for (const artifact of report.artifacts) {
      printListItem(`${artifact.kind}: ${artifact.fileName}`, 1);
    }
    for (const copy of report.persistedArtifacts) {
      printListItem(`saved ${copy}`, 1);
    }
  }

  console.log();
  if (report.success) {
    printSuccess(`Packaged ${report.packageName} ${report.version}`);
    if (report.projectUrl) {
      printKeyValue('Published', report.projectUrl);
    }
  } else {
    printError(`Packaging ${report.packageName} ${report.version} failed`);
  }
}
