/**
 * Package command
 * One-shot packaging of a Python file or directory
 */

import { Command } from 'commander';
import path from 'node:path';
import { loadConfig, ENV_VARS } from '../../config/index.js';
import { isPackagerError } from '../../pipeline/errors.js';
import { runPackagingPipeline } from '../../pipeline/orchestrator.js';
import { PipelineLogger } from '../../pipeline/pipeline-logger.js';
import type { PackageRequestInput } from '../../types/request.js';
import type { StageName } from '../../pipeline/types.js';
import {
  printError,
  printInfo,
  printLogEntry,
  printReport,
  startSpinner,
  stopSpinner,
  succeedSpinner,
  failSpinner,
} from '../output.js';

export interface PackageCommandOptions {
  name: string;
  pkgVersion: string;
  repository: string;
  tests: boolean;
  lint: boolean;
  publish: boolean;
  minPython: string;
  outDir: string;
  json?: boolean;
  verbose?: boolean;
}

/** Request as read from argv; the repository is validated by the pipeline */
export type RawPackageRequest = Omit<PackageRequestInput, 'repository'> & { repository: string };

const STAGE_LABELS: Record<StageName, string> = {
  generation: 'Creating package structure',
  lint: 'Running linter',
  test: 'Running tests',
  build: 'Building distributions',
  publish: 'Uploading',
};

/**
 * Build the raw request from CLI arguments. The token comes from the
 * environment only, never from argv.
 */
export function buildRequestInput(
  source: string,
  options: PackageCommandOptions,
  env: NodeJS.ProcessEnv = process.env,
): RawPackageRequest {
  const token = options.publish ? env[ENV_VARS.PYPI_TOKEN] : undefined;
  return {
    source_path: source,
    package_name: options.name,
    version: options.pkgVersion,
    pypi_token: token,
    // Checked against the closed set by the request schema
    repository: options.repository,
    run_tests: options.tests,
    lint_code: options.lint,
    min_python: options.minPython,
  };
}

/**
 * Create the package command
 */
export function createPackageCommand(): Command {
  return new Command('package')
    .description('Package a Python file or directory, optionally uploading it')
    .argument('<source>', 'Python file or directory to package')
    .requiredOption('-n, --name <name>', 'Distribution name')
    .requiredOption('--pkg-version <version>', 'Package version (e.g. 1.0.0)')
    .option('-r, --repository <repository>', 'Target index (pypi, testpypi)', 'pypi')
    .option('--min-python <version>', 'Minimum Python version', '3.8')
    .option('-o, --out-dir <dir>', 'Where to keep built distributions', 'dist')
    .option('--no-tests', 'Skip the test gate')
    .option('--no-lint', 'Skip the lint gate')
    .option('--no-publish', `Do not upload even when ${ENV_VARS.PYPI_TOKEN} is set`)
    .option('--json', 'Print the report as JSON')
    .option('-v, --verbose', 'Show stage output and debug log')
    .action(async (source: string, options: PackageCommandOptions) => {
      try {
        const { config } = await loadConfig();
        const verbose = options.verbose ?? config.output.verbose;
        const request = buildRequestInput(source, options);
        const logger = new PipelineLogger({
          secrets: [request.pypi_token],
          quiet: !verbose,
          sink: verbose && !options.json ? printLogEntry : undefined,
        });

        // Ctrl-C stops the run before its next stage; the workspace is still cleaned up
        const controller = new AbortController();
        const onInterrupt = (): void => controller.abort();
        process.once('SIGINT', onInterrupt);

        const interactive = !options.json && !verbose;
        try {
          const report = await runPackagingPipeline(request, {
            config,
            logger,
            signal: controller.signal,
            persistDir: path.resolve(options.outDir),
            onStateChange: (state) => {
              if (interactive && state === 'Generating') startSpinner(STAGE_LABELS.generation);
            },
            onStageComplete: (outcome) => {
              if (!interactive) return;
              const label = `${outcome.stage}: ${outcome.status}`;
              if (outcome.status === 'failed') failSpinner(label);
              else succeedSpinner(label);
              const next = nextStage(outcome.stage);
              if (outcome.status !== 'failed' && next) startSpinner(STAGE_LABELS[next]);
            },
          });
          stopSpinner();

          if (options.json) {
            console.log(JSON.stringify(report, null, 2));
          } else {
            printReport(report, verbose);
          }
          if (config.output.log_file) {
            await logger.persist(path.resolve(config.output.log_file));
            if (!options.json) printInfo(`Log written to ${config.output.log_file}`);
          }
          process.exitCode = report.success ? 0 : 1;
        } finally {
          process.removeListener('SIGINT', onInterrupt);
        }
      } catch (error) {
        stopSpinner();
        printError(error instanceof Error ? error.message : 'Unknown error');
        process.exitCode = isPackagerError(error) && error.code === 'VALIDATION_ERROR' ? 2 : 1;
      }
    });
}

const STAGE_ORDER: StageName[] = ['generation', 'lint', 'test', 'build', 'publish'];

function nextStage(stage: StageName): StageName | undefined {
  return STAGE_ORDER[STAGE_ORDER.indexOf(stage) + 1];
}
