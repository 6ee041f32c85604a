/**
 * Doctor command
 * Checks that the external tools the pipeline drives are installed
 */

import { Command } from 'commander';
import { tmpdir } from 'node:os';
import { loadConfig, type Config } from '../../config/index.js';
import { runCommand } from '../../pipeline/check-runner.js';
import { printHeader, printSuccess, printError, printWarning } from '../output.js';

export interface ToolCheck {
  name: string;
  passed: boolean;
  message: string;
  /** Needed by every run, or only by some */
  severity: 'critical' | 'optional';
}

const PROBE_TIMEOUT_MS = 30 * 1000;

/**
 * Probe each tool with a version query
 *
 * @param config - Effective configuration
 * @returns One check per tool
 */
export async function runDoctorChecks(config: Config): Promise<ToolCheck[]> {
  const probes: Array<{ name: string; file: string; args: string[]; severity: ToolCheck['severity'] }> = [
    { name: 'Python', file: config.tools.python, args: ['--version'], severity: 'critical' },
    { name: 'build', file: config.tools.python, args: ['-m', 'build', '--version'], severity: 'critical' },
    { name: 'pytest', file: config.tools.python, args: ['-m', 'pytest', '--version'], severity: 'optional' },
    { name: 'ruff', file: config.tools.ruff, args: ['--version'], severity: 'optional' },
    { name: 'twine', file: config.tools.twine, args: ['--version'], severity: 'optional' },
  ];

  const checks: ToolCheck[] = [];
  for (const probe of probes) {
    const result = await runCommand(probe.file, probe.args, { cwd: tmpdir(), timeoutMs: PROBE_TIMEOUT_MS });
    const passed = result.exitCode === 0;
    const firstLine = `${result.stdout}\n${result.stderr}`.trim().split('\n')[0] ?? '';
    checks.push({
      name: probe.name,
      passed,
      message: passed ? firstLine : result.error ?? `exit code ${result.exitCode ?? 'unknown'}`,
      severity: probe.severity,
    });
  }
  return checks;
}

/**
 * Create the doctor command
 */
export function createDoctorCommand(): Command {
  return new Command('doctor')
    .description('Check that python, build, pytest, ruff and twine are available')
    .action(async () => {
      try {
        const { config } = await loadConfig();
        printHeader('Tool Check');

        const checks = await runDoctorChecks(config);
        for (const check of checks) {
          if (check.passed) printSuccess(`${check.name}: ${check.message}`);
          else if (check.severity === 'critical') printError(`${check.name}: ${check.message}`);
          else printWarning(`${check.name}: ${check.message}`);
        }

        const healthy = checks.every((c) => c.passed || c.severity === 'optional');
        process.exitCode = healthy ? 0 : 1;
      } catch (error) {
        printError(error instanceof Error ? error.message : 'Unknown error');
        process.exitCode = 1;
      }
    });
}
