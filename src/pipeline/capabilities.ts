/**
 * Default external capabilities: ruff, pytest, python -m build, twine.
 * Each is a thin wrapper over runCommand; the orchestrator only sees the
 * capability interfaces, so tests substitute in-process fakes.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { Config } from '../config/schema.js';
import { TESTS_DIR } from '../generators/package-layout.js';
import { BuildError } from './errors.js';
import { formatCommandOutput, runCommand } from './check-runner.js';
import type {
  BuildCapability,
  Capabilities,
  CheckOutcome,
  GeneratedTree,
  LintCapability,
  PublishCapability,
  TestCapability,
} from './types.js';

/** Build output directory, relative to the tree root */
export const DIST_DIR = 'dist';

/** pytest: "no tests were collected" */
const PYTEST_NO_TESTS_COLLECTED = 5;

const TEST_FILE_PATTERN = /^(test_.*|.*_test)\.py$/;

/** Keep tools from dropping caches and bytecode into the tree */
const NO_WRITE_ENV = { PYTHONDONTWRITEBYTECODE: '1' };

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Find pytest-style test files under dir (relative paths, sorted)
 */
export async function findTestFiles(dir: string): Promise<string[]> {
  if (!(await isDirectory(dir))) return [];

  const found: string[] = [];
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      for (const nested of await findTestFiles(full)) {
        found.push(path.join(entry.name, nested));
      }
    } else if (entry.isFile() && TEST_FILE_PATTERN.test(entry.name)) {
      found.push(entry.name);
    }
  }
  return found.sort();
}

/**
 * Directories pytest should collect from: tests/ beside the package when it
 * holds test files, otherwise the package itself when it does
 */
export async function resolveTestTargets(tree: GeneratedTree): Promise<string[]> {
  const testsDir = path.join(tree.root, TESTS_DIR);
  if ((await findTestFiles(testsDir)).length > 0) {
    return [testsDir];
  }
  if ((await findTestFiles(tree.packageDir)).length > 0) {
    return [tree.packageDir];
  }
  return [];
}

// ─── Lint ────────────────────────────────────────────────

export function createRuffLint(config: Config): LintCapability {
  return {
    async run(tree: GeneratedTree): Promise<CheckOutcome> {
      const result = await runCommand(config.tools.ruff, ['check', '--no-cache', 'src'], {
        cwd: tree.root,
        timeoutMs: config.timeouts.lint,
      });
      return {
        passed: result.exitCode === 0,
        output: formatCommandOutput(result),
        exitCode: result.exitCode,
      };
    },
  };
}

// ─── Test ────────────────────────────────────────────────

export function createPytestRunner(config: Config): TestCapability {
  return {
    async hasTarget(tree: GeneratedTree): Promise<boolean> {
      return (await resolveTestTargets(tree)).length > 0;
    },

    async run(tree: GeneratedTree): Promise<CheckOutcome> {
      const targets = await resolveTestTargets(tree);
      const result = await runCommand(
        config.tools.python,
        ['-m', 'pytest', ...targets, '-q', '-p', 'no:cacheprovider'],
        {
          cwd: tree.root,
          timeoutMs: config.timeouts.test,
          env: { ...NO_WRITE_ENV, PYTHONPATH: path.join(tree.root, 'src') },
        },
      );
      return {
        passed: result.exitCode === 0 || result.exitCode === PYTEST_NO_TESTS_COLLECTED,
        output: formatCommandOutput(result),
        exitCode: result.exitCode,
      };
    },
  };
}

// ─── Build ───────────────────────────────────────────────

export function createPythonBuild(config: Config): BuildCapability {
  return {
    async build(tree: GeneratedTree) {
      const distDir = path.join(tree.root, DIST_DIR);
      const result = await runCommand(
        config.tools.python,
        ['-m', 'build', '--sdist', '--wheel', '--outdir', distDir, tree.root],
        { cwd: tree.root, timeoutMs: config.timeouts.build, env: NO_WRITE_ENV },
      );
      const output = formatCommandOutput(result);

      if (result.exitCode !== 0) {
        throw new BuildError(
          result.error ?? `Build failed with exit code ${result.exitCode ?? 'unknown'}`,
          output,
        );
      }

      const files = (await isDirectory(distDir)) ? (await fs.readdir(distDir)).sort() : [];
      return {
        artifactPaths: files.map((file) => path.join(distDir, file)),
        output,
      };
    },
  };
}

// ─── Publish ─────────────────────────────────────────────

export function createTwineUpload(config: Config): PublishCapability {
  return {
    async upload(artifactPaths: string[], token: string, endpoint: string) {
      // Credentials travel only in the child's environment
      const result = await runCommand(
        config.tools.twine,
        ['upload', '--repository-url', endpoint, '--non-interactive', '--disable-progress-bar', ...artifactPaths],
        {
          cwd: path.dirname(artifactPaths[0] ?? '.'),
          timeoutMs: config.timeouts.publish,
          env: { TWINE_USERNAME: '__token__', TWINE_PASSWORD: token },
        },
      );
      return {
        succeeded: result.exitCode === 0,
        output: formatCommandOutput(result),
      };
    },
  };
}

/** Factory for the full default capability set */
export function createDefaultCapabilities(config: Config): Capabilities {
  return {
    lint: createRuffLint(config),
    test: createPytestRunner(config),
    build: createPythonBuild(config),
    publish: createTwineUpload(config),
  };
}
