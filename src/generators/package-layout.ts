/**
 * Package layout generator
 * Materializes src/<import name>/, pyproject.toml and README.md inside a workspace
 */

import { promises as fs } from 'node:fs';
import type { Stats } from 'node:fs';
import path from 'node:path';
import type { ManifestSettings } from '../config/schema.js';
import { GenerationError } from '../pipeline/errors.js';
import type { GeneratedTree } from '../pipeline/types.js';
import {
  MIN_PYTHON_PATTERN,
  PACKAGE_NAME_PATTERN,
  VERSION_PATTERN,
  toImportName,
  type PackageRequest,
} from '../types/request.js';
import {
  generatePackageInit,
  generatePackageManifest,
  generatePackageReadme,
} from './templates/python-package.js';

export const MANIFEST_FILE = 'pyproject.toml';
export const README_FILE = 'README.md';
export const INIT_FILE = '__init__.py';

/** Top-level source directory moved beside the package instead of into it */
export const TESTS_DIR = 'tests';

/** Directory names never copied out of a source tree */
const IGNORED_DIRS = new Set([
  '__pycache__',
  '.git',
  '.hg',
  '.venv',
  'venv',
  '.mypy_cache',
  '.pytest_cache',
  '.ruff_cache',
  '.tox',
  'node_modules',
  'dist',
  'build',
]);

const IGNORED_FILE_EXTENSIONS = new Set(['.pyc', '.pyo']);

type SourcePlan =
  | { kind: 'file'; path: string }
  | { kind: 'directory'; path: string; files: string[] };

function isIgnoredDir(name: string): boolean {
  return IGNORED_DIRS.has(name) || name.endsWith('.egg-info');
}

/**
 * List files under dir relative to it (posix separators, sorted)
 */
async function listSourceFiles(
  dir: string,
  prefix = '',
  ancestors: ReadonlySet<string> = new Set(),
): Promise<string[]> {
  const chain = new Set(ancestors).add(await fs.realpath(dir));
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;

    // Links are followed: what they point to is copied
    let kind: 'file' | 'directory' | 'other' = entry.isDirectory() ? 'directory' : entry.isFile() ? 'file' : 'other';
    if (entry.isSymbolicLink()) {
      const target = await statOrNull(full);
      if (!target) {
        throw new GenerationError(`Broken symbolic link in source: ${full}`);
      }
      kind = target.isDirectory() ? 'directory' : target.isFile() ? 'file' : 'other';
    }

    if (kind === 'directory') {
      if (isIgnoredDir(entry.name)) continue;
      if (chain.has(await fs.realpath(full))) {
        throw new GenerationError(`Symbolic link cycle in source: ${full}`);
      }
      files.push(...(await listSourceFiles(full, relative, chain)));
    } else if (kind === 'file' && !IGNORED_FILE_EXTENSIONS.has(path.extname(entry.name))) {
      files.push(relative);
    }
  }

  return files.sort();
}

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch {
    return null;
  }
}

/**
 * Check the request and inspect the source. Writes nothing.
 */
export async function planSource(request: PackageRequest): Promise<SourcePlan> {
  if (!PACKAGE_NAME_PATTERN.test(request.package_name)) {
    throw new GenerationError(`Invalid package name: ${request.package_name}`);
  }
  if (!VERSION_PATTERN.test(request.version)) {
    throw new GenerationError(`Invalid version: ${request.version}`);
  }
  if (!MIN_PYTHON_PATTERN.test(request.min_python)) {
    throw new GenerationError(`Invalid minimum Python version: ${request.min_python}`);
  }

  const sourcePath = path.resolve(request.source_path);
  const stats = await statOrNull(sourcePath);
  if (!stats) {
    throw new GenerationError(`Source path does not exist: ${sourcePath}`);
  }

  if (stats.isFile()) {
    if (path.extname(sourcePath) !== '.py') {
      throw new GenerationError(`Source file is not a Python module: ${sourcePath}`);
    }
    if (stats.size === 0) {
      throw new GenerationError(`Source file is empty: ${sourcePath}`);
    }
    return { kind: 'file', path: sourcePath };
  }

  if (stats.isDirectory()) {
    const files = await listSourceFiles(sourcePath);
    if (files.length === 0) {
      throw new GenerationError(`Source directory is empty: ${sourcePath}`);
    }
    return { kind: 'directory', path: sourcePath, files };
  }

  throw new GenerationError(`Source path is neither a file nor a directory: ${sourcePath}`);
}

async function copyInto(from: string, to: string): Promise<void> {
  await fs.mkdir(path.dirname(to), { recursive: true });
  await fs.copyFile(from, to);
}

/**
 * Generate the package tree inside root
 *
 * @param request - Validated package request
 * @param root - Workspace directory
 * @param manifest - Fixed manifest template values
 * @returns The generated tree
 */
export async function generatePackageLayout(
  request: PackageRequest,
  root: string,
  manifest: ManifestSettings,
): Promise<GeneratedTree> {
  try {
    const plan = await planSource(request);
    return await writeLayout(request, plan, root, manifest);
  } catch (err) {
    if (err instanceof GenerationError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new GenerationError(`Layout generation failed: ${reason}`);
  }
}

async function writeLayout(
  request: PackageRequest,
  plan: SourcePlan,
  root: string,
  manifest: ManifestSettings,
): Promise<GeneratedTree> {
  const importName = toImportName(request.package_name);
  const packageDir = path.join(root, 'src', importName);
  const written: string[] = [];

  await fs.mkdir(packageDir, { recursive: true });

  if (plan.kind === 'file') {
    const fileName = path.basename(plan.path);
    await copyInto(plan.path, path.join(packageDir, fileName));
    written.push(`src/${importName}/${fileName}`);
  } else {
    for (const file of plan.files) {
      const [head, ...rest] = file.split('/');
      const target = head === TESTS_DIR && rest.length > 0
        ? `${TESTS_DIR}/${rest.join('/')}`
        : `src/${importName}/${file}`;
      await copyInto(path.join(plan.path, ...file.split('/')), path.join(root, ...target.split('/')));
      written.push(target);
    }
  }

  const initPath = path.join(packageDir, INIT_FILE);
  if (!(await statOrNull(initPath))) {
    await fs.writeFile(initPath, generatePackageInit(request.version), 'utf-8');
    written.push(`src/${importName}/${INIT_FILE}`);
  }

  const manifestPath = path.join(root, MANIFEST_FILE);
  await fs.writeFile(
    manifestPath,
    generatePackageManifest({
      packageName: request.package_name,
      version: request.version,
      minPython: request.min_python,
      settings: manifest,
    }),
    'utf-8',
  );
  written.push(MANIFEST_FILE);

  const readmePath = path.join(root, README_FILE);
  await fs.writeFile(
    readmePath,
    generatePackageReadme(request.package_name, importName, manifest.description),
    'utf-8',
  );
  written.push(README_FILE);

  return {
    root,
    packageDir,
    manifestPath,
    readmePath,
    importName,
    filesWritten: written.sort(),
  };
}
