/**
 * Python package template functions
 * Generates the manifest, README and package initializer of a packaged tree.
 * Output depends only on the arguments, so identical requests produce
 * byte-identical files.
 */

import type { ManifestSettings } from '../../config/schema.js';

export interface ManifestInput {
  packageName: string;
  version: string;
  minPython: string;
  settings: ManifestSettings;
}

/**
 * Trove classifiers for the licenses the template knows about
 */
const LICENSE_CLASSIFIERS: Record<string, string> = {
  MIT: 'License :: OSI Approved :: MIT License',
  'Apache-2.0': 'License :: OSI Approved :: Apache Software License',
  'BSD-3-Clause': 'License :: OSI Approved :: BSD License',
  'GPL-3.0': 'License :: OSI Approved :: GNU General Public License v3 (GPLv3)',
};

/**
 * Escape a value for a TOML basic string
 */
export function tomlString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}

/**
 * "3.8" -> "py38", "3.10.2" -> "py310"
 */
export function toRuffTarget(minPython: string): string {
  const [major, minor] = minPython.split('.');
  return `py${major}${minor ?? ''}`;
}

/**
 * Generate pyproject.toml content
 */
export function generatePackageManifest(input: ManifestInput): string {
  const { packageName, version, minPython, settings } = input;

  const classifiers = ['Programming Language :: Python :: 3'];
  const licenseClassifier = LICENSE_CLASSIFIERS[settings.license];
  if (licenseClassifier) {
    classifiers.push(licenseClassifier);
  }
  classifiers.push('Operating System :: OS Independent');

  return `[build-system]
requires = ["setuptools>=61.0"]
build-backend = "setuptools.build_meta"

[project]
name = ${tomlString(packageName)}
version = ${tomlString(version)}
description = ${tomlString(settings.description)}
readme = "README.md"
requires-python = ${tomlString(`>=${minPython}`)}
license = { text = ${tomlString(settings.license)} }
authors = [
    { name = ${tomlString(settings.author_name)}, email = ${tomlString(settings.author_email)} },
]
classifiers = [
${classifiers.map((c) => `    ${tomlString(c)},`).join('\n')}
]

[tool.setuptools.packages.find]
where = ["src"]

[tool.ruff]
line-length = 120
target-version = ${tomlString(toRuffTarget(minPython))}

[tool.ruff.lint]
select = ["E", "F", "W", "I"]
`;
}

/**
 * Generate README.md content
 */
export function generatePackageReadme(packageName: string, importName: string, description: string): string {
  return `# ${packageName}

${description}

## Installation

\`\`\`bash
pip install ${packageName}
\`\`\`

## Usage

\`\`\`python
import ${importName}

print(${importName}.__version__)
\`\`\`
`;
}

/**
 * Generate the package __init__.py
 */
export function generatePackageInit(version: string): string {
  return `__version__ = ${JSON.stringify(version)}\n`;
}
