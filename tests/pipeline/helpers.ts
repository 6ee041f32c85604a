/**
 * Shared builders for pipeline unit tests
 */

import type { PackageRequest } from '../../src/types/request.js';
import type { GeneratedTree } from '../../src/pipeline/types.js';

export function makeRequest(overrides: Partial<PackageRequest> = {}): PackageRequest {
  return {
    source_path: '/tmp/source/awesome.py',
    package_name: 'awesome_tool',
    version: '1.0.0',
    pypi_token: undefined,
    repository: 'pypi',
    run_tests: true,
    lint_code: true,
    min_python: '3.8',
    ...overrides,
  };
}

export function makeTree(root = '/tmp/workspace'): GeneratedTree {
  return {
    root,
    packageDir: `${root}/src/awesome_tool`,
    manifestPath: `${root}/pyproject.toml`,
    readmePath: `${root}/README.md`,
    importName: 'awesome_tool',
    filesWritten: ['README.md', 'pyproject.toml', 'src/awesome_tool/__init__.py', 'src/awesome_tool/awesome.py'],
  };
}
