/**
 * Package request type definitions
 * Validates the single input a packaging run accepts
 */

import { existsSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ValidationError } from '../pipeline/errors.js';

/**
 * Distribution name: alphanumerics, '-', '_' and '.', starting and ending
 * with an alphanumeric
 */
export const PACKAGE_NAME_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?$/;

/**
 * MAJOR.MINOR[.PATCH], then at most one pre-release, one post and one dev
 * segment in that order, and a local segment
 * e.g. 1.0.0, 1.0.0rc1, 1.0.0-beta.2, 2.1.post3, 0.1.dev0, 1.0rc1.post2.dev3, 1.0.0+build.5
 */
export const VERSION_PATTERN =
  /^\d+\.\d+(?:\.\d+)?(?:[-.]?(?:a|b|rc|alpha|beta|pre)\.?\d*)?(?:[-.]?post\.?\d*)?(?:[-.]?dev\.?\d*)?(?:\+[A-Za-z0-9]+(?:\.[A-Za-z0-9]+)*)?$/;

/**
 * Minimum Python: 3.N or 3.N.M
 */
export const MIN_PYTHON_PATTERN = /^3\.\d+(?:\.\d+)?$/;

/**
 * Target repositories. Closed set, resolved to upload endpoints by the publisher
 */
export const RepositorySchema = z.enum(['pypi', 'testpypi']);
export type Repository = z.infer<typeof RepositorySchema>;

/**
 * Package request schema
 */
export const PackageRequestSchema = z.object({
  source_path: z.string().min(1, 'source_path is required'),
  package_name: z
    .string()
    .regex(PACKAGE_NAME_PATTERN, 'package_name must contain only letters, digits, "-", "_" or "."'),
  version: z.string().regex(VERSION_PATTERN, 'version must look like 1.0.0'),
  pypi_token: z
    .string()
    .optional()
    .transform((token) => (token && token.trim().length > 0 ? token : undefined)),
  repository: RepositorySchema.default('pypi'),
  run_tests: z.boolean().default(true),
  lint_code: z.boolean().default(true),
  min_python: z.string().regex(MIN_PYTHON_PATTERN, 'min_python must look like 3.8').default('3.8'),
});

/**
 * Raw request as a caller writes it (defaults not yet applied)
 */
export type PackageRequestInput = z.input<typeof PackageRequestSchema>;

/**
 * Validated, immutable request
 */
export type PackageRequest = Readonly<z.output<typeof PackageRequestSchema>>;

/**
 * Validate a raw request, including that the source path exists.
 * Throws ValidationError; never touches anything but the source path.
 */
export function validatePackageRequest(input: unknown): PackageRequest {
  const result = PackageRequestSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`,
    );
    throw new ValidationError(`Invalid package request: ${issues.join('; ')}`, issues);
  }

  const request = result.data;
  const sourcePath = path.resolve(request.source_path);
  if (!existsSync(sourcePath)) {
    throw new ValidationError(`Source path does not exist: ${request.source_path}`, [
      `source_path: ${request.source_path} not found`,
    ]);
  }

  return Object.freeze({ ...request, source_path: sourcePath });
}

/**
 * Convert a distribution name to the import package name
 * ("Awesome-Tool.core" -> "awesome_tool_core")
 */
export function toImportName(packageName: string): string {
  return packageName.toLowerCase().replace(/[-_.]+/g, '_');
}
