/**
 * CLI commands index
 * Exports all command creators
 */

export { createPackageCommand, buildRequestInput } from './package.js';
export type { PackageCommandOptions, RawPackageRequest } from './package.js';
export { createConfigCommand } from './config.js';
export { createDoctorCommand, runDoctorChecks } from './doctor.js';
export type { ToolCheck } from './doctor.js';
