/**
 * Configuration schema definitions using Zod
 */

import { z } from 'zod';

/**
 * External tool executables
 */
export const ToolSettingsSchema = z.object({
  python: z.string().min(1).default('python3'),
  ruff: z.string().min(1).default('ruff'),
  twine: z.string().min(1).default('twine'),
});

/**
 * Per-stage timeouts in milliseconds
 */
export const TimeoutSettingsSchema = z.object({
  lint: z.number().int().positive().default(5 * 60 * 1000),
  test: z.number().int().positive().default(10 * 60 * 1000),
  build: z.number().int().positive().default(20 * 60 * 1000),
  publish: z.number().int().positive().default(5 * 60 * 1000),
});

/**
 * Workspace allocation settings
 */
export const WorkspaceSettingsSchema = z.object({
  base_dir: z.string().optional(),
  prefix: z.string().min(1).default('wheelwright-'),
});

/**
 * Fixed manifest template values
 */
export const ManifestSettingsSchema = z.object({
  author_name: z.string().default('Wheelwright Packager'),
  author_email: z.string().default('packager@example.com'),
  license: z.string().default('MIT'),
  description: z.string().default('Python package generated by wheelwright'),
});

/**
 * Output settings schema
 */
export const OutputSettingsSchema = z.object({
  verbose: z.boolean().default(false),
  log_file: z.string().optional(),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  tools: ToolSettingsSchema.default({ python: 'python3', ruff: 'ruff', twine: 'twine' }),
  timeouts: TimeoutSettingsSchema.default({
    lint: 5 * 60 * 1000,
    test: 10 * 60 * 1000,
    build: 20 * 60 * 1000,
    publish: 5 * 60 * 1000,
  }),
  workspace: WorkspaceSettingsSchema.default({ prefix: 'wheelwright-' }),
  manifest: ManifestSettingsSchema.default({
    author_name: 'Wheelwright Packager',
    author_email: 'packager@example.com',
    license: 'MIT',
    description: 'Python package generated by wheelwright',
  }),
  output: OutputSettingsSchema.default({ verbose: false }),
});

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type ToolSettings = z.infer<typeof ToolSettingsSchema>;
export type TimeoutSettings = z.infer<typeof TimeoutSettingsSchema>;
export type WorkspaceSettings = z.infer<typeof WorkspaceSettingsSchema>;
export type ManifestSettings = z.infer<typeof ManifestSettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
