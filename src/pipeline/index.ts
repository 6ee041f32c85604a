/**
 * Pipeline module — re-exports all public APIs.
 */

// Core types
export type {
  PipelineState,
  TerminalState,
  GeneratedTree,
  GateName,
  GateResult,
  ArtifactKind,
  BuildArtifact,
  CheckOutcome,
  LintCapability,
  TestCapability,
  BuildOutput,
  BuildCapability,
  UploadOutcome,
  PublishCapability,
  Capabilities,
  StageName,
  StageStatus,
  StageError,
  StageOutcome,
  PipelineReport,
} from './types.js';

// Request
export {
  PackageRequestSchema,
  RepositorySchema,
  validatePackageRequest,
  toImportName,
} from '../types/request.js';
export type { PackageRequest, PackageRequestInput, Repository } from '../types/request.js';

// Errors
export {
  PackagerError,
  ValidationError,
  WorkspaceError,
  GenerationError,
  GateFailure,
  BuildError,
  PublishError,
  CancelledError,
  isPackagerError,
  toPackagerError,
} from './errors.js';
export type { PackagerErrorCode } from './errors.js';

// Orchestrator
export { runPackagingPipeline, canTransition } from './orchestrator.js';
export type { PipelineOptions } from './orchestrator.js';

// Workspace
export { WorkspaceManager, Workspace, createWorkspaceManager } from './workspace.js';
export type { WorkspaceOptions } from './workspace.js';

// Layout
export { generatePackageLayout, planSource } from '../generators/package-layout.js';

// Gates
export { createGateDefinitions, runGate, runQualityGates, gatesPassed } from './gate-runner.js';
export type { GateDefinition, GateRunOptions } from './gate-runner.js';

// Build / Publish
export { executeBuild, classifyArtifact } from './build-executor.js';
export type { BuildResult } from './build-executor.js';
export { publishArtifacts, resolveEndpoint, projectUrl, UPLOAD_ENDPOINTS } from './publisher.js';
export type { PublishResult } from './publisher.js';

// Capabilities
export {
  createDefaultCapabilities,
  createRuffLint,
  createPytestRunner,
  createPythonBuild,
  createTwineUpload,
} from './capabilities.js';
export { runCommand } from './check-runner.js';
export type { CommandOptions, CommandResult } from './check-runner.js';

// Report & logging
export { buildReport, formatSummary, isSuccessful } from './report.js';
export { redactSecrets } from './redact.js';
export { PipelineLogger } from './pipeline-logger.js';
export type { LogEntry, LogLevel, LogSink } from './pipeline-logger.js';
