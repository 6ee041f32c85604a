/**
 * Pipeline type definitions — states, stage outcomes, capabilities, report.
 */

import type { PackagerErrorCode } from './errors.js';
import type { Repository } from '../types/request.js';

// ─── States ──────────────────────────────────────────────

export type PipelineState =
  | 'Init'
  | 'Generating'
  | 'Gating'
  | 'Building'
  | 'Publishing'
  | 'Done'
  | 'Failed';

export type TerminalState = Extract<PipelineState, 'Done' | 'Failed'>;

// ─── Generated Tree ──────────────────────────────────────

export interface GeneratedTree {
  /** Workspace root; the build capability runs here */
  root: string;
  /** src/<import name> */
  packageDir: string;
  manifestPath: string;
  readmePath: string;
  importName: string;
  /** Paths relative to root, sorted */
  filesWritten: string[];
}

// ─── Gates ───────────────────────────────────────────────

export type GateName = 'lint' | 'test';

export interface GateResult {
  name: GateName;
  passed: boolean;
  skipped: boolean;
  output: string;
  /** Exit code of the tool; absent when it was skipped or could not be started */
  exitCode?: number;
  durationMs: number;
}

// ─── Artifacts ───────────────────────────────────────────

export type ArtifactKind = 'sdist' | 'wheel';

export interface BuildArtifact {
  kind: ArtifactKind;
  path: string;
  fileName: string;
}

// ─── Capabilities ────────────────────────────────────────

export interface CheckOutcome {
  passed: boolean;
  output: string;
  exitCode?: number;
}

/** Must not mutate the tree */
export interface LintCapability {
  run(tree: GeneratedTree): Promise<CheckOutcome>;
}

export interface TestCapability {
  /** False when there is nothing to test; the gate is then skipped */
  hasTarget(tree: GeneratedTree): Promise<boolean>;
  run(tree: GeneratedTree): Promise<CheckOutcome>;
}

export interface BuildOutput {
  artifactPaths: string[];
  output: string;
}

/** Throws BuildError (or any error) when the backend fails */
export interface BuildCapability {
  build(tree: GeneratedTree): Promise<BuildOutput>;
}

export interface UploadOutcome {
  succeeded: boolean;
  output: string;
}

export interface PublishCapability {
  upload(artifactPaths: string[], token: string, endpoint: string): Promise<UploadOutcome>;
}

export interface Capabilities {
  lint: LintCapability;
  test: TestCapability;
  build: BuildCapability;
  publish: PublishCapability;
}

// ─── Report ──────────────────────────────────────────────

export type StageName = 'generation' | GateName | 'build' | 'publish';

export type StageStatus = 'passed' | 'failed' | 'skipped';

export interface StageError {
  kind: PackagerErrorCode;
  message: string;
}

export interface StageOutcome {
  stage: StageName;
  status: StageStatus;
  output: string;
  error?: StageError;
}

export interface PipelineReport {
  success: boolean;
  finalState: TerminalState;
  packageName: string;
  version: string;
  repository: Repository;
  stages: StageOutcome[];
  gates: GateResult[];
  artifacts: BuildArtifact[];
  /** Copies of the artifacts that outlive the workspace */
  persistedArtifacts: string[];
  /** Project page after a successful upload */
  projectUrl?: string;
  summary: string;
  startedAt: string;
  finishedAt: string;
}
