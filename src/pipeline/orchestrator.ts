/**
 * Pipeline Orchestrator — drives one packaging run through
 * Init → Generating → Gating → Building → Publishing → Done, with Failed
 * reachable from every non-terminal state.
 *
 * Stages run strictly in sequence. Failures after the workspace exists are
 * converted into stage outcomes; the workspace is released on every exit path
 * before control returns to the caller.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import type { Config } from '../config/schema.js';
import { generatePackageLayout } from '../generators/package-layout.js';
import { validatePackageRequest, type PackageRequest } from '../types/request.js';
import { executeBuild } from './build-executor.js';
import { createDefaultCapabilities } from './capabilities.js';
import { BuildError, CancelledError, GateFailure, WorkspaceError, toPackagerError } from './errors.js';
import { createGateDefinitions, gatesPassed, runQualityGates } from './gate-runner.js';
import { PipelineLogger } from './pipeline-logger.js';
import { publishArtifacts } from './publisher.js';
import { buildReport } from './report.js';
import type {
  BuildArtifact,
  Capabilities,
  GateResult,
  GeneratedTree,
  PipelineReport,
  PipelineState,
  StageName,
  StageOutcome,
  TerminalState,
} from './types.js';
import { WorkspaceManager, type Workspace } from './workspace.js';

// ─── Types ───────────────────────────────────────────────

export interface PipelineOptions {
  config?: Config;
  /** Replace any of the default external capabilities */
  capabilities?: Partial<Capabilities>;
  workspaceManager?: WorkspaceManager;
  /** Copy artifacts here before the workspace is released */
  persistDir?: string;
  /** Checked before each stage starts; in-flight stages are not interrupted */
  signal?: AbortSignal;
  logger?: PipelineLogger;
  onStateChange?: (state: PipelineState) => void;
  onStageComplete?: (outcome: StageOutcome) => void;
}

// ─── Transitions ─────────────────────────────────────────

const ALLOWED_TRANSITIONS: Record<PipelineState, PipelineState[]> = {
  Init: ['Generating', 'Failed'],
  Generating: ['Gating', 'Failed'],
  Gating: ['Building', 'Failed'],
  Building: ['Publishing', 'Done', 'Failed'],
  Publishing: ['Done', 'Failed'],
  Done: [],
  Failed: [],
};

/** Stage a state works on, for failures escaping a stage boundary */
const STATE_STAGE: Record<PipelineState, StageName> = {
  Init: 'generation',
  Generating: 'generation',
  Gating: 'lint',
  Building: 'build',
  Publishing: 'publish',
  Done: 'publish',
  Failed: 'generation',
};

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

interface RunContext {
  request: PackageRequest;
  config: Config;
  capabilities: Capabilities;
  workspace: Workspace;
  logger: PipelineLogger;
  options: PipelineOptions;
  state: PipelineState;
  stages: StageOutcome[];
  gates: GateResult[];
  artifacts: BuildArtifact[];
  persistedArtifacts: string[];
  projectUrl?: string;
}

function transition(ctx: RunContext, to: PipelineState): void {
  if (!canTransition(ctx.state, to)) {
    throw new Error(`Transition from ${ctx.state} to ${to} is not allowed`);
  }
  ctx.logger.debug(ctx.state, `Transitioning to: ${to}`);
  ctx.state = to;
  notify(ctx, 'onStateChange', () => ctx.options.onStateChange?.(to));
}

/** Caller hooks observe the run; a throwing hook is logged and does not alter it */
function notify(ctx: RunContext, hook: string, call: () => void): void {
  try {
    call();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    ctx.logger.warn(ctx.state, `${hook} hook threw: ${reason}`);
  }
}

function record(ctx: RunContext, outcome: StageOutcome): void {
  ctx.stages.push(outcome);
  const level = outcome.status === 'failed' ? 'error' : outcome.status === 'passed' ? 'success' : 'info';
  ctx.logger.log(level, ctx.state, `${outcome.stage}: ${outcome.status}`, outcome.error ? { error: outcome.error } : undefined);
  notify(ctx, 'onStageComplete', () => ctx.options.onStageComplete?.(outcome));
}

function fail(ctx: RunContext, stage: StageName, err: unknown): void {
  const error = toPackagerError(err);
  record(ctx, {
    stage,
    status: 'failed',
    output: error.output,
    error: { kind: error.code, message: error.message },
  });
  transition(ctx, 'Failed');
}

/** Refuse to start stage once the caller has cancelled */
function cancelled(ctx: RunContext, stage: StageName): boolean {
  if (!ctx.options.signal?.aborted) return false;
  fail(ctx, stage, new CancelledError(stage));
  return true;
}

// ─── Stages ──────────────────────────────────────────────

async function generate(ctx: RunContext): Promise<GeneratedTree | null> {
  if (cancelled(ctx, 'generation')) return null;
  transition(ctx, 'Generating');

  try {
    const tree = await generatePackageLayout(ctx.request, ctx.workspace.dir, ctx.config.manifest);
    record(ctx, { stage: 'generation', status: 'passed', output: tree.filesWritten.join('\n') });
    return tree;
  } catch (err) {
    fail(ctx, 'generation', err);
    return null;
  }
}

async function gate(ctx: RunContext, tree: GeneratedTree): Promise<boolean> {
  if (cancelled(ctx, 'lint')) return false;
  transition(ctx, 'Gating');

  const definitions = createGateDefinitions(ctx.capabilities);
  ctx.gates = await runQualityGates(definitions, tree, ctx.request, {
    onGateStart: (name) => ctx.logger.info(ctx.state, `Running ${name} gate`),
  });

  for (const result of ctx.gates) {
    if (result.skipped) {
      record(ctx, { stage: result.name, status: 'skipped', output: result.output });
    } else if (result.passed) {
      record(ctx, { stage: result.name, status: 'passed', output: result.output });
    } else {
      const failure = new GateFailure(result.name, result.output);
      record(ctx, {
        stage: result.name,
        status: 'failed',
        output: result.output,
        error: { kind: failure.code, message: failure.message },
      });
    }
  }

  if (!gatesPassed(ctx.gates)) {
    transition(ctx, 'Failed');
    return false;
  }
  return true;
}

async function persistArtifacts(artifacts: BuildArtifact[], persistDir: string): Promise<string[]> {
  const copies: string[] = [];
  try {
    await fs.mkdir(persistDir, { recursive: true });
    for (const artifact of artifacts) {
      const target = path.join(persistDir, artifact.fileName);
      await fs.copyFile(artifact.path, target);
      copies.push(target);
    }
  } catch (err) {
    await Promise.all(copies.map((copy) => fs.rm(copy, { force: true })));
    const reason = err instanceof Error ? err.message : String(err);
    throw new BuildError(`Failed to copy artifacts to ${persistDir}: ${reason}`);
  }
  return copies;
}

async function build(ctx: RunContext, tree: GeneratedTree): Promise<boolean> {
  if (cancelled(ctx, 'build')) return false;
  transition(ctx, 'Building');

  try {
    const result = await executeBuild(tree, ctx.capabilities.build);
    if (ctx.options.persistDir) {
      ctx.persistedArtifacts = await persistArtifacts(result.artifacts, ctx.options.persistDir);
    }
    ctx.artifacts = result.artifacts;
    record(ctx, { stage: 'build', status: 'passed', output: result.output });
    return true;
  } catch (err) {
    fail(ctx, 'build', err);
    return false;
  }
}

async function publish(ctx: RunContext): Promise<void> {
  const token = ctx.request.pypi_token;
  if (!token) {
    record(ctx, { stage: 'publish', status: 'skipped', output: 'No token supplied; publishing skipped' });
    transition(ctx, 'Done');
    return;
  }

  if (cancelled(ctx, 'publish')) return;
  transition(ctx, 'Publishing');

  try {
    const result = await publishArtifacts(
      ctx.artifacts,
      token,
      ctx.request.repository,
      ctx.request.package_name,
      ctx.request.version,
      ctx.capabilities.publish,
    );
    ctx.projectUrl = result.projectUrl;
    record(ctx, { stage: 'publish', status: 'passed', output: result.output });
  } catch (err) {
    const error = toPackagerError(err);
    record(ctx, {
      stage: 'publish',
      status: 'failed',
      output: error.output,
      error: { kind: error.code, message: error.message },
    });
  }
  // A failed upload does not invalidate the build
  transition(ctx, 'Done');
}

async function runStages(ctx: RunContext): Promise<void> {
  const tree = await generate(ctx);
  if (!tree) return;
  if (!(await gate(ctx, tree))) return;
  if (!(await build(ctx, tree))) return;
  await publish(ctx);
}

// ─── Orchestrator ────────────────────────────────────────

/**
 * Run the packaging pipeline for one request.
 *
 * Throws only ValidationError (before any resource is held) and
 * WorkspaceError (allocation or teardown failure). Every other failure
 * is reported in the returned PipelineReport.
 */
export async function runPackagingPipeline(
  input: unknown,
  options: PipelineOptions = {},
): Promise<PipelineReport> {
  const startedAt = new Date().toISOString();
  const request = validatePackageRequest(input);

  const config = options.config ?? DEFAULT_CONFIG;
  const logger = options.logger ?? new PipelineLogger();
  logger.addSecret(request.pypi_token);
  const workspaceManager = options.workspaceManager ?? new WorkspaceManager({
    baseDir: config.workspace.base_dir,
    prefix: config.workspace.prefix,
  });

  const workspace = await workspaceManager.acquire();
  logger.debug('Init', `Workspace allocated at ${workspace.dir}`);

  const ctx: RunContext = {
    request,
    config,
    capabilities: { ...createDefaultCapabilities(config), ...options.capabilities },
    workspace,
    logger,
    options,
    state: 'Init',
    stages: [],
    gates: [],
    artifacts: [],
    persistedArtifacts: [],
  };

  try {
    await runStages(ctx);
  } catch (err) {
    // Anything escaping a stage boundary still ends the run in Failed
    if (ctx.state !== 'Done' && ctx.state !== 'Failed') {
      fail(ctx, STATE_STAGE[ctx.state], err);
    }
  } finally {
    try {
      await workspace.release();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new WorkspaceError(`Failed to release workspace ${workspace.dir}: ${reason}`);
    }
  }

  const finalState: TerminalState = ctx.state === 'Done' ? 'Done' : 'Failed';
  const report = buildReport({
    finalState,
    packageName: request.package_name,
    version: request.version,
    repository: request.repository,
    stages: ctx.stages,
    gates: ctx.gates,
    artifacts: ctx.artifacts,
    persistedArtifacts: ctx.persistedArtifacts,
    projectUrl: ctx.projectUrl,
    startedAt,
    finishedAt: new Date().toISOString(),
    secrets: [request.pypi_token],
  });

  logger.log(report.success ? 'success' : 'error', finalState, report.success ? 'Packaging complete' : 'Packaging failed');
  return report;
}
