/**
 * Report construction — the only place a PipelineReport is assembled.
 * Every caller-visible string passes through secret redaction here.
 */

import { redactSecrets } from './redact.js';
import type {
  BuildArtifact,
  GateResult,
  PipelineReport,
  StageOutcome,
  TerminalState,
} from './types.js';
import type { Repository } from '../types/request.js';

export interface ReportInput {
  finalState: TerminalState;
  packageName: string;
  version: string;
  repository: Repository;
  stages: StageOutcome[];
  gates: GateResult[];
  artifacts: BuildArtifact[];
  persistedArtifacts: string[];
  projectUrl?: string;
  startedAt: string;
  finishedAt: string;
  /** Values to strip from every string */
  secrets: ReadonlyArray<string | undefined>;
}

/**
 * One line per attempted stage plus a verdict
 */
export function formatSummary(
  packageName: string,
  version: string,
  stages: StageOutcome[],
  success: boolean,
): string {
  const lines = stages.map((outcome) => {
    const detail = outcome.error ? ` - ${outcome.error.message}` : '';
    return `${outcome.stage}: ${outcome.status}${detail}`;
  });

  const failed = stages.find((s) => s.status === 'failed');
  lines.push(
    success
      ? `${packageName} ${version}: success`
      : `${packageName} ${version}: failed${failed ? ` at ${failed.stage}` : ''}`,
  );
  return lines.join('\n');
}

/**
 * Overall success: the run reached Done and every attempted stage passed or was skipped
 */
export function isSuccessful(finalState: TerminalState, stages: StageOutcome[]): boolean {
  return finalState === 'Done' && stages.every((s) => s.status !== 'failed');
}

export function buildReport(input: ReportInput): PipelineReport {
  const redact = (text: string): string => redactSecrets(text, input.secrets);

  const stages: StageOutcome[] = input.stages.map((outcome) => ({
    ...outcome,
    output: redact(outcome.output),
    error: outcome.error ? { ...outcome.error, message: redact(outcome.error.message) } : undefined,
  }));
  const gates: GateResult[] = input.gates.map((gate) => ({ ...gate, output: redact(gate.output) }));
  const success = isSuccessful(input.finalState, stages);

  return {
    success,
    finalState: input.finalState,
    packageName: input.packageName,
    version: input.version,
    repository: input.repository,
    stages,
    gates,
    artifacts: input.artifacts.map((a) => ({ ...a })),
    persistedArtifacts: [...input.persistedArtifacts],
    projectUrl: input.projectUrl,
    summary: redact(formatSummary(input.packageName, input.version, stages, success)),
    startedAt: input.startedAt,
    finishedAt: input.finishedAt,
  };
}
