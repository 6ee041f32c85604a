/**
 * Packaging error taxonomy.
 *
 * ValidationError and WorkspaceError are the only kinds that escape a
 * pipeline run; every other kind is caught at its stage boundary and
 * recorded in the report.
 */

export type PackagerErrorCode =
  | 'VALIDATION_ERROR'
  | 'WORKSPACE_ERROR'
  | 'GENERATION_ERROR'
  | 'GATE_FAILURE'
  | 'BUILD_ERROR'
  | 'PUBLISH_ERROR'
  | 'CANCELLED'
  | 'INTERNAL_ERROR';

export class PackagerError extends Error {
  readonly code: PackagerErrorCode;

  /** Captured diagnostic output of the external tool, if any */
  readonly output: string;

  constructor(code: PackagerErrorCode, message: string, output = '') {
    super(message);
    this.name = 'PackagerError';
    this.code = code;
    this.output = output;
  }
}

export class ValidationError extends PackagerError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class WorkspaceError extends PackagerError {
  constructor(message: string) {
    super('WORKSPACE_ERROR', message);
    this.name = 'WorkspaceError';
  }
}

export class GenerationError extends PackagerError {
  constructor(message: string) {
    super('GENERATION_ERROR', message);
    this.name = 'GenerationError';
  }
}

/** A quality gate reported failure. Recorded in the report, never thrown by the pipeline */
export class GateFailure extends PackagerError {
  readonly gate: string;

  constructor(gate: string, output: string) {
    super('GATE_FAILURE', `Quality gate failed: ${gate}`, output);
    this.name = 'GateFailure';
    this.gate = gate;
  }
}

export class BuildError extends PackagerError {
  constructor(message: string, output = '') {
    super('BUILD_ERROR', message, output);
    this.name = 'BuildError';
  }
}

export class PublishError extends PackagerError {
  constructor(message: string, output = '') {
    super('PUBLISH_ERROR', message, output);
    this.name = 'PublishError';
  }
}

export class CancelledError extends PackagerError {
  constructor(stage: string) {
    super('CANCELLED', `Run cancelled before ${stage}`);
    this.name = 'CancelledError';
  }
}

export function isPackagerError(value: unknown): value is PackagerError {
  return value instanceof PackagerError;
}

/**
 * Normalize anything thrown into a PackagerError
 */
export function toPackagerError(error: unknown): PackagerError {
  if (isPackagerError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new PackagerError('INTERNAL_ERROR', error.message);
  }
  return new PackagerError('INTERNAL_ERROR', String(error));
}
