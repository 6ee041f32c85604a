/**
 * Quality Gate Runner — runs lint and test gates against a generated tree.
 *
 * Gates never short-circuit each other: every enabled gate runs and is
 * recorded. Tool failures of any kind become passed=false results; nothing
 * here throws.
 */

import { toPackagerError } from './errors.js';
import type {
  CheckOutcome,
  GateName,
  GateResult,
  GeneratedTree,
  LintCapability,
  TestCapability,
} from './types.js';
import type { PackageRequest } from '../types/request.js';

// ─── Gate Definition ─────────────────────────────────────

export interface GateDefinition {
  name: GateName;
  /** Whether the request enables this gate */
  enabled: (request: PackageRequest) => boolean;
  /** Whether the tree holds anything for the gate to check */
  applies: (tree: GeneratedTree) => Promise<boolean>;
  run: (tree: GeneratedTree) => Promise<CheckOutcome>;
}

export interface GateRunOptions {
  onGateStart?: (name: GateName) => void;
  onGateComplete?: (result: GateResult) => void;
}

/**
 * Ordered gate definitions: lint, then test
 */
export function createGateDefinitions(capabilities: {
  lint: LintCapability;
  test: TestCapability;
}): GateDefinition[] {
  return [
    {
      name: 'lint',
      enabled: (request) => request.lint_code,
      applies: async () => true,
      run: (tree) => capabilities.lint.run(tree),
    },
    {
      name: 'test',
      enabled: (request) => request.run_tests,
      applies: (tree) => capabilities.test.hasTarget(tree),
      run: (tree) => capabilities.test.run(tree),
    },
  ];
}

function skippedResult(name: GateName, output: string): GateResult {
  return { name, passed: true, skipped: true, output, durationMs: 0 };
}

/**
 * Run a single gate and convert any failure into a result
 */
export async function runGate(
  gate: GateDefinition,
  tree: GeneratedTree,
  request: PackageRequest,
): Promise<GateResult> {
  if (!gate.enabled(request)) {
    return skippedResult(gate.name, '');
  }

  const startTime = Date.now();
  try {
    if (!(await gate.applies(tree))) {
      return skippedResult(gate.name, `No ${gate.name} target found`);
    }

    const outcome = await gate.run(tree);
    return {
      name: gate.name,
      passed: outcome.passed,
      skipped: false,
      output: outcome.output,
      exitCode: outcome.exitCode,
      durationMs: Date.now() - startTime,
    };
  } catch (err) {
    const error = toPackagerError(err);
    return {
      name: gate.name,
      passed: false,
      skipped: false,
      output: [error.message, error.output].filter(Boolean).join('\n'),
      durationMs: Date.now() - startTime,
    };
  }
}

/**
 * Run every gate in order
 */
export async function runQualityGates(
  gates: GateDefinition[],
  tree: GeneratedTree,
  request: PackageRequest,
  options: GateRunOptions = {},
): Promise<GateResult[]> {
  const results: GateResult[] = [];

  for (const gate of gates) {
    options.onGateStart?.(gate.name);
    const result = await runGate(gate, tree, request);
    results.push(result);
    options.onGateComplete?.(result);
  }

  return results;
}

/** True when every gate that ran passed */
export function gatesPassed(results: GateResult[]): boolean {
  return results.every((r) => r.skipped || r.passed);
}
