/**
 * Orchestrator tests — full runs against in-process capabilities:
 * state transitions, fail-fast gating, publish gating, redaction,
 * cancellation and workspace cleanup on every exit path.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { runPackagingPipeline } from '../../src/pipeline/orchestrator.js';
import { Workspace, WorkspaceManager } from '../../src/pipeline/workspace.js';
import { ValidationError, WorkspaceError } from '../../src/pipeline/errors.js';
import { PipelineLogger } from '../../src/pipeline/pipeline-logger.js';
import type { PipelineState, StageOutcome } from '../../src/pipeline/types.js';
import { fakeBuild, fakeCapabilities, fakeLint, fakePublish, fakeTests } from './fakes.js';

let baseDir: string;
let workspacesDir: string;
let manager: WorkspaceManager;

function writeSingleFile(): string {
  const file = join(baseDir, 'source', 'awesome.py');
  mkdirSync(join(baseDir, 'source'), { recursive: true });
  writeFileSync(file, 'def greet():\n    return "hi"\n');
  return file;
}

function writeProjectDir(): string {
  const dir = join(baseDir, 'project');
  mkdirSync(join(dir, 'tests'), { recursive: true });
  writeFileSync(join(dir, 'core.py'), 'def add(a, b):\n    return a - b\n');
  writeFileSync(join(dir, 'tests', 'test_core.py'), 'def test_add():\n    assert add(1, 2) == 3\n');
  return dir;
}

function statuses(stages: StageOutcome[]): string[] {
  return stages.map((s) => `${s.stage}:${s.status}`);
}

beforeEach(() => {
  baseDir = mkdtempSync(join(tmpdir(), 'wheelwright-orchestrator-'));
  workspacesDir = join(baseDir, 'workspaces');
  manager = new WorkspaceManager({ baseDir: workspacesDir });
});

afterEach(() => {
  rmSync(baseDir, { recursive: true, force: true });
});

describe('runPackagingPipeline', () => {
  it('packages a single file with lint on and tests off', async () => {
    const lint = fakeLint();
    const tests = fakeTests();
    const build = fakeBuild();

    const report = await runPackagingPipeline(
      {
        source_path: writeSingleFile(),
        package_name: 'awesome_tool',
        version: '1.0.0',
        lint_code: true,
        run_tests: false,
      },
      {
        workspaceManager: manager,
        capabilities: fakeCapabilities({
          lint: lint.capability,
          test: tests.capability,
          build: build.capability,
        }),
      },
    );

    expect(report.success).toBe(true);
    expect(report.finalState).toBe('Done');
    expect(statuses(report.stages)).toEqual([
      'generation:passed',
      'lint:passed',
      'test:skipped',
      'build:passed',
      'publish:skipped',
    ]);
    expect(report.stages[0].output).toBe(
      'README.md\npyproject.toml\nsrc/awesome_tool/__init__.py\nsrc/awesome_tool/awesome.py',
    );
    expect(report.gates.map((g) => [g.name, g.passed, g.skipped])).toEqual([
      ['lint', true, false],
      ['test', true, true],
    ]);
    expect(report.artifacts.map((a) => a.kind)).toEqual(['sdist', 'wheel']);
    expect(report.artifacts.map((a) => a.fileName)).toEqual([
      'awesome_tool-1.0.0.tar.gz',
      'awesome_tool-1.0.0-py3-none-any.whl',
    ]);
    expect(lint.run).toHaveBeenCalledTimes(1);
    expect(tests.run).not.toHaveBeenCalled();
    expect(tests.hasTarget).not.toHaveBeenCalled();
    expect(report.summary).toBe(
      [
        'generation: passed',
        'lint: passed',
        'test: skipped',
        'build: passed',
        'publish: skipped',
        'awesome_tool 1.0.0: success',
      ].join('\n'),
    );
    expect(readdirSync(workspacesDir)).toEqual([]);
  });

  it('reaches Building without invoking any gate when both gates are disabled', async () => {
    const lint = fakeLint();
    const tests = fakeTests();
    const build = fakeBuild();
    const states: PipelineState[] = [];

    const report = await runPackagingPipeline(
      {
        source_path: writeSingleFile(),
        package_name: 'awesome_tool',
        version: '1.0.0',
        lint_code: false,
        run_tests: false,
      },
      {
        workspaceManager: manager,
        capabilities: fakeCapabilities({ lint: lint.capability, test: tests.capability, build: build.capability }),
        onStateChange: (state) => states.push(state),
      },
    );

    expect(states).toEqual(['Generating', 'Gating', 'Building', 'Done']);
    expect(lint.run).not.toHaveBeenCalled();
    expect(tests.run).not.toHaveBeenCalled();
    expect(tests.hasTarget).not.toHaveBeenCalled();
    expect(build.build).toHaveBeenCalledTimes(1);
    expect(report.gates.every((g) => g.skipped && g.passed && g.output === '')).toBe(true);
  });

  it('throws ValidationError without acquiring a workspace when the source is missing', async () => {
    const acquire = vi.spyOn(manager, 'acquire');

    await expect(
      runPackagingPipeline(
        { source_path: join(baseDir, 'missing.py'), package_name: 'awesome_tool', version: '1.0.0' },
        { workspaceManager: manager, capabilities: fakeCapabilities() },
      ),
    ).rejects.toBeInstanceOf(ValidationError);
    expect(acquire).not.toHaveBeenCalled();
  });

  it('throws ValidationError for an unknown repository', async () => {
    const acquire = vi.spyOn(manager, 'acquire');

    await expect(
      runPackagingPipeline(
        { source_path: writeSingleFile(), package_name: 'awesome_tool', version: '1.0.0', repository: 'github' },
        { workspaceManager: manager, capabilities: fakeCapabilities() },
      ),
    ).rejects.toThrow(/repository/);
    expect(acquire).not.toHaveBeenCalled();
  });

  it('propagates workspace allocation failure', async () => {
    vi.spyOn(manager, 'acquire').mockRejectedValue(new WorkspaceError('No space left on device'));
    const lint = fakeLint();

    await expect(
      runPackagingPipeline(
        { source_path: writeSingleFile(), package_name: 'awesome_tool', version: '1.0.0' },
        { workspaceManager: manager, capabilities: fakeCapabilities({ lint: lint.capability }) },
      ),
    ).rejects.toBeInstanceOf(WorkspaceError);
    expect(lint.run).not.toHaveBeenCalled();
  });

  it('runs the test gate after a failing lint gate but never builds', async () => {
    const lint = fakeLint({ passed: false, output: 'F401 `os` imported but unused', exitCode: 1 });
    const tests = fakeTests();
    const build = fakeBuild();
    const states: PipelineState[] = [];

    const report = await runPackagingPipeline(
      { source_path: writeSingleFile(), package_name: 'awesome_tool', version: '1.0.0', run_tests: true },
      {
        workspaceManager: manager,
        capabilities: fakeCapabilities({ lint: lint.capability, test: tests.capability, build: build.capability }),
        onStateChange: (state) => states.push(state),
      },
    );

    expect(tests.run).toHaveBeenCalledTimes(1);
    expect(report.gates.map((g) => [g.name, g.passed])).toEqual([
      ['lint', false],
      ['test', true],
    ]);
    expect(build.build).not.toHaveBeenCalled();
    expect(states).not.toContain('Building');
    expect(report.finalState).toBe('Failed');
    expect(report.success).toBe(false);
    expect(statuses(report.stages)).toEqual(['generation:passed', 'lint:failed', 'test:passed']);
    expect(report.stages[1].error).toEqual({ kind: 'GATE_FAILURE', message: 'Quality gate failed: lint' });
  });

  it('stops before the build when a directory source has failing tests', async () => {
    const tests = fakeTests({
      passed: false,
      output: 'FAILED tests/test_core.py::test_add - assert -1 == 3\n1 failed in 0.02s',
      exitCode: 1,
    });
    const build = fakeBuild();

    const report = await runPackagingPipeline(
      { source_path: writeProjectDir(), package_name: 'calc-kit', version: '0.2.0', run_tests: true },
      {
        workspaceManager: manager,
        capabilities: fakeCapabilities({ test: tests.capability, build: build.capability }),
      },
    );

    expect(report.success).toBe(false);
    expect(build.build).not.toHaveBeenCalled();
    expect(report.stages.some((s) => s.stage === 'build')).toBe(false);
    const testStage = report.stages.find((s) => s.stage === 'test');
    expect(testStage?.status).toBe('failed');
    expect(testStage?.output).toContain('FAILED tests/test_core.py::test_add');
    expect(report.summary.split('\n').at(-1)).toBe('calc-kit 0.2.0: failed at test');
  });

  it('treats an empty token as no token and skips publishing', async () => {
    const publish = fakePublish();

    const report = await runPackagingPipeline(
      { source_path: writeSingleFile(), package_name: 'awesome_tool', version: '1.0.0', pypi_token: '' },
      { workspaceManager: manager, capabilities: fakeCapabilities({ publish: publish.capability }) },
    );

    expect(report.success).toBe(true);
    expect(report.stages.at(-1)).toEqual({
      stage: 'publish',
      status: 'skipped',
      output: 'No token supplied; publishing skipped',
      error: undefined,
    });
    expect(publish.upload).not.toHaveBeenCalled();
  });

  it('records a rejected upload to testpypi without discarding the build', async () => {
    const publish = fakePublish({
      succeeded: false,
      output: 'HTTPError: 400 Bad Request\nFile already exists.',
    });
    const states: PipelineState[] = [];

    const report = await runPackagingPipeline(
      {
        source_path: writeSingleFile(),
        package_name: 'awesome_tool',
        version: '1.0.0',
        pypi_token: 'test-token',
        repository: 'testpypi',
        run_tests: false,
      },
      {
        workspaceManager: manager,
        capabilities: fakeCapabilities({ publish: publish.capability }),
        onStateChange: (state) => states.push(state),
      },
    );

    expect(states).toEqual(['Generating', 'Gating', 'Building', 'Publishing', 'Done']);
    expect(report.finalState).toBe('Done');
    expect(report.success).toBe(false);
    expect(report.artifacts).toHaveLength(2);
    expect(report.stages.find((s) => s.stage === 'build')?.status).toBe('passed');

    const publishStage = report.stages.find((s) => s.stage === 'publish');
    expect(publishStage?.status).toBe('failed');
    expect(publishStage?.output).toBe('HTTPError: 400 Bad Request\nFile already exists.');
    expect(publishStage?.error).toEqual({ kind: 'PUBLISH_ERROR', message: 'Upload to testpypi was rejected' });
    expect(report.projectUrl).toBeUndefined();

    const [paths, token, endpoint] = publish.upload.mock.calls[0];
    expect(paths).toEqual(report.artifacts.map((a) => a.path));
    expect(token).toBe('test-token');
    expect(endpoint).toBe('https://test.pypi.org/legacy/');
  });

  it('reports the project page after a successful upload', async () => {
    const report = await runPackagingPipeline(
      {
        source_path: writeSingleFile(),
        package_name: 'awesome_tool',
        version: '1.0.0',
        pypi_token: 'test-token',
      },
      { workspaceManager: manager, capabilities: fakeCapabilities() },
    );

    expect(report.success).toBe(true);
    expect(report.repository).toBe('pypi');
    expect(report.projectUrl).toBe('https://pypi.org/project/awesome_tool/1.0.0/');
    expect(report.stages.at(-1)?.status).toBe('passed');
  });

  it('never exposes the token in the report or the log', async () => {
    const publish = fakePublish({ succeeded: false, output: 'auth failed for test-token' });
    const logger = new PipelineLogger({ secrets: ['test-token'] });

    const report = await runPackagingPipeline(
      {
        source_path: writeSingleFile(),
        package_name: 'awesome_tool',
        version: '1.0.0',
        pypi_token: 'test-token',
      },
      { workspaceManager: manager, logger, capabilities: fakeCapabilities({ publish: publish.capability }) },
    );

    expect(report.stages.find((s) => s.stage === 'publish')?.output).toBe('auth failed for ***');
    expect(JSON.stringify(report)).not.toContain('test-token');
    expect(JSON.stringify(logger.getEntries())).not.toContain('test-token');
  });

  it('redacts the token from a logger supplied without secrets', async () => {
    const logger = new PipelineLogger();
    const publish = {
      upload: vi.fn(async () => {
        throw new Error('401 for token test-token');
      }),
    };

    await runPackagingPipeline(
      {
        source_path: writeSingleFile(),
        package_name: 'awesome_tool',
        version: '1.0.0',
        pypi_token: 'test-token',
      },
      { workspaceManager: manager, logger, capabilities: fakeCapabilities({ publish }) },
    );

    const logged = JSON.stringify(logger.getEntries());
    expect(logged).toContain('Upload to pypi failed: 401 for token ***');
    expect(logged).not.toContain('test-token');
  });

  it('records each stage once when a completion hook throws', async () => {
    const logger = new PipelineLogger();

    const report = await runPackagingPipeline(
      { source_path: writeSingleFile(), package_name: 'awesome_tool', version: '1.0.0' },
      {
        workspaceManager: manager,
        logger,
        capabilities: fakeCapabilities(),
        onStageComplete: (outcome) => {
          if (outcome.stage === 'generation') throw new Error('observer broke');
        },
      },
    );

    expect(report.success).toBe(true);
    expect(statuses(report.stages)).toEqual([
      'generation:passed',
      'lint:passed',
      'test:passed',
      'build:passed',
      'publish:skipped',
    ]);
    expect(logger.getEntries().filter((e) => e.level === 'warn').map((e) => e.message)).toEqual([
      'onStageComplete hook threw: observer broke',
    ]);
  });

  it('reports filesystem failures during generation as GENERATION_ERROR', async () => {
    const blocker = join(baseDir, 'blocker');
    writeFileSync(blocker, '');
    vi.spyOn(manager, 'acquire').mockResolvedValue(new Workspace(blocker));

    const report = await runPackagingPipeline(
      { source_path: writeSingleFile(), package_name: 'awesome_tool', version: '1.0.0' },
      { workspaceManager: manager, capabilities: fakeCapabilities() },
    );

    expect(report.finalState).toBe('Failed');
    expect(report.stages).toHaveLength(1);
    expect(report.stages[0].error?.kind).toBe('GENERATION_ERROR');
    expect(report.stages[0].error?.message).toMatch(/^Layout generation failed: /);
  });

  it('converts a throwing lint tool into a failed gate', async () => {
    const lint = {
      run: vi.fn(async () => {
        throw new Error('spawn ruff ENOENT');
      }),
    };

    const report = await runPackagingPipeline(
      { source_path: writeSingleFile(), package_name: 'awesome_tool', version: '1.0.0', run_tests: false },
      { workspaceManager: manager, capabilities: fakeCapabilities({ lint }) },
    );

    expect(report.finalState).toBe('Failed');
    expect(report.gates[0]).toMatchObject({ name: 'lint', passed: false, skipped: false, output: 'spawn ruff ENOENT' });
  });

  it('fails the build stage when the backend produces only a wheel', async () => {
    const build = fakeBuild(['wheel']);
    const publish = fakePublish();

    const report = await runPackagingPipeline(
      { source_path: writeSingleFile(), package_name: 'awesome_tool', version: '1.0.0', pypi_token: 'test-token' },
      { workspaceManager: manager, capabilities: fakeCapabilities({ build: build.capability, publish: publish.capability }) },
    );

    expect(report.finalState).toBe('Failed');
    expect(report.artifacts).toEqual([]);
    expect(report.stages.at(-1)).toMatchObject({
      stage: 'build',
      status: 'failed',
      error: { kind: 'BUILD_ERROR', message: 'Build produced no sdist artifact' },
    });
    expect(publish.upload).not.toHaveBeenCalled();
  });

  it('does not start the next stage once cancelled', async () => {
    const controller = new AbortController();
    const lint = fakeLint();

    const report = await runPackagingPipeline(
      { source_path: writeSingleFile(), package_name: 'awesome_tool', version: '1.0.0' },
      {
        workspaceManager: manager,
        signal: controller.signal,
        capabilities: fakeCapabilities({ lint: lint.capability }),
        onStageComplete: (outcome) => {
          if (outcome.stage === 'generation') controller.abort();
        },
      },
    );

    expect(lint.run).not.toHaveBeenCalled();
    expect(report.finalState).toBe('Failed');
    expect(report.stages.at(-1)).toMatchObject({
      stage: 'lint',
      status: 'failed',
      error: { kind: 'CANCELLED', message: 'Run cancelled before lint' },
    });
    expect(readdirSync(workspacesDir)).toEqual([]);
  });

  it('copies artifacts to the persist directory before teardown', async () => {
    const persistDir = join(baseDir, 'out');

    const report = await runPackagingPipeline(
      { source_path: writeSingleFile(), package_name: 'awesome_tool', version: '1.0.0' },
      { workspaceManager: manager, persistDir, capabilities: fakeCapabilities() },
    );

    expect(report.persistedArtifacts).toEqual([
      join(persistDir, 'awesome_tool-1.0.0.tar.gz'),
      join(persistDir, 'awesome_tool-1.0.0-py3-none-any.whl'),
    ]);
    expect(report.persistedArtifacts.every((p) => existsSync(p))).toBe(true);
    expect(report.artifacts.every((a) => !existsSync(a.path))).toBe(true);
  });

  it('keeps no artifacts when copying them to the persist directory fails', async () => {
    const persistDir = join(baseDir, 'out');
    writeFileSync(persistDir, 'not a directory');
    const publish = fakePublish();

    const report = await runPackagingPipeline(
      { source_path: writeSingleFile(), package_name: 'awesome_tool', version: '1.0.0', pypi_token: 'test-token' },
      { workspaceManager: manager, persistDir, capabilities: fakeCapabilities({ publish: publish.capability }) },
    );

    expect(report.finalState).toBe('Failed');
    expect(report.artifacts).toEqual([]);
    expect(report.persistedArtifacts).toEqual([]);
    expect(report.stages.at(-1)?.stage).toBe('build');
    expect(report.stages.at(-1)?.error?.kind).toBe('BUILD_ERROR');
    expect(report.stages.at(-1)?.error?.message).toMatch(/^Failed to copy artifacts to /);
    expect(publish.upload).not.toHaveBeenCalled();
  });

  describe('workspace cleanup', () => {
    it('removes the workspace when generation fails', async () => {
      const emptyDir = join(baseDir, 'empty');
      mkdirSync(emptyDir);

      const report = await runPackagingPipeline(
        { source_path: emptyDir, package_name: 'awesome_tool', version: '1.0.0' },
        { workspaceManager: manager, capabilities: fakeCapabilities() },
      );

      expect(report.finalState).toBe('Failed');
      expect(report.stages).toHaveLength(1);
      expect(report.stages[0].error?.kind).toBe('GENERATION_ERROR');
      expect(readdirSync(workspacesDir)).toEqual([]);
    });

    it('removes the workspace when a gate fails', async () => {
      const report = await runPackagingPipeline(
        { source_path: writeSingleFile(), package_name: 'awesome_tool', version: '1.0.0' },
        {
          workspaceManager: manager,
          capabilities: fakeCapabilities({ lint: fakeLint({ passed: false, output: 'E501', exitCode: 1 }).capability }),
        },
      );

      expect(report.finalState).toBe('Failed');
      expect(readdirSync(workspacesDir)).toEqual([]);
    });

    it('removes the workspace when the build backend throws', async () => {
      const build = {
        build: vi.fn(async () => {
          throw new Error('backend exploded');
        }),
      };

      const report = await runPackagingPipeline(
        { source_path: writeSingleFile(), package_name: 'awesome_tool', version: '1.0.0' },
        { workspaceManager: manager, capabilities: fakeCapabilities({ build }) },
      );

      expect(report.stages.at(-1)?.error).toEqual({
        kind: 'BUILD_ERROR',
        message: 'Build backend error: backend exploded',
      });
      expect(readdirSync(workspacesDir)).toEqual([]);
    });

    it('removes the workspace when the upload throws', async () => {
      const publish = {
        upload: vi.fn(async () => {
          throw new Error('getaddrinfo ENOTFOUND upload.pypi.org');
        }),
      };

      const report = await runPackagingPipeline(
        { source_path: writeSingleFile(), package_name: 'awesome_tool', version: '1.0.0', pypi_token: 'test-token' },
        { workspaceManager: manager, capabilities: fakeCapabilities({ publish }) },
      );

      expect(report.finalState).toBe('Done');
      expect(report.success).toBe(false);
      expect(report.stages.at(-1)?.error).toEqual({
        kind: 'PUBLISH_ERROR',
        message: 'Upload to pypi failed: getaddrinfo ENOTFOUND upload.pypi.org',
      });
      expect(readdirSync(workspacesDir)).toEqual([]);
    });
  });
});
