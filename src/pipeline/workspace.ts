/**
 * Workspace manager
 * Owns the temporary build directory of a single packaging run
 */

import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { WorkspaceError } from './errors.js';

export interface WorkspaceOptions {
  /** Parent directory for workspaces (defaults to the OS temp dir) */
  baseDir?: string;
  /** Directory name prefix */
  prefix?: string;
}

/**
 * A uniquely-named, exclusively-owned temporary directory
 */
export class Workspace {
  private released = false;

  constructor(readonly dir: string) {}

  /** Resolve a path inside the workspace */
  resolve(...segments: string[]): string {
    return path.join(this.dir, ...segments);
  }

  get isReleased(): boolean {
    return this.released;
  }

  /**
   * Recursively delete the workspace. Safe to call more than once.
   */
  async release(): Promise<void> {
    if (this.released) return;
    await fs.rm(this.dir, { recursive: true, force: true });
    this.released = true;
  }
}

/**
 * Workspace manager class
 */
export class WorkspaceManager {
  private readonly baseDir: string;
  private readonly prefix: string;

  constructor(options: WorkspaceOptions = {}) {
    this.baseDir = options.baseDir ?? tmpdir();
    this.prefix = options.prefix ?? 'wheelwright-';
  }

  /**
   * Allocate a fresh, empty directory. mkdtemp guarantees no collision
   * with concurrent runs.
   */
  async acquire(): Promise<Workspace> {
    try {
      await fs.mkdir(this.baseDir, { recursive: true });
      const dir = await fs.mkdtemp(path.join(this.baseDir, this.prefix));
      return new Workspace(dir);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new WorkspaceError(`Failed to allocate workspace in ${this.baseDir}: ${reason}`);
    }
  }

  /**
   * Run fn inside a freshly acquired workspace, releasing it on every exit path
   */
  async withWorkspace<T>(fn: (workspace: Workspace) => Promise<T>): Promise<T> {
    const workspace = await this.acquire();
    try {
      return await fn(workspace);
    } finally {
      await workspace.release();
    }
  }
}

/** Factory function */
export function createWorkspaceManager(options?: WorkspaceOptions): WorkspaceManager {
  return new WorkspaceManager(options);
}
