/**
 * Build Executor — produces a source distribution and a wheel from the
 * generated tree. Either both exist or the build has failed.
 */

import path from 'node:path';

import { BuildError, toPackagerError } from './errors.js';
import type { ArtifactKind, BuildArtifact, BuildCapability, GeneratedTree } from './types.js';

export interface BuildResult {
  artifacts: BuildArtifact[];
  output: string;
}

const KIND_ORDER: Record<ArtifactKind, number> = { sdist: 0, wheel: 1 };

/**
 * Classify a distribution file by its name
 */
export function classifyArtifact(filePath: string): ArtifactKind | null {
  const fileName = path.basename(filePath);
  if (fileName.endsWith('.whl')) return 'wheel';
  if (fileName.endsWith('.tar.gz')) return 'sdist';
  return null;
}

/**
 * Run the build capability and validate its artifacts
 *
 * @throws BuildError when the backend fails or either artifact kind is missing
 */
export async function executeBuild(tree: GeneratedTree, capability: BuildCapability): Promise<BuildResult> {
  let artifactPaths: string[];
  let output: string;
  try {
    ({ artifactPaths, output } = await capability.build(tree));
  } catch (err) {
    if (err instanceof BuildError) throw err;
    const error = toPackagerError(err);
    throw new BuildError(`Build backend error: ${error.message}`, error.output);
  }

  const artifacts: BuildArtifact[] = [];
  for (const artifactPath of artifactPaths) {
    const kind = classifyArtifact(artifactPath);
    if (kind) {
      artifacts.push({ kind, path: artifactPath, fileName: path.basename(artifactPath) });
    }
  }

  const missing = (['sdist', 'wheel'] as const).filter((kind) => !artifacts.some((a) => a.kind === kind));
  if (missing.length > 0) {
    throw new BuildError(`Build produced no ${missing.join(' or ')} artifact`, output);
  }

  artifacts.sort((a, b) => KIND_ORDER[a.kind] - KIND_ORDER[b.kind] || a.fileName.localeCompare(b.fileName));
  return { artifacts, output };
}
