/**
 * Publisher — uploads built artifacts to one of two fixed package indexes.
 */

import { PublishError, toPackagerError } from './errors.js';
import type { BuildArtifact, PublishCapability, UploadOutcome } from './types.js';
import type { Repository } from '../types/request.js';

/** Upload endpoint per repository */
export const UPLOAD_ENDPOINTS: Record<Repository, string> = {
  pypi: 'https://upload.pypi.org/legacy/',
  testpypi: 'https://test.pypi.org/legacy/',
};

const PROJECT_HOSTS: Record<Repository, string> = {
  pypi: 'https://pypi.org',
  testpypi: 'https://test.pypi.org',
};

export interface PublishResult {
  output: string;
  projectUrl: string;
}

export function resolveEndpoint(repository: Repository): string {
  return UPLOAD_ENDPOINTS[repository];
}

export function projectUrl(repository: Repository, packageName: string, version: string): string {
  return `${PROJECT_HOSTS[repository]}/project/${packageName}/${version}/`;
}

/**
 * Upload every artifact with the given token
 *
 * @throws PublishError on rejection, network or tool failure
 */
export async function publishArtifacts(
  artifacts: BuildArtifact[],
  token: string,
  repository: Repository,
  packageName: string,
  version: string,
  capability: PublishCapability,
): Promise<PublishResult> {
  const endpoint = resolveEndpoint(repository);

  let outcome: UploadOutcome;
  try {
    outcome = await capability.upload(artifacts.map((a) => a.path), token, endpoint);
  } catch (err) {
    const error = toPackagerError(err);
    throw new PublishError(`Upload to ${repository} failed: ${error.message}`, error.output);
  }

  if (!outcome.succeeded) {
    throw new PublishError(`Upload to ${repository} was rejected`, outcome.output);
  }

  return { output: outcome.output, projectUrl: projectUrl(repository, packageName, version) };
}
