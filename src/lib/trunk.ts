import { RepositoryBackend } from './git.js';
import { Result, ok } from './errors.js';

export const DEFAULT_TRUNK = 'main';

const TRUNK_CANDIDATES = ['main', 'master'];

/**
 * Resolve the trunk branch: local `main`, then `master`, then the remote's
 * symbolic HEAD, then `main`.
 */
export async function resolveTrunkBranch(
  backend: RepositoryBackend,
  remote: string,
): Promise<Result<string>> {
  for (const candidate of TRUNK_CANDIDATES) {
    const exists = await backend.branchExists(candidate);
    if (!exists.ok) return exists;
    if (exists.value) return ok(candidate);
  }

  const remoteHead = await backend.remoteHeadBranch(remote);
  if (!remoteHead.ok) return remoteHead;
  return ok(remoteHead.value ?? DEFAULT_TRUNK);
}
