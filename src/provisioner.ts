import fs from 'fs-extra';
import { join } from 'path';
import { addWorktree } from './git.js';
import { PathCollisionError } from './errors.js';
import type { ProvisionRequest, WorktreeLocation } from './types.js';

export function worktreeLocation(worktreeRootDir: string, branchName: string): WorktreeLocation {
  return {
    worktreeRootDir,
    worktreePath: join(worktreeRootDir, branchName)
  };
}

/**
 * Creates the linked working copy for `request.branchName` below
 * `worktreeRootDir`. This is the only step that changes git state.
 *
 * The returned location is the working context for every later step.
 *
 * @throws {PathCollisionError} When the target path already exists
 * @throws {VcsError} When git cannot create the worktree. Nothing is left
 *   on disk in that case.
 */
export async function createWorktree(
  request: ProvisionRequest,
  worktreeRootDir: string
): Promise<WorktreeLocation> {
  const location = worktreeLocation(worktreeRootDir, request.branchName);

  if (await fs.pathExists(location.worktreePath)) {
    throw new PathCollisionError(location.worktreePath);
  }

  // git creates the root and any parent directories of a slashed branch
  await addWorktree(request.projectRoot, request.branchName, location.worktreePath, request.baseBranch);

  return location;
}
