import { resolve } from 'path';
import { runEnvironmentSetup } from './setup.js';
import { verifyBaseline } from './baseline.js';
import { createWorktree, worktreeLocation } from './provisioner.js';
import { resolveWorktreeRoot } from './paths.js';
import { branchExists, currentBranch, repositoryRoot } from './git.js';
import { ProvisionError, ProvisionPreconditionError } from './errors.js';
import type { ProvisionConfig } from './config.js';
import type {
  ProvisionRequest,
  ProvisionResult,
  ProvisionState,
  WorktreeLocation
} from './types.js';

export type ProvisionOptions = {
  /** Called on entering each state, terminal states included */
  onStateChange?: (state: ProvisionState) => void;
};

/**
 * Builds a request for `branchName` from the repository containing
 * `currentLocation`. The base branch is whatever is checked out there.
 *
 * @throws {Error} When `currentLocation` is not inside a git repository
 * @throws {ProvisionPreconditionError} When the branch already exists
 */
export async function buildRequest(branchName: string, currentLocation: string): Promise<ProvisionRequest> {
  const location = resolve(currentLocation);
  const projectRoot = await repositoryRoot(location);
  const branch = branchName.trim();

  if (await branchExists(projectRoot, branch)) {
    throw new ProvisionPreconditionError(`Branch already exists: ${branch}`);
  }

  return {
    currentLocation: location,
    projectRoot,
    branchName: branch,
    baseBranch: await currentBranch(location)
  };
}

/**
 * Provisions an isolated worktree and reports a single outcome.
 *
 * Runs resolving → creating → setting-up → verifying. Only a failure to
 * create the worktree ends the run early (`failed`); setup failures are
 * recorded and a failing baseline yields `ready-needs-decision`. Nothing is
 * retried.
 *
 * @example
 * ```typescript
 * const request = await buildRequest('feature/auth', process.cwd());
 * const result = await provision(request, loadConfig());
 * if (result.status === 'ready') {
 *   console.log(`cd ${result.worktreePath}`);
 * }
 * ```
 */
export async function provision(
  request: ProvisionRequest,
  config: ProvisionConfig,
  options: ProvisionOptions = {}
): Promise<ProvisionResult> {
  const enter = (state: ProvisionState) => options.onStateChange?.(state);

  enter('resolving');
  const { worktreeRootDir } = resolveWorktreeRoot(request.currentLocation, request.projectRoot);

  enter('creating');
  let location: WorktreeLocation;
  try {
    location = await createWorktree(request, worktreeRootDir);
  } catch (error) {
    if (!(error instanceof ProvisionError)) {
      throw error;
    }
    enter('failed');
    return {
      status: 'failed',
      worktreePath: worktreeLocation(worktreeRootDir, request.branchName).worktreePath,
      setupOutcomes: [],
      error: { kind: error.kind, message: error.message }
    };
  }

  const context = { ...request, ...location };

  enter('setting-up');
  const setupOutcomes = await runEnvironmentSetup(context, config);

  enter('verifying');
  const baseline = await verifyBaseline(location.worktreePath, config);

  if (baseline.kind === 'failed') {
    enter('ready-needs-decision');
    return { status: 'ready-needs-decision', worktreePath: location.worktreePath, baseline, setupOutcomes };
  }

  enter('ready');
  return { status: 'ready', worktreePath: location.worktreePath, baseline, setupOutcomes };
}
