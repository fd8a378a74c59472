import { buildRequest, provision } from './orchestrator.js';
import { loadConfig, type ProvisionConfig } from './config.js';
import {
  confirmFailingBaseline,
  handlePromptError,
  promptBranchName,
  UserCancelledError,
  validateBranchInput
} from './prompts.js';
import { renderReport } from './report.js';
import { ui } from './ui.js';
import { EnvironmentUtils } from './utils/environment.js';
import type { ProvisionResult } from './types.js';

export { buildRequest, provision } from './orchestrator.js';
export { resolveWorktreeRoot, worktreeRootName } from './paths.js';
export { loadConfig } from './config.js';
export { PathCollisionError, VcsError, ProvisionPreconditionError } from './errors.js';
export type * from './types.js';
export type { ProvisionConfig } from './config.js';

const USAGE = 'Usage: wtprov <branch>';

/**
 * Branch from the first positional argument, or asked for when a human is
 * at the terminal.
 */
async function resolveBranchName(argv: string[]): Promise<string> {
  const branchArg = argv.find(arg => !arg.startsWith('-'));
  if (branchArg !== undefined) {
    const validation = validateBranchInput(branchArg);
    if (validation !== true) {
      throw new Error(validation);
    }
    return branchArg.trim();
  }

  if (!EnvironmentUtils.canPrompt()) {
    throw new Error(`No branch name given. ${USAGE}`);
  }
  return promptBranchName();
}

/**
 * Closing the confirmation is an answer too: the baseline was not accepted.
 */
async function acceptFailingBaseline(
  result: Extract<ProvisionResult, { status: 'ready-needs-decision' }>
): Promise<boolean> {
  try {
    return await confirmFailingBaseline(result);
  } catch (error) {
    if (error instanceof UserCancelledError) {
      ui.userCancelled();
      return false;
    }
    throw error;
  }
}

/**
 * Turns the result into an exit code, asking the user when the baseline fails.
 */
async function settle(result: ProvisionResult, config: ProvisionConfig): Promise<number> {
  switch (result.status) {
    case 'ready':
      return 0;
    case 'failed':
      return 1;
    case 'ready-needs-decision': {
      const accepted = config.assumeYes ||
        (EnvironmentUtils.canPrompt() && await acceptFailingBaseline(result));
      if (accepted) {
        ui.info('Continuing in the worktree with a failing baseline.');
        return 0;
      }
      ui.warning('Baseline not accepted. The worktree was left in place for inspection.');
      ui.info(`Remove it with: git worktree remove ${result.worktreePath}`);
      return 2;
    }
  }
}

/**
 * Handle all types of errors in a consistent manner
 */
function handleError(error: unknown): never {
  if (error instanceof Error) {
    handlePromptError(error);
    // handlePromptError should exit, but ensure we never return
    process.exit(1);
  } else {
    ui.error(`❌ Unexpected error: ${String(error)}`);
    process.exit(1);
  }
}

async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  let exitCode = 0;

  try {
    ui.header('🌳 wtprov: isolated worktree provisioning\n');

    const config = loadConfig();
    const branchName = await resolveBranchName(argv);
    const request = await buildRequest(branchName, process.cwd());
    ui.info(`Branching ${request.branchName} from ${request.baseBranch} in ${request.projectRoot}`);

    const result = await provision(request, config, { onStateChange: ui.state });
    renderReport(result, request.branchName);
    exitCode = await settle(result, config);
  } catch (error) {
    handleError(error);
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

export { main };
