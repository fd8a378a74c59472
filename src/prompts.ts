import { input, confirm } from '@inquirer/prompts';
import type { ProvisionResult } from './types.js';
import { ui } from './ui.js';
import { ErrorUtils, SecurityValidator } from './utils/security.js';
import { ProvisionPreconditionError } from './errors.js';

/**
 * Custom error class for user-initiated cancellation events.
 *
 * Thrown when the user presses Ctrl+C or ESC in a prompt.
 */
export class UserCancelledError extends Error {
  constructor(message = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancelledError';
  }
}

function isPromptExit(error: unknown): boolean {
  return error instanceof Error &&
    (error.name === 'ExitPromptError' || error.message.includes('User force closed'));
}

/**
 * Returns the message to show for an invalid branch name, or true.
 */
export function validateBranchInput(value: string): string | true {
  if (!value.trim()) {
    return 'Branch name cannot be empty';
  }
  try {
    SecurityValidator.validateBranchName(value.trim());
    return true;
  } catch (error) {
    return ErrorUtils.extractErrorMessage(error);
  }
}

/**
 * Asks for the name of the branch to create.
 *
 * @throws {UserCancelledError} When the prompt is closed
 */
export async function promptBranchName(): Promise<string> {
  try {
    const branch = await input({
      message: 'Name of the new branch:',
      validate: validateBranchInput
    });
    return branch.trim();
  } catch (error) {
    if (isPromptExit(error)) {
      throw new UserCancelledError('Operation cancelled by user (Ctrl+C)');
    }
    throw error;
  }
}

/**
 * Asks whether to keep working in a worktree whose baseline tests fail.
 */
export async function confirmFailingBaseline(
  result: Extract<ProvisionResult, { status: 'ready-needs-decision' }>
): Promise<boolean> {
  try {
    return await confirm({
      message: `Baseline tests fail in ${result.worktreePath}. Continue working there anyway?`,
      default: false
    });
  } catch (error) {
    if (isPromptExit(error)) {
      throw new UserCancelledError('Operation cancelled by user (Ctrl+C)');
    }
    throw error;
  }
}

/**
 * Prints a message for an error raised before or during provisioning and
 * exits with the matching code.
 *
 * - UserCancelledError: exit code 0
 * - everything else: exit code 1
 */
export function handlePromptError(error: unknown): void {
  console.log('');

  if (error instanceof UserCancelledError) {
    ui.userCancelled();
    process.exit(0);
  }

  const errorMessage = ErrorUtils.extractErrorMessage(error);

  if (error instanceof ProvisionPreconditionError) {
    ui.error(`❌ ${errorMessage}`);
    ui.warning('💡 Choose a branch name that does not exist yet.');
    process.exit(1);
  } else if (errorMessage.startsWith('Not inside a git repository')) {
    ui.notARepository(process.cwd());
    process.exit(1);
  } else {
    ui.error(`❌ An error occurred: ${errorMessage}`);
    process.exit(1);
  }
}
