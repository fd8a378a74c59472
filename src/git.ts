import { execa, ExecaError } from 'execa';
import { basename, dirname, resolve } from 'path';
import { VcsError } from './errors.js';
import { SecurityValidator } from './utils/security.js';

export async function currentBranch(repoPath: string): Promise<string> {
  try {
    const { stdout } = await execa('git', [
      '-C', resolve(repoPath),
      'rev-parse',
      '--abbrev-ref',
      'HEAD'
    ], {
      shell: false // Explicitly disable shell interpretation
    });
    return stdout.trim() || 'HEAD';
  } catch {
    // Unborn or unreadable HEAD: let git resolve it when the worktree is added
    return 'HEAD';
  }
}

/**
 * Absolute path of the primary checkout for any path inside the repository,
 * including paths inside its linked worktrees.
 *
 * @throws {Error} When `path` is not inside a git repository
 */
export async function repositoryRoot(path: string): Promise<string> {
  const cwd = resolve(path);
  let commonDir: string;
  try {
    const { stdout } = await execa('git', ['-C', cwd, 'rev-parse', '--git-common-dir'], {
      shell: false
    });
    commonDir = resolve(cwd, stdout.trim());
  } catch {
    throw new Error(`Not inside a git repository: ${cwd}`);
  }

  if (basename(commonDir) === '.git') {
    return dirname(commonDir);
  }

  // Non-standard git dir layout: fall back to the current checkout's top level
  const { stdout } = await execa('git', ['-C', cwd, 'rev-parse', '--show-toplevel'], {
    shell: false
  });
  return stdout.trim();
}

export async function branchExists(repoPath: string, branch: string): Promise<boolean> {
  const { exitCode } = await execa('git', [
    '-C', resolve(repoPath),
    'show-ref',
    '--verify',
    '--quiet',
    `refs/heads/${branch}`
  ], {
    shell: false,
    reject: false
  });
  return exitCode === 0;
}

/**
 * Creates a linked working copy at `worktreeDir` on a new branch that starts
 * at `baseBranch`.
 *
 * @throws {VcsError} When the branch name is invalid or git fails
 */
export async function addWorktree(
  baseRepo: string,
  branch: string,
  worktreeDir: string,
  baseBranch: string
): Promise<void> {
  const sanitizedBranch = branch.trim();

  try {
    SecurityValidator.validateBranchName(sanitizedBranch);
  } catch (error) {
    throw new VcsError(error instanceof Error ? error.message : String(error));
  }

  try {
    await execa('git', [
      '-C', resolve(baseRepo),
      'worktree', 'add',
      '-b', sanitizedBranch,
      resolve(worktreeDir),
      baseBranch
    ], {
      shell: false
    });
  } catch (error) {
    if (error instanceof ExecaError) {
      const execaError: ExecaError = error;
      const stderr = typeof execaError.stderr === 'string' ? execaError.stderr.trim() : '';
      throw new VcsError(stderr || execaError.shortMessage);
    }
    throw error;
  }
}
