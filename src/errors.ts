import type { ProvisionErrorKind } from './types.js';

/**
 * Base class for the errors that end a provisioning run in the `failed` state.
 */
export abstract class ProvisionError extends Error {
  abstract readonly kind: ProvisionErrorKind;
}

/**
 * The target worktree path is already taken on disk.
 *
 * @example
 * ```typescript
 * if (await fs.pathExists(worktreePath)) {
 *   throw new PathCollisionError(worktreePath);
 * }
 * ```
 */
export class PathCollisionError extends ProvisionError {
  readonly kind = 'path-collision' as const;

  constructor(readonly path: string) {
    super(`Worktree path already exists: ${path}`);
    this.name = 'PathCollisionError';
  }
}

/**
 * git refused to create the linked working copy.
 */
export class VcsError extends ProvisionError {
  readonly kind = 'vcs-error' as const;

  constructor(message: string) {
    super(message);
    this.name = 'VcsError';
  }
}

/**
 * The request itself is unusable, e.g. the branch already exists.
 * Raised before anything is created.
 */
export class ProvisionPreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProvisionPreconditionError';
  }
}
