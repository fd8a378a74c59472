/**
 * Input to a provisioning run.
 *
 * `projectRoot` is always the primary checkout, even when the command is run
 * from inside one of its linked worktrees.
 *
 * @example
 * ```typescript
 * const request: ProvisionRequest = {
 *   currentLocation: '/Users/dev/radial',
 *   projectRoot: '/Users/dev/radial',
 *   branchName: 'feature/auth',
 *   baseBranch: 'main'
 * };
 * ```
 */
export type ProvisionRequest = {
  /** Absolute path the command was invoked from */
  readonly currentLocation: string;
  /** Absolute path of the primary repository checkout */
  readonly projectRoot: string;
  /** New branch to create; also the worktree's directory below the root */
  readonly branchName: string;
  /** Branch the new one starts from */
  readonly baseBranch: string;
};

/**
 * How the invocation location relates to the worktree root.
 */
export type LocationKind = 'branch-subdirectory' | 'worktree-root' | 'project';

export type ResolvedRoot = {
  readonly worktreeRootDir: string;
  readonly locationKind: LocationKind;
};

/**
 * Where the new worktree lives.
 *
 * @example
 * ```typescript
 * const location: WorktreeLocation = {
 *   worktreeRootDir: '/Users/dev/radial.worktrees',
 *   worktreePath: '/Users/dev/radial.worktrees/feature/auth'
 * };
 * ```
 */
export type WorktreeLocation = {
  /** Sibling directory of the project holding all of its worktrees */
  readonly worktreeRootDir: string;
  readonly worktreePath: string;
};

/** Everything a setup step may need to know about the run. */
export type ProvisionContext = ProvisionRequest & WorktreeLocation;

export type SetupOutcome = {
  /** `setup-script` or an ecosystem id such as `node` */
  readonly action: string;
  readonly attempted: boolean;
  readonly succeeded: boolean;
  readonly detail: string;
};

export type NoTestsConfigured = { readonly kind: 'no-tests-configured' };

export type BaselinePassed = {
  readonly kind: 'passed';
  /** Passing tests, or null when the runner output gave no count */
  readonly count: number | null;
};

export type BaselineFailed = {
  readonly kind: 'failed';
  /** Failing tests, or null when the runner output gave no count */
  readonly count: number | null;
  readonly failureSummary: string;
};

export type BaselineResult = NoTestsConfigured | BaselinePassed | BaselineFailed;

export type ProvisionStatus = 'ready' | 'ready-needs-decision' | 'failed';

export type ProvisionState =
  | 'resolving'
  | 'creating'
  | 'setting-up'
  | 'verifying'
  | ProvisionStatus;

export type ProvisionErrorKind = 'path-collision' | 'vcs-error';

/**
 * Final outcome of a provisioning run. The status narrows the baseline:
 * a ready worktree never carries a failed baseline, and a failed run never
 * carries one at all.
 */
export type ProvisionResult =
  | {
      readonly status: 'ready';
      readonly worktreePath: string;
      readonly baseline: NoTestsConfigured | BaselinePassed;
      readonly setupOutcomes: readonly SetupOutcome[];
    }
  | {
      readonly status: 'ready-needs-decision';
      readonly worktreePath: string;
      readonly baseline: BaselineFailed;
      readonly setupOutcomes: readonly SetupOutcome[];
    }
  | {
      readonly status: 'failed';
      readonly worktreePath: string;
      readonly setupOutcomes: readonly [];
      readonly error: {
        readonly kind: ProvisionErrorKind;
        readonly message: string;
      };
    };
