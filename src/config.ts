export const DEFAULT_STEP_TIMEOUT_MS = 600000;
export const DEFAULT_SETUP_SCRIPT = '.worktree-setup.sh';

export type ProvisionConfig = {
  /** Limit for each setup action and for the baseline test run */
  stepTimeoutMs: number;
  /** Custom setup script, relative to the new worktree */
  setupScript: string;
  /** Report ecosystem installs as not attempted instead of running them */
  skipInstall: boolean;
  /** Accept a failing baseline without asking */
  assumeYes: boolean;
};

function isEnabled(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

/**
 * Reads configuration from `WTPROV_*` environment variables.
 *
 * Environment Variables:
 * - `WTPROV_STEP_TIMEOUT_MS` - per-subprocess timeout (default 10 minutes)
 * - `WTPROV_SETUP_SCRIPT` - custom setup script path (default `.worktree-setup.sh`)
 * - `WTPROV_SKIP_INSTALL` - skip dependency installation
 * - `WTPROV_ASSUME_YES` - keep a worktree whose baseline tests fail without asking
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProvisionConfig {
  const timeout = Number(env.WTPROV_STEP_TIMEOUT_MS);
  const setupScript = env.WTPROV_SETUP_SCRIPT?.trim();

  return {
    stepTimeoutMs: Number.isFinite(timeout) && timeout > 0 ? timeout : DEFAULT_STEP_TIMEOUT_MS,
    setupScript: setupScript || DEFAULT_SETUP_SCRIPT,
    skipInstall: isEnabled(env.WTPROV_SKIP_INSTALL),
    assumeYes: isEnabled(env.WTPROV_ASSUME_YES)
  };
}
