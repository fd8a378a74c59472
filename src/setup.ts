import fs from 'fs-extra';
import { join } from 'path';
import { ECOSYSTEMS, detectEcosystems, type Ecosystem } from './ecosystems.js';
import { formatCommand, runCommand, type CommandResult, type CommandSpec } from './exec.js';
import type { ProvisionConfig } from './config.js';
import type { ProvisionContext, SetupOutcome } from './types.js';
import { ui } from './ui.js';
import { ErrorUtils } from './utils/security.js';

export const SETUP_SCRIPT_ACTION = 'setup-script';

const DETAIL_TAIL_LINES = 5;

/**
 * Environment handed to the custom setup script.
 */
export function setupScriptEnv(context: ProvisionContext): Record<string, string> {
  return {
    WORKTREE_PATH: context.worktreePath,
    WORKTREE_BRANCH: context.branchName,
    WORKTREE_BASE_BRANCH: context.baseBranch,
    WORKTREE_PROJECT_ROOT: context.projectRoot,
    WORKTREE_ORIGIN: context.currentLocation
  };
}

function tail(output: string, lines: number): string {
  return output
    .split('\n')
    .map(line => line.trimEnd())
    .filter(Boolean)
    .slice(-lines)
    .join('\n');
}

function toOutcome(action: string, spec: CommandSpec, result: CommandResult): SetupOutcome {
  const command = formatCommand(spec);
  if (result.exitCode === 0) {
    return { action, attempted: true, succeeded: true, detail: `${command} completed` };
  }

  const reason = result.error ?? `${command} exited with code ${result.exitCode}`;
  const output = tail(result.output, DETAIL_TAIL_LINES);
  return {
    action,
    attempted: true,
    succeeded: false,
    detail: output ? `${reason}\n${output}` : reason
  };
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isFile();
  } catch {
    return false;
  }
}

async function runSetupScript(
  context: ProvisionContext,
  config: ProvisionConfig
): Promise<SetupOutcome | null> {
  const scriptPath = join(context.worktreePath, config.setupScript);
  if (!(await isFile(scriptPath))) {
    return null;
  }

  ui.info(`Running setup script ${config.setupScript}...`);
  const spec: CommandSpec = { command: 'sh', args: [scriptPath] };
  const result = await runCommand(spec, {
    cwd: context.worktreePath,
    timeoutMs: config.stepTimeoutMs,
    env: setupScriptEnv(context)
  });
  return toOutcome(SETUP_SCRIPT_ACTION, spec, result);
}

async function runInstall(
  ecosystem: Ecosystem,
  context: ProvisionContext,
  config: ProvisionConfig
): Promise<SetupOutcome> {
  let spec: CommandSpec;
  try {
    spec = await ecosystem.installCommand(context.worktreePath);
  } catch (error) {
    return {
      action: ecosystem.id,
      attempted: false,
      succeeded: false,
      detail: `Could not determine install command: ${ErrorUtils.extractErrorMessage(error)}`
    };
  }

  if (config.skipInstall) {
    return {
      action: ecosystem.id,
      attempted: false,
      succeeded: false,
      detail: `${formatCommand(spec)} skipped (WTPROV_SKIP_INSTALL)`
    };
  }

  ui.info(`Installing ${ecosystem.id} dependencies: ${formatCommand(spec)}`);
  const result = await runCommand(spec, {
    cwd: context.worktreePath,
    timeoutMs: config.stepTimeoutMs
  });
  return toOutcome(ecosystem.id, spec, result);
}

/**
 * Prepares a fresh worktree: the project's own setup script first, then one
 * dependency install per ecosystem whose marker file is present.
 *
 * Every action runs regardless of how earlier ones went. A worktree with no
 * marker files yields an empty list.
 */
export async function runEnvironmentSetup(
  context: ProvisionContext,
  config: ProvisionConfig,
  table: readonly Ecosystem[] = ECOSYSTEMS
): Promise<SetupOutcome[]> {
  const outcomes: SetupOutcome[] = [];

  const scriptOutcome = await runSetupScript(context, config);
  if (scriptOutcome) {
    outcomes.push(scriptOutcome);
  }

  for (const ecosystem of await detectEcosystems(context.worktreePath, table)) {
    outcomes.push(await runInstall(ecosystem, context, config));
  }

  return outcomes;
}
