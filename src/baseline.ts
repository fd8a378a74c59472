import { ECOSYSTEMS, detectEcosystems, type Ecosystem } from './ecosystems.js';
import { formatCommand, runCommand, type CommandSpec } from './exec.js';
import { parseTestCounts, type TestOutputFormat } from './testOutput.js';
import type { ProvisionConfig } from './config.js';
import type { BaselineResult } from './types.js';
import { ui } from './ui.js';

const SUMMARY_TAIL_LINES = 20;

export type TestPlan = {
  spec: CommandSpec;
  format: TestOutputFormat;
};

/**
 * Picks the test command of the first present ecosystem that declares one.
 */
export async function detectTestCommand(
  worktreePath: string,
  table: readonly Ecosystem[] = ECOSYSTEMS
): Promise<TestPlan | null> {
  for (const ecosystem of await detectEcosystems(worktreePath, table)) {
    const spec = await ecosystem.testCommand(worktreePath);
    if (spec) {
      return { spec, format: ecosystem.outputFormat };
    }
  }
  return null;
}

function summarize(output: string): string {
  return output
    .split('\n')
    .map(line => line.trimEnd())
    .filter(Boolean)
    .slice(-SUMMARY_TAIL_LINES)
    .join('\n');
}

/**
 * Runs the project's tests once in the new worktree.
 *
 * A missing test setup is a result of its own, not a failure. The run is
 * never retried: a freshly installed worktree is expected to be deterministic.
 */
export async function verifyBaseline(
  worktreePath: string,
  config: ProvisionConfig,
  table: readonly Ecosystem[] = ECOSYSTEMS
): Promise<BaselineResult> {
  const plan = await detectTestCommand(worktreePath, table);
  if (!plan) {
    return { kind: 'no-tests-configured' };
  }

  const command = formatCommand(plan.spec);
  ui.info(`Running baseline tests: ${command}`);
  const result = await runCommand(plan.spec, {
    cwd: worktreePath,
    timeoutMs: config.stepTimeoutMs
  });
  const counts = parseTestCounts(result.output, plan.format);

  if (result.exitCode === 0 && (counts === null || counts.failed === 0)) {
    return { kind: 'passed', count: counts?.passed ?? null };
  }

  const reason = result.error ?? (result.exitCode === 0
    ? `${command} reported failing tests`
    : `${command} exited with code ${result.exitCode}`);
  const output = summarize(result.output);

  // A run can fail outside any test (setup hook, unhandled rejection)
  const failing = counts !== null && counts.failed > 0 ? counts.failed : null;

  return {
    kind: 'failed',
    count: failing,
    failureSummary: output ? `${reason}\n${output}` : reason
  };
}
