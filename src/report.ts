import { ui } from './ui.js';
import type { BaselineResult, ProvisionResult, SetupOutcome } from './types.js';

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function describeBaseline(baseline: BaselineResult): string {
  switch (baseline.kind) {
    case 'no-tests-configured':
      return 'no tests configured';
    case 'passed':
      return baseline.count === null ? 'tests passed' : `${plural(baseline.count, 'test')} passing`;
    case 'failed':
      return baseline.count === null ? 'tests failed' : `${plural(baseline.count, 'test')} failing`;
  }
}

export function describeOutcome(outcome: SetupOutcome): string {
  const mark = !outcome.attempted ? '-' : outcome.succeeded ? '✓' : '✗';
  const [firstLine] = outcome.detail.split('\n');
  return `${mark} ${outcome.action}: ${firstLine}`;
}

function renderSetup(outcomes: readonly SetupOutcome[]): void {
  if (outcomes.length === 0) {
    ui.info('   setup: nothing to run');
    return;
  }
  ui.plain('   setup:');
  for (const outcome of outcomes) {
    const line = `     ${describeOutcome(outcome)}`;
    if (!outcome.attempted) {
      ui.info(line);
    } else if (outcome.succeeded) {
      ui.plain(line);
    } else {
      ui.warning(line);
    }
  }
}

/**
 * Prints the final report. Every setup outcome is listed, successful or not.
 */
export function renderReport(result: ProvisionResult, branchName: string): void {
  console.log();

  switch (result.status) {
    case 'failed':
      ui.error(`❌ Could not create worktree for ${branchName}`);
      ui.plain(`   path: ${result.worktreePath}`);
      ui.plain(`   reason (${result.error.kind}): ${result.error.message}`);
      return;

    case 'ready':
      ui.success(`🎉 Worktree ready for ${ui.highlight(branchName)}`);
      ui.plain(`   path: ${result.worktreePath}`);
      renderSetup(result.setupOutcomes);
      ui.plain(`   baseline: ${describeBaseline(result.baseline)}`);
      break;

    case 'ready-needs-decision':
      ui.warning(`⚠️  Worktree created for ${ui.highlight(branchName)}, but baseline tests are failing`);
      ui.plain(`   path: ${result.worktreePath}`);
      renderSetup(result.setupOutcomes);
      ui.warning(`   baseline: ${describeBaseline(result.baseline)}`);
      ui.info(result.baseline.failureSummary.replace(/^/gm, '     '));
      break;
  }

  console.log();
  ui.info('📝 Next steps:');
  console.log(`  cd ${result.worktreePath}`);
}
