import pc from 'picocolors';
import type { ProvisionState } from './types.js';

const STATE_LABELS: Record<ProvisionState, string> = {
  resolving: 'Resolving worktree location',
  creating: 'Creating worktree',
  'setting-up': 'Setting up environment',
  verifying: 'Verifying test baseline',
  ready: 'Ready',
  'ready-needs-decision': 'Ready, baseline needs a decision',
  failed: 'Failed'
};

/**
 * Centralized UI messaging utilities for consistent CLI experience
 */
export const ui = {
  // Headers and titles
  header: (message: string) => console.log(pc.cyan(message)),

  // Status messages
  success: (message: string) => console.log(pc.green(message)),
  error: (message: string) => console.log(pc.red(message)),
  warning: (message: string) => console.log(pc.yellow(message)),
  info: (message: string) => console.log(pc.gray(message)),
  plain: (message: string) => console.log(message),

  // Special formatting
  highlight: (text: string) => pc.bold(text),

  // Orchestration progress
  state: (state: ProvisionState) => console.log(pc.blue(`▸ ${STATE_LABELS[state]}`)),

  // Error messages with suggestions
  notARepository: (directory: string) => {
    ui.error(`❌ Not inside a git repository: ${directory}`);
    ui.warning('💡 Run wtprov from your project checkout or one of its worktrees.');
  },

  userCancelled: () => {
    ui.warning('⚠️  Operation cancelled by user');
  }
} as const;
