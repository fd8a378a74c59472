import { execa, ExecaError } from 'execa';

export type CommandSpec = {
  command: string;
  args: string[];
};

export type RunOptions = {
  cwd: string;
  timeoutMs: number;
  /** Added to the inherited environment */
  env?: Record<string, string>;
};

export type CommandResult = {
  /** null when the process never started or was killed */
  exitCode: number | null;
  /** Interleaved stdout and stderr */
  output: string;
  timedOut: boolean;
  /** Set when the process could not start or was killed */
  error?: string;
};

export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].join(' ');
}

/**
 * Runs one command to completion and captures its status and output.
 * Never throws for process failures; they are reported in the result.
 */
export async function runCommand(spec: CommandSpec, options: RunOptions): Promise<CommandResult> {
  try {
    const result = await execa(spec.command, spec.args, {
      cwd: options.cwd,
      env: options.env,
      timeout: options.timeoutMs,
      all: true,
      stdin: 'ignore',
      shell: false // Explicitly disable shell interpretation
    });
    return { exitCode: result.exitCode ?? 0, output: result.all, timedOut: false };
  } catch (error) {
    if (!(error instanceof ExecaError)) {
      throw error;
    }

    const output = typeof error.all === 'string' ? error.all : '';
    if (error.timedOut) {
      return {
        exitCode: null,
        output,
        timedOut: true,
        error: `${formatCommand(spec)} timed out after ${options.timeoutMs}ms`
      };
    }

    if (typeof error.exitCode === 'number') {
      return { exitCode: error.exitCode, output, timedOut: false };
    }

    return { exitCode: null, output, timedOut: false, error: error.shortMessage };
  }
}
