import { describe, test, expect, vi, beforeEach } from 'vitest';
import { buildRequest, provision } from '../src/orchestrator.js';
import { createWorktree } from '../src/provisioner.js';
import { runEnvironmentSetup } from '../src/setup.js';
import { verifyBaseline } from '../src/baseline.js';
import { branchExists, currentBranch, repositoryRoot } from '../src/git.js';
import { PathCollisionError, ProvisionPreconditionError, VcsError } from '../src/errors.js';
import type { ProvisionConfig } from '../src/config.js';
import type { ProvisionRequest, ProvisionState, SetupOutcome } from '../src/types.js';

vi.mock('../src/setup.js');
vi.mock('../src/baseline.js');
vi.mock('../src/git.js');
vi.mock('../src/provisioner.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/provisioner.js')>();
  return { ...actual, createWorktree: vi.fn() };
});

const config: ProvisionConfig = {
  stepTimeoutMs: 1000,
  setupScript: '.worktree-setup.sh',
  skipInstall: false,
  assumeYes: false
};

const request: ProvisionRequest = {
  currentLocation: '/d/radial',
  projectRoot: '/d/radial',
  branchName: 'feature/auth',
  baseBranch: 'main'
};

const location = {
  worktreeRootDir: '/d/radial.worktrees',
  worktreePath: '/d/radial.worktrees/feature/auth'
};

const failedInstall: SetupOutcome = {
  action: 'node',
  attempted: true,
  succeeded: false,
  detail: 'npm install exited with code 1'
};

const cargoBuild: SetupOutcome = {
  action: 'rust',
  attempted: true,
  succeeded: true,
  detail: 'cargo build completed'
};

describe('Provision Orchestrator', () => {
  let states: ProvisionState[];
  const onStateChange = (state: ProvisionState) => states.push(state);

  beforeEach(() => {
    vi.clearAllMocks();
    states = [];
    vi.mocked(createWorktree).mockResolvedValue(location);
    vi.mocked(runEnvironmentSetup).mockResolvedValue([]);
    vi.mocked(verifyBaseline).mockResolvedValue({ kind: 'passed', count: 12 });
  });

  describe('provision', () => {
    test('is ready when the baseline passes', async () => {
      const result = await provision(request, config, { onStateChange });

      expect(result).toEqual({
        status: 'ready',
        worktreePath: '/d/radial.worktrees/feature/auth',
        baseline: { kind: 'passed', count: 12 },
        setupOutcomes: []
      });
      expect(states).toEqual(['resolving', 'creating', 'setting-up', 'verifying', 'ready']);
    });

    test('creates the worktree under the resolved root', async () => {
      await provision(request, config);
      expect(createWorktree).toHaveBeenCalledWith(request, '/d/radial.worktrees');
    });

    test('reuses the existing root when invoked from a worktree', async () => {
      const fromWorktree = { ...request, currentLocation: '/d/radial.worktrees/feature-x', branchName: 'bugfix/auth' };
      await provision(fromWorktree, config);
      expect(createWorktree).toHaveBeenCalledWith(fromWorktree, '/d/radial.worktrees');
    });

    test('threads the full context into setup and the worktree path into verification', async () => {
      await provision(request, config);

      expect(runEnvironmentSetup).toHaveBeenCalledWith({ ...request, ...location }, config);
      expect(verifyBaseline).toHaveBeenCalledWith('/d/radial.worktrees/feature/auth', config);
    });

    test('is ready when no tests are configured', async () => {
      vi.mocked(verifyBaseline).mockResolvedValue({ kind: 'no-tests-configured' });

      const result = await provision(request, config);

      expect(result.status).toBe('ready');
    });

    test('needs a decision when the baseline fails', async () => {
      const baseline = { kind: 'failed', count: 2, failureSummary: 'npm test exited with code 1' } as const;
      vi.mocked(verifyBaseline).mockResolvedValue(baseline);

      const result = await provision(request, config, { onStateChange });

      expect(result).toEqual({
        status: 'ready-needs-decision',
        worktreePath: '/d/radial.worktrees/feature/auth',
        baseline,
        setupOutcomes: []
      });
      expect(states).toEqual(['resolving', 'creating', 'setting-up', 'verifying', 'ready-needs-decision']);
    });

    test('halts on a path collision without setup or tests', async () => {
      vi.mocked(createWorktree).mockRejectedValue(new PathCollisionError(location.worktreePath));

      const result = await provision(request, config, { onStateChange });

      expect(result).toEqual({
        status: 'failed',
        worktreePath: '/d/radial.worktrees/feature/auth',
        setupOutcomes: [],
        error: {
          kind: 'path-collision',
          message: 'Worktree path already exists: /d/radial.worktrees/feature/auth'
        }
      });
      expect(result).not.toHaveProperty('baseline');
      expect(runEnvironmentSetup).not.toHaveBeenCalled();
      expect(verifyBaseline).not.toHaveBeenCalled();
      expect(states).toEqual(['resolving', 'creating', 'failed']);
    });

    test('halts on a git failure and surfaces its message verbatim', async () => {
      vi.mocked(createWorktree).mockRejectedValue(
        new VcsError("fatal: a branch named 'feature/auth' already exists")
      );

      const result = await provision(request, config);

      expect(result).toMatchObject({
        status: 'failed',
        error: { kind: 'vcs-error', message: "fatal: a branch named 'feature/auth' already exists" }
      });
      expect(runEnvironmentSetup).not.toHaveBeenCalled();
      expect(verifyBaseline).not.toHaveBeenCalled();
    });

    test('propagates unexpected errors', async () => {
      vi.mocked(createWorktree).mockRejectedValue(new TypeError('boom'));

      await expect(provision(request, config)).rejects.toThrow('boom');
    });

    test('verifies the baseline even when setup actions fail', async () => {
      vi.mocked(runEnvironmentSetup).mockResolvedValue([failedInstall, cargoBuild]);

      const result = await provision(request, config);

      expect(verifyBaseline).toHaveBeenCalledOnce();
      expect(result).toMatchObject({ status: 'ready', setupOutcomes: [failedInstall, cargoBuild] });
    });

    test('status always agrees with the baseline', async () => {
      const baselines = [
        { kind: 'no-tests-configured' },
        { kind: 'passed', count: 3 },
        { kind: 'passed', count: null },
        { kind: 'failed', count: 1, failureSummary: 'x' },
        { kind: 'failed', count: null, failureSummary: 'y' }
      ] as const;

      for (const baseline of baselines) {
        vi.mocked(verifyBaseline).mockResolvedValueOnce(baseline);
        const result = await provision(request, config);
        expect(result.status).toBe(baseline.kind === 'failed' ? 'ready-needs-decision' : 'ready');
      }
    });
  });

  describe('buildRequest', () => {
    beforeEach(() => {
      vi.mocked(repositoryRoot).mockResolvedValue('/d/radial');
      vi.mocked(currentBranch).mockResolvedValue('develop');
      vi.mocked(branchExists).mockResolvedValue(false);
    });

    test('derives the project root and base branch from git', async () => {
      expect(await buildRequest('  feature/auth ', '/d/radial.worktrees/feature-x')).toEqual({
        currentLocation: '/d/radial.worktrees/feature-x',
        projectRoot: '/d/radial',
        branchName: 'feature/auth',
        baseBranch: 'develop'
      });
      expect(currentBranch).toHaveBeenCalledWith('/d/radial.worktrees/feature-x');
      expect(branchExists).toHaveBeenCalledWith('/d/radial', 'feature/auth');
    });

    test('rejects a branch that already exists', async () => {
      vi.mocked(branchExists).mockResolvedValue(true);

      await expect(buildRequest('main', '/d/radial')).rejects.toBeInstanceOf(ProvisionPreconditionError);
      await expect(buildRequest('main', '/d/radial')).rejects.toThrow('Branch already exists: main');
    });
  });
});
