import fs from 'fs-extra';
import { join } from 'path';
import type { CommandSpec } from './exec.js';
import type { TestOutputFormat } from './testOutput.js';

export type PackageManager = 'npm' | 'yarn' | 'pnpm';

export type EcosystemId = 'node' | 'rust' | 'python' | 'go';

/**
 * One row of the marker table. `installCommand` and `testCommand` are only
 * consulted once `isPresent` has returned true for the same directory.
 */
export type Ecosystem = {
  id: EcosystemId;
  /** Any of these at the worktree root selects the ecosystem */
  markers: readonly string[];
  installCommand(dir: string): Promise<CommandSpec>;
  /** null when the project declares no tests */
  testCommand(dir: string): Promise<CommandSpec | null>;
  outputFormat: TestOutputFormat;
};

type PackageInfo = {
  packageManager?: string;
  testScript?: string;
};

// `npm init` writes this when no test runner was chosen
const NPM_PLACEHOLDER_TEST = /no test specified/;

async function readPackageInfo(dir: string): Promise<PackageInfo> {
  let pkg: unknown;
  try {
    pkg = await fs.readJson(join(dir, 'package.json'));
  } catch {
    return {};
  }
  if (typeof pkg !== 'object' || pkg === null) {
    return {};
  }

  const info: PackageInfo = {};
  if ('packageManager' in pkg && typeof pkg.packageManager === 'string') {
    info.packageManager = pkg.packageManager;
  }
  if (
    'scripts' in pkg &&
    typeof pkg.scripts === 'object' &&
    pkg.scripts !== null &&
    'test' in pkg.scripts &&
    typeof pkg.scripts.test === 'string'
  ) {
    info.testScript = pkg.scripts.test;
  }
  return info;
}

export async function detectPackageManager(dir: string): Promise<PackageManager> {
  // Lockfiles first, most specific first
  if (await fs.pathExists(join(dir, 'pnpm-lock.yaml'))) return 'pnpm';
  if (await fs.pathExists(join(dir, 'yarn.lock'))) return 'yarn';
  if (await fs.pathExists(join(dir, 'package-lock.json'))) return 'npm';

  const { packageManager } = await readPackageInfo(dir);
  if (packageManager?.startsWith('pnpm')) return 'pnpm';
  if (packageManager?.startsWith('yarn')) return 'yarn';

  return 'npm';
}

const node: Ecosystem = {
  id: 'node',
  markers: ['package.json'],
  outputFormat: 'js',
  async installCommand(dir) {
    return { command: await detectPackageManager(dir), args: ['install'] };
  },
  async testCommand(dir) {
    const { testScript } = await readPackageInfo(dir);
    if (testScript === undefined || !testScript.trim() || NPM_PLACEHOLDER_TEST.test(testScript)) {
      return null;
    }
    return { command: await detectPackageManager(dir), args: ['test'] };
  }
};

const rust: Ecosystem = {
  id: 'rust',
  markers: ['Cargo.toml'],
  outputFormat: 'cargo',
  async installCommand() {
    return { command: 'cargo', args: ['build'] };
  },
  async testCommand() {
    return { command: 'cargo', args: ['test'] };
  }
};

const python: Ecosystem = {
  id: 'python',
  markers: ['pyproject.toml', 'requirements.txt'],
  outputFormat: 'pytest',
  async installCommand(dir) {
    if (await fs.pathExists(join(dir, 'poetry.lock'))) {
      return { command: 'poetry', args: ['install'] };
    }
    if (await fs.pathExists(join(dir, 'requirements.txt'))) {
      return { command: 'pip', args: ['install', '-r', 'requirements.txt'] };
    }
    return { command: 'pip', args: ['install', '-e', '.'] };
  },
  async testCommand() {
    return { command: 'pytest', args: [] };
  }
};

const go: Ecosystem = {
  id: 'go',
  markers: ['go.mod'],
  outputFormat: 'go',
  async installCommand() {
    return { command: 'go', args: ['mod', 'download'] };
  },
  async testCommand() {
    // -v prints one PASS/FAIL line per test, which is what gets counted
    return { command: 'go', args: ['test', '-v', './...'] };
  }
};

/**
 * Evaluated in this order for both setup and test detection.
 */
export const ECOSYSTEMS: readonly Ecosystem[] = [node, rust, python, go];

export async function isPresent(ecosystem: Ecosystem, dir: string): Promise<boolean> {
  for (const marker of ecosystem.markers) {
    if (await fs.pathExists(join(dir, marker))) {
      return true;
    }
  }
  return false;
}

export async function detectEcosystems(
  dir: string,
  table: readonly Ecosystem[] = ECOSYSTEMS
): Promise<Ecosystem[]> {
  const present: Ecosystem[] = [];
  for (const ecosystem of table) {
    if (await isPresent(ecosystem, dir)) {
      present.push(ecosystem);
    }
  }
  return present;
}
