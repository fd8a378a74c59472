/**
 * Which runner output conventions to look for.
 *
 * - `js` - jest and vitest summary lines, mocha, node:test
 * - `pytest` - the final `N failed, M passed` line
 * - `cargo` - every `test result:` line, summed across crates
 * - `go` - top-level `--- PASS` / `--- FAIL` lines from `go test -v`
 */
export type TestOutputFormat = 'js' | 'pytest' | 'cargo' | 'go';

export type TestCounts = {
  passed: number;
  failed: number;
};

const ANSI_ESCAPE = /\x1b\[[0-9;]*m/g;

function countOf(text: string, pattern: RegExp): number | null {
  const match = pattern.exec(text);
  return match ? Number(match[1]) : null;
}

function fromCounts(passed: number | null, failed: number | null): TestCounts | null {
  if (passed === null && failed === null) {
    return null;
  }
  return { passed: passed ?? 0, failed: failed ?? 0 };
}

function parseJs(output: string): TestCounts | null {
  // jest: "Tests:       1 failed, 5 passed, 6 total"
  // vitest: "      Tests  1 failed | 4 passed (5)"
  const summary = /^\s*Tests:?\s+(.*\d.*)$/m.exec(output);
  if (summary) {
    const counts = fromCounts(countOf(summary[1], /(\d+) passed/), countOf(summary[1], /(\d+) failed/));
    if (counts) {
      return counts;
    }
  }

  const mocha = fromCounts(countOf(output, /^\s*(\d+) passing\b/m), countOf(output, /^\s*(\d+) failing\b/m));
  if (mocha) {
    return mocha;
  }

  // node:test, TAP and spec reporters
  return fromCounts(countOf(output, /^[#ℹ] pass (\d+)\s*$/m), countOf(output, /^[#ℹ] fail (\d+)\s*$/m));
}

function parsePytest(output: string): TestCounts | null {
  const lines = output.split('\n').filter(line => /\d+ (passed|failed|errors?)\b/.test(line));
  const summary = lines[lines.length - 1];
  if (summary === undefined) {
    return null;
  }
  const errors = countOf(summary, /(\d+) errors?\b/) ?? 0;
  const failed = countOf(summary, /(\d+) failed/);
  return {
    passed: countOf(summary, /(\d+) passed/) ?? 0,
    failed: (failed ?? 0) + errors
  };
}

function parseCargo(output: string): TestCounts | null {
  let counts: TestCounts | null = null;
  for (const match of output.matchAll(/^test result: \w+\. (\d+) passed; (\d+) failed;/gm)) {
    const next: TestCounts = {
      passed: (counts?.passed ?? 0) + Number(match[1]),
      failed: (counts?.failed ?? 0) + Number(match[2])
    };
    counts = next;
  }
  return counts;
}

function parseGo(output: string): TestCounts | null {
  const passed = output.match(/^--- PASS: /gm)?.length ?? 0;
  const failed = output.match(/^--- FAIL: /gm)?.length ?? 0;
  return passed + failed > 0 ? { passed, failed } : null;
}

/**
 * Extracts pass/fail counts from a test runner's output.
 *
 * @returns null when the output carries no recognisable summary
 */
export function parseTestCounts(output: string, format: TestOutputFormat): TestCounts | null {
  const plain = output.replace(ANSI_ESCAPE, '');
  switch (format) {
    case 'js':
      return parseJs(plain);
    case 'pytest':
      return parsePytest(plain);
    case 'cargo':
      return parseCargo(plain);
    case 'go':
      return parseGo(plain);
  }
}
