import { describe, test, expect } from 'vitest';
import { parseTestCounts } from '../src/testOutput.js';

describe('Test Output Parsing', () => {
  describe('js', () => {
    test('reads the jest summary line, not the suites line', () => {
      const output = [
        'Test Suites: 1 failed, 3 passed, 4 total',
        'Tests:       2 failed, 17 passed, 19 total',
        'Snapshots:   0 total'
      ].join('\n');
      expect(parseTestCounts(output, 'js')).toEqual({ passed: 17, failed: 2 });
    });

    test('reads the vitest summary line', () => {
      const output = [
        ' Test Files  4 passed (4)',
        '      Tests  42 passed (42)',
        '   Start at  10:00:00'
      ].join('\n');
      expect(parseTestCounts(output, 'js')).toEqual({ passed: 42, failed: 0 });
    });

    test('reads vitest failures', () => {
      const output = '      Tests  1 failed | 9 passed (10)';
      expect(parseTestCounts(output, 'js')).toEqual({ passed: 9, failed: 1 });
    });

    test('strips colour codes before matching', () => {
      const output = '      Tests  \x1b[1m\x1b[32m3 passed\x1b[39m\x1b[22m (3)';
      expect(parseTestCounts(output, 'js')).toEqual({ passed: 3, failed: 0 });
    });

    test('reads mocha passing and failing counts', () => {
      const output = '\n  12 passing (40ms)\n  1 failing\n';
      expect(parseTestCounts(output, 'js')).toEqual({ passed: 12, failed: 1 });
    });

    test('reads node:test tap totals', () => {
      const output = '# tests 5\n# pass 4\n# fail 1\n';
      expect(parseTestCounts(output, 'js')).toEqual({ passed: 4, failed: 1 });
    });

    test('returns null without a summary', () => {
      expect(parseTestCounts('> tsc --noEmit\n', 'js')).toBeNull();
    });
  });

  describe('pytest', () => {
    test('reads the final summary line', () => {
      const output = 'collected 12 items\n\n===== 2 failed, 10 passed in 0.12s =====\n';
      expect(parseTestCounts(output, 'pytest')).toEqual({ passed: 10, failed: 2 });
    });

    test('counts collection errors as failures', () => {
      const output = '=== 1 failed, 3 passed, 2 errors in 1.01s ===';
      expect(parseTestCounts(output, 'pytest')).toEqual({ passed: 3, failed: 3 });
    });

    test('reads quiet mode output', () => {
      expect(parseTestCounts('....\n4 passed in 0.02s\n', 'pytest')).toEqual({ passed: 4, failed: 0 });
    });

    test('returns null when no tests ran', () => {
      expect(parseTestCounts('=== no tests ran in 0.01s ===', 'pytest')).toBeNull();
    });
  });

  describe('cargo', () => {
    test('sums results across crates', () => {
      const output = [
        'test result: ok. 5 passed; 0 failed; 0 ignored; 0 measured; 0 filtered out',
        'test result: FAILED. 2 passed; 1 failed; 0 ignored; 0 measured; 0 filtered out'
      ].join('\n');
      expect(parseTestCounts(output, 'cargo')).toEqual({ passed: 7, failed: 1 });
    });

    test('returns null without result lines', () => {
      expect(parseTestCounts('error[E0432]: unresolved import', 'cargo')).toBeNull();
    });
  });

  describe('go', () => {
    test('counts top-level PASS and FAIL lines only', () => {
      const output = [
        '=== RUN   TestAdd',
        '--- PASS: TestAdd (0.00s)',
        '=== RUN   TestSplit',
        '    --- PASS: TestSplit/empty (0.00s)',
        '--- FAIL: TestSplit (0.00s)',
        '--- PASS: TestJoin (0.00s)',
        'FAIL'
      ].join('\n');
      expect(parseTestCounts(output, 'go')).toEqual({ passed: 2, failed: 1 });
    });

    test('returns null when nothing ran', () => {
      expect(parseTestCounts('?   \texample.com/sample\t[no test files]', 'go')).toBeNull();
    });
  });
});
