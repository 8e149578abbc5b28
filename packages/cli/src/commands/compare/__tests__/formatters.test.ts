/**
 * Compare Formatter Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import chalk from 'chalk';
import type { ComparisonResult, DiffReport } from '@envcompare/core';
import {
  formatComparisonOutput,
  formatDiffJson,
  formatDiffRow,
  formatDiffTable,
} from '../formatters.js';

describe('compare formatters', () => {
  let level: typeof chalk.level;

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  const report: DiffReport = {
    labelA: 'env1',
    labelB: 'env2',
    rows: [
      { package: 'numpy', presentInA: true, presentInB: false },
      { package: 'scipy', presentInA: false, presentInB: true },
    ],
  };

  describe('formatDiffTable', () => {
    it('renders the header, separator and rows', () => {
      expect(formatDiffTable(report).split('\n')).toEqual([
        '',
        'Package Differences:',
        '',
        `${'Package'.padEnd(40)} ${'env1'.padEnd(20)} ${'env2'.padEnd(20)}`,
        `${'-------'.padEnd(40)} ${'----'.padEnd(20)} ${'----'.padEnd(20)}`,
        `${'numpy'.padEnd(40)} ${'Present'.padEnd(20)} ${'Absent'.padEnd(20)}`,
        `${'scipy'.padEnd(40)} ${'Absent'.padEnd(20)} ${'Present'.padEnd(20)}`,
      ]);
    });

    it('renders only the header for identical environments', () => {
      const lines = formatDiffTable({ labelA: 'a', labelB: 'b', rows: [] }).split('\n');
      expect(lines).toHaveLength(5);
      expect(lines[4]).toBe(`${'-------'.padEnd(40)} ${'----'.padEnd(20)} ${'----'.padEnd(20)}`);
    });

    it('does not truncate long package lines', () => {
      const pkg = 'a-very-long-package-name-that-exceeds-the-column 1.0 py_0 conda-forge';
      expect(formatDiffRow({ package: pkg, presentInA: true, presentInB: false })).toBe(
        `${pkg} ${'Present'.padEnd(20)} ${'Absent'.padEnd(20)}`
      );
    });
  });

  it('formats the diff report as JSON', () => {
    expect(JSON.parse(formatDiffJson(report))).toEqual(report);
  });

  describe('formatComparisonOutput', () => {
    const result: ComparisonResult = {
      exitCode: 1,
      lines: ['flask not found', 'scipy not found'],
      verdicts: [],
    };

    it('joins lines with newlines', () => {
      expect(formatComparisonOutput(result, false)).toBe('flask not found\nscipy not found');
    });

    it('prints a JSON array under --json', () => {
      expect(formatComparisonOutput(result, true)).toBe(
        '[\n  "flask not found",\n  "scipy not found"\n]'
      );
    });
  });
});

describe('colored diff rows', () => {
  it('uses a red background for packages only in the first environment', () => {
    const previous = chalk.level;
    chalk.level = 1;
    try {
      const row = formatDiffRow({ package: 'numpy', presentInA: true, presentInB: false });
      expect(row.startsWith('\u001b[41m')).toBe(true);
      const other = formatDiffRow({ package: 'scipy', presentInA: false, presentInB: true });
      expect(other.startsWith('\u001b[44m')).toBe(true);
    } finally {
      chalk.level = previous;
    }
  });
});
