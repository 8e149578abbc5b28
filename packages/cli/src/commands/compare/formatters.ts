/**
 * Compare Output Formatters
 *
 * @module packages/cli/commands/compare/formatters
 */

import chalk from 'chalk';
import {
  DIFF_COLUMN_WIDTHS,
  type ComparisonResult,
  type DiffReport,
  type DiffRow,
} from '@envcompare/core';

const [PACKAGE_WIDTH, ENV_A_WIDTH, ENV_B_WIDTH] = DIFF_COLUMN_WIDTHS;

function tableLine(pkg: string, a: string, b: string): string {
  return `${pkg.padEnd(PACKAGE_WIDTH)} ${a.padEnd(ENV_A_WIDTH)} ${b.padEnd(ENV_B_WIDTH)}`;
}

function presence(present: boolean): string {
  return present ? 'Present' : 'Absent';
}

/**
 * One table row; red background for packages only in A, blue for only in B
 */
export function formatDiffRow(row: DiffRow): string {
  const line = tableLine(row.package, presence(row.presentInA), presence(row.presentInB));
  return row.presentInA ? chalk.bgRed(line) : chalk.bgBlue(line);
}

/**
 * Render the package differences table
 */
export function formatDiffTable(report: DiffReport): string {
  return [
    '',
    'Package Differences:',
    '',
    tableLine('Package', report.labelA, report.labelB),
    tableLine('-------', '----', '----'),
    ...report.rows.map(formatDiffRow),
  ].join('\n');
}

export function formatDiffJson(report: DiffReport): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Reconciliation output: the result lines, or a JSON array of them
 */
export function formatComparisonOutput(result: ComparisonResult, json: boolean): string {
  return json ? JSON.stringify(result.lines, null, 2) : result.lines.join('\n');
}
