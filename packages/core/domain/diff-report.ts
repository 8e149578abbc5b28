/**
 * Inventory Diff Reporter
 *
 * Turns the output of a line diff between two package listings into
 * report rows. Presentation (colour, padding) is left to the caller.
 *
 * @module packages/core/domain/diff-report
 */

import type { DiffLine, DiffReport, DiffRow } from './types.js';

/** Column widths of the rendered table: package, environment A, environment B */
export const DIFF_COLUMN_WIDTHS = [40, 20, 20] as const;

/**
 * Classify one line of diff output.
 *
 * Lines starting with "<" exist only on the left, ">" only on the right.
 * Everything else (hunk headers, "---" separators) returns null.
 */
export function parseDiffLine(line: string): DiffLine | null {
  if (line.startsWith('<')) {
    return { side: 'left', text: line.slice(2) };
  }
  if (line.startsWith('>')) {
    return { side: 'right', text: line.slice(2) };
  }
  return null;
}

/**
 * Build the report for a diff stream.
 *
 * Rows keep input order and are never merged: a package on both a "<"
 * and a ">" line yields two rows.
 */
export function renderDiffReport(diffText: string, labelA: string, labelB: string): DiffReport {
  const rows: DiffRow[] = [];

  for (const line of diffText.split(/\r?\n/)) {
    const parsed = parseDiffLine(line);
    if (parsed === null) continue;

    rows.push({
      package: parsed.text,
      presentInA: parsed.side === 'left',
      presentInB: parsed.side === 'right',
    });
  }

  return { labelA, labelB, rows };
}
