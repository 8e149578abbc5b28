/**
 * Did-you-mean hint for a mistyped command name
 *
 * @module packages/cli/utils/suggest
 */

const MAX_EDITS = 2;

/**
 * Edit distance where swapping two adjacent characters counts as one edit
 */
export function editDistance(from: string, to: string): number {
  const rows: number[][] = [];
  for (let i = 0; i <= from.length; i++) {
    const row: number[] = [i];
    for (let j = 1; j <= to.length; j++) {
      if (i === 0) {
        row.push(j);
        continue;
      }
      const above = rows[i - 1] ?? [];
      const cost = from[i - 1] === to[j - 1] ? 0 : 1;
      let best = Math.min(
        (above[j] ?? Infinity) + 1,
        (row[j - 1] ?? Infinity) + 1,
        (above[j - 1] ?? Infinity) + cost
      );
      if (i > 1 && j > 1 && from[i - 1] === to[j - 2] && from[i - 2] === to[j - 1]) {
        best = Math.min(best, (rows[i - 2]?.[j - 2] ?? Infinity) + 1);
      }
      row.push(best);
    }
    rows.push(row);
  }
  return rows[from.length]?.[to.length] ?? Math.max(from.length, to.length);
}

/**
 * The registered command closest to `input`, if any is within two edits.
 * Ties go to the command registered first.
 */
export function suggestCommand(input: string, commands: readonly string[]): string | undefined {
  const typed = input.toLowerCase();
  let closest: { command: string; distance: number } | undefined;
  for (const command of commands) {
    const distance = editDistance(typed, command.toLowerCase());
    if (distance <= MAX_EDITS && (closest === undefined || distance < closest.distance)) {
      closest = { command, distance };
    }
  }
  return closest?.command;
}
