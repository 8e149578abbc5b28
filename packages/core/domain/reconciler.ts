/**
 * Spec Matcher
 *
 * Reconciles an installed package inventory against an ordered list of
 * specification entries. Pure and synchronous; safe to call concurrently.
 *
 * @module packages/core/domain/reconciler
 */

import { SpecParseError } from './errors.js';
import { formatRecord } from './inventory.js';
import { parseMatchSpec, type MatchSpec } from './match-spec.js';
import type { ComparisonResult, ComparisonVerdict, Inventory } from './types.js';

export const SUCCESS_MESSAGE =
  'Success. All the packages in the specification file are present in the environment ' +
  'with matching version and build string.';

/**
 * Classify every specification entry against the inventory.
 *
 * Entries are evaluated in order and every entry is evaluated, so all
 * misses and mismatches are reported together. A malformed entry aborts
 * the run with a SpecParseError carrying its position.
 *
 * @param inventory - Installed packages keyed by lowercased name
 * @param specs - Specification entries in reporting order
 * @throws SpecParseError on the first entry that cannot be parsed
 *
 * @example
 * reconcile(inventory, ['numpy=1.2=0', 'flask'])
 * // { exitCode: 1, lines: ['flask not found'], verdicts: [...] }
 */
export function reconcile(inventory: Inventory, specs: readonly string[]): ComparisonResult {
  const verdicts: ComparisonVerdict[] = [];
  const lines: string[] = [];

  specs.forEach((spec, index) => {
    let parsed: MatchSpec;
    try {
      parsed = parseMatchSpec(spec);
    } catch (error) {
      throw error instanceof SpecParseError ? error.atIndex(index) : error;
    }

    const { name } = parsed;
    const installed = inventory.get(name);

    if (installed === undefined) {
      const explanation = `${name} not found`;
      verdicts.push({ kind: 'missing', spec, name, explanation });
      lines.push(explanation);
      return;
    }

    if (!parsed.match(installed)) {
      const explanation =
        `${name} found but mismatch. Specification pkg: ${spec}, ` +
        `Running pkg: ${formatRecord(installed)}`;
      verdicts.push({ kind: 'mismatched', spec, name, installed, explanation });
      lines.push(explanation);
      return;
    }

    verdicts.push({ kind: 'matched', spec, name });
  });

  const miss = verdicts.some((verdict) => verdict.kind !== 'matched');
  if (!miss) {
    lines.push(SUCCESS_MESSAGE);
  }

  return { exitCode: miss ? 1 : 0, lines, verdicts };
}
