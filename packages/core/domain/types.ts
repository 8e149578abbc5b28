/**
 * Environment Comparison Domain Types
 *
 * Shared value types for reconciling an installed package inventory
 * against a specification list, and for reporting the delta between
 * two environments.
 *
 * @module packages/core/domain/types
 */

// =============================================================================
// Inventory
// =============================================================================

/**
 * Where an installed package record came from.
 */
export type PackageSource = 'conda' | 'pypi';

/**
 * One installed package.
 *
 * Records are built once by an inventory provider and never mutated.
 */
export interface PackageRecord {
  /** Lowercased package name */
  readonly name: string;
  /** Version token as installed */
  readonly version: string;
  /** Build string as installed */
  readonly build: string;
  /** Channel the package was installed from (display only) */
  readonly channel?: string;
  /** Record origin (display only) */
  readonly source?: PackageSource;
}

/**
 * Installed packages keyed by name.
 */
export type Inventory = ReadonlyMap<string, PackageRecord>;

// =============================================================================
// Reconciliation
// =============================================================================

export type VerdictKind = 'matched' | 'mismatched' | 'missing';

/**
 * Outcome for a single specification entry.
 */
export type ComparisonVerdict =
  | { readonly kind: 'matched'; readonly spec: string; readonly name: string }
  | {
      readonly kind: 'mismatched';
      readonly spec: string;
      readonly name: string;
      readonly installed: PackageRecord;
      readonly explanation: string;
    }
  | { readonly kind: 'missing'; readonly spec: string; readonly name: string; readonly explanation: string };

/**
 * Process exit signal for a comparison run.
 */
export type OutcomeCode = 0 | 1;

export interface ComparisonResult {
  /** 0 when every entry matched, 1 otherwise */
  readonly exitCode: OutcomeCode;
  /** Explanation lines in specification order, or the single success line */
  readonly lines: readonly string[];
  /** Per-entry verdicts in specification order */
  readonly verdicts: readonly ComparisonVerdict[];
}

// =============================================================================
// Environment Diff
// =============================================================================

/**
 * A raw diff line that carried a `<` or `>` marker.
 */
export interface DiffLine {
  /** 'left' for `<` (only in A), 'right' for `>` (only in B) */
  readonly side: 'left' | 'right';
  /** Line text with the two-character marker removed */
  readonly text: string;
}

export interface DiffRow {
  readonly package: string;
  readonly presentInA: boolean;
  readonly presentInB: boolean;
}

export interface DiffReport {
  readonly labelA: string;
  readonly labelB: string;
  readonly rows: readonly DiffRow[];
}
