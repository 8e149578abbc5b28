/**
 * Line Diff Ports
 *
 * Capabilities the two-environment comparison needs from the outside
 * world: listing an environment as text lines, and diffing two listings.
 *
 * @module packages/core/ports/line-differ
 */

/**
 * Lists the packages of a named environment as stable text lines,
 * one package per line.
 */
export interface IEnvironmentInventoryLister {
  list(environment: string): Promise<string[]>;
}

/**
 * Compares two line sequences.
 */
export interface ILineDiffer {
  /**
   * Fail before any work is done when the differ cannot run.
   *
   * @throws ExternalToolUnavailableError
   */
  assertAvailable(): Promise<void>;

  /**
   * Diff two listings.
   *
   * @returns Diff stream where "< " lines are left-only and "> " lines right-only
   */
  diff(left: readonly string[], right: readonly string[]): Promise<string>;
}
