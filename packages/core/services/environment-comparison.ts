/**
 * Environment Comparison
 *
 * Lists two environments, diffs the listings and builds the report.
 * Steps run strictly in order: the differ's precondition, environment A,
 * environment B, then the diff.
 *
 * @module packages/core/services/environment-comparison
 */

import { renderDiffReport } from '../domain/diff-report.js';
import type { DiffReport } from '../domain/types.js';
import type { IEnvironmentInventoryLister, ILineDiffer } from '../ports/line-differ.js';

export interface EnvironmentComparisonConfig {
  lister: IEnvironmentInventoryLister;
  differ: ILineDiffer;
  labelA: string;
  labelB: string;
  /** Called before each step with a short description */
  onProgress?: (message: string) => void;
}

/**
 * Compare the packages of two environments.
 *
 * @throws ExternalToolUnavailableError before anything is listed, if the differ cannot run
 */
export async function compareEnvironments(config: EnvironmentComparisonConfig): Promise<DiffReport> {
  const { lister, differ, labelA, labelB } = config;
  const progress = config.onProgress ?? (() => {});

  await differ.assertAvailable();

  progress(`Listing packages in ${labelA}`);
  const left = await lister.list(labelA);

  progress(`Listing packages in ${labelB}`);
  const right = await lister.list(labelB);

  progress('Comparing package lists');
  const diffText = await differ.diff(left, right);

  return renderDiffReport(diffText, labelA, labelB);
}
