/**
 * IInventoryProvider Interface
 *
 * Port for reading the packages installed under an environment prefix.
 *
 * @module packages/core/ports/inventory-provider
 */

import type { PackageRecord } from '../domain/types.js';

/**
 * Reads installed package records from an environment prefix.
 */
export interface IInventoryProvider {
  /**
   * List the packages installed under `prefix`.
   *
   * @throws EnvironmentLocationNotFoundError if `prefix` is not an environment root
   */
  list(prefix: string): Promise<PackageRecord[]>;
}
