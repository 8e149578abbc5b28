/**
 * Inventory Construction
 *
 * @module packages/core/domain/inventory
 */

import type { Inventory, PackageRecord } from './types.js';

export interface InventoryBuildResult {
  inventory: Inventory;
  /** Names reported more than once, in first-repeat order */
  duplicates: string[];
}

/**
 * Key package records by name.
 *
 * When a name is reported more than once the last record wins; the name
 * is listed in `duplicates` so the caller can surface it.
 */
export function buildInventory(records: Iterable<PackageRecord>): InventoryBuildResult {
  const inventory = new Map<string, PackageRecord>();
  const duplicates: string[] = [];

  for (const record of records) {
    const name = record.name.toLowerCase();
    if (inventory.has(name) && !duplicates.includes(name)) {
      duplicates.push(name);
    }
    inventory.set(name, record.name === name ? record : { ...record, name });
  }

  return { inventory, duplicates };
}

/**
 * Render a record the way mismatches report it: name==version=build
 */
export function formatRecord(record: PackageRecord): string {
  return `${record.name}==${record.version}=${record.build}`;
}
