/**
 * Spec Matcher Tests
 *
 * Reconciliation of installed inventories against specification lists.
 */

import { describe, it, expect } from 'vitest';
import { reconcile, SUCCESS_MESSAGE } from '../reconciler.js';
import { buildInventory } from '../inventory.js';
import { SpecParseError } from '../errors.js';
import type { PackageRecord } from '../types.js';

const inventoryOf = (...records: PackageRecord[]) => buildInventory(records).inventory;

const numpy: PackageRecord = { name: 'numpy', version: '1.2', build: '0' };
const requests: PackageRecord = { name: 'requests', version: '2.0', build: '0' };

describe('reconcile()', () => {
  it('reports a missing package and fails', () => {
    const result = reconcile(inventoryOf(numpy, requests), ['numpy=1.2=0', 'flask']);

    expect(result.lines).toEqual(['flask not found']);
    expect(result.exitCode).toBe(1);
  });

  it('returns only the success line when everything matches', () => {
    const result = reconcile(inventoryOf(numpy), ['numpy=1.2=0']);

    expect(result.lines).toEqual([SUCCESS_MESSAGE]);
    expect(result.exitCode).toBe(0);
  });

  it('spells out the success line', () => {
    expect(SUCCESS_MESSAGE).toBe(
      'Success. All the packages in the specification file are present in the environment ' +
        'with matching version and build string.'
    );
  });

  it('reports a mismatch with the specification text and the installed triple', () => {
    const result = reconcile(inventoryOf(numpy), ['numpy=1.3']);

    expect(result.lines).toEqual([
      'numpy found but mismatch. Specification pkg: numpy=1.3, Running pkg: numpy==1.2=0',
    ]);
    expect(result.exitCode).toBe(1);
  });

  it('reports the name in lowercase for missing packages', () => {
    const result = reconcile(inventoryOf(numpy), ['Flask>=2']);
    expect(result.lines).toEqual(['flask not found']);
  });

  it('evaluates every entry after a failure', () => {
    const result = reconcile(inventoryOf(numpy, requests), ['flask', 'numpy=9', 'requests', 'django']);

    expect(result.lines).toEqual([
      'flask not found',
      'numpy found but mismatch. Specification pkg: numpy=9, Running pkg: numpy==1.2=0',
      'django not found',
    ]);
    expect(result.verdicts.map((v) => v.kind)).toEqual(['missing', 'mismatched', 'matched', 'missing']);
  });

  it('follows specification order regardless of inventory order', () => {
    const specs = ['zlib', 'attrs', 'numpy=2'];
    const forward = reconcile(inventoryOf(numpy, requests), specs);
    const backward = reconcile(inventoryOf(requests, numpy), specs);

    expect(forward.lines).toEqual([
      'zlib not found',
      'attrs not found',
      'numpy found but mismatch. Specification pkg: numpy=2, Running pkg: numpy==1.2=0',
    ]);
    expect(backward).toEqual(forward);
  });

  it('is deterministic for repeated calls', () => {
    const inventory = inventoryOf(numpy, requests);
    const specs = ['numpy', 'requests==3', 'six'];
    expect(reconcile(inventory, specs)).toEqual(reconcile(inventory, specs));
  });

  it('succeeds on an empty specification list', () => {
    const result = reconcile(inventoryOf(numpy), []);
    expect(result.lines).toEqual([SUCCESS_MESSAGE]);
    expect(result.exitCode).toBe(0);
    expect(result.verdicts).toEqual([]);
  });

  it('keeps the installed record on mismatched verdicts', () => {
    const [verdict] = reconcile(inventoryOf(numpy), ['numpy=1.2=1']).verdicts;
    expect(verdict).toEqual({
      kind: 'mismatched',
      spec: 'numpy=1.2=1',
      name: 'numpy',
      installed: numpy,
      explanation: 'numpy found but mismatch. Specification pkg: numpy=1.2=1, Running pkg: numpy==1.2=0',
    });
  });

  it('stops at a malformed entry and reports its position', () => {
    try {
      reconcile(inventoryOf(numpy), ['numpy', 'flask', 'numpy=1=2=3', 'six']);
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof SpecParseError)) throw error;
      expect(error.index).toBe(2);
      expect(error.entry).toBe('numpy=1=2=3');
      expect(error.details).toEqual(['entry #3 of the specification list']);
    }
  });

  it('matches names case-insensitively against the inventory', () => {
    const result = reconcile(inventoryOf({ name: 'PyYAML', version: '6.0', build: 'pypi_0' }), ['pyyaml==6.0']);
    expect(result.exitCode).toBe(0);
  });
});
