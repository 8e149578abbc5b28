/**
 * Environment Comparison Tests
 *
 * Runs the two-environment flow against in-process fakes.
 */

import { describe, it, expect, vi } from 'vitest';
import { compareEnvironments } from '../environment-comparison.js';
import { ExternalToolUnavailableError } from '../../domain/errors.js';
import type { IEnvironmentInventoryLister, ILineDiffer } from '../../ports/line-differ.js';

const createLister = (listings: Record<string, string[]>, calls: string[] = []): IEnvironmentInventoryLister => ({
  list: vi.fn(async (environment: string) => {
    calls.push(`list:${environment}`);
    return listings[environment] ?? [];
  }),
});

const createDiffer = (output: string, calls: string[] = []): ILineDiffer => ({
  assertAvailable: vi.fn(async () => {
    calls.push('assert');
  }),
  diff: vi.fn(async () => {
    calls.push('diff');
    return output;
  }),
});

describe('compareEnvironments()', () => {
  it('lists A, then B, then diffs, and renders the stream', async () => {
    const calls: string[] = [];
    const lister = createLister({ env1: ['numpy 1.2', 'six 1.16'], env2: ['numpy 1.3', 'six 1.16'] }, calls);
    const differ = createDiffer('1c1\n< numpy 1.2\n---\n> numpy 1.3\n', calls);

    const report = await compareEnvironments({ lister, differ, labelA: 'env1', labelB: 'env2' });

    expect(calls).toEqual(['assert', 'list:env1', 'list:env2', 'diff']);
    expect(differ.diff).toHaveBeenCalledWith(['numpy 1.2', 'six 1.16'], ['numpy 1.3', 'six 1.16']);
    expect(report).toEqual({
      labelA: 'env1',
      labelB: 'env2',
      rows: [
        { package: 'numpy 1.2', presentInA: true, presentInB: false },
        { package: 'numpy 1.3', presentInA: false, presentInB: true },
      ],
    });
  });

  it('lists nothing when the differ is unavailable', async () => {
    const lister = createLister({});
    const differ: ILineDiffer = {
      assertAvailable: vi.fn(async () => {
        throw new ExternalToolUnavailableError('diff');
      }),
      diff: vi.fn(),
    };

    await expect(compareEnvironments({ lister, differ, labelA: 'a', labelB: 'b' })).rejects.toThrow(
      'diff command could not be found. Please install it to proceed.'
    );
    expect(lister.list).not.toHaveBeenCalled();
    expect(differ.diff).not.toHaveBeenCalled();
  });

  it('reports progress before each step', async () => {
    const onProgress = vi.fn();
    await compareEnvironments({
      lister: createLister({}),
      differ: createDiffer(''),
      labelA: 'base',
      labelB: 'dev',
      onProgress,
    });

    expect(onProgress.mock.calls.map(([message]) => message)).toEqual([
      'Listing packages in base',
      'Listing packages in dev',
      'Comparing package lists',
    ]);
  });

  it('returns an empty report when the listings are identical', async () => {
    const report = await compareEnvironments({
      lister: createLister({ a: ['x'], b: ['x'] }),
      differ: createDiffer(''),
      labelA: 'a',
      labelB: 'b',
    });
    expect(report.rows).toEqual([]);
  });
});
