/**
 * Target Prefix Resolution Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { EnvironmentLocationNotFoundError } from '@envcompare/core';
import type { RuntimeConfig } from '../../../../config.js';
import { locateNamedEnvironment, resolveTargetPrefix } from '../TargetPrefix.js';

describe('resolveTargetPrefix', () => {
  let root: string;
  let extra: string;

  function config(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
    return {
      condaExe: 'conda',
      rootPrefix: root,
      envsDirs: [extra, path.join(root, 'envs')],
      homeDir: '/home/dev',
      env: {},
      ...overrides,
    };
  }

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'envcompare-root-'));
    extra = await mkdtemp(path.join(os.tmpdir(), 'envcompare-envs-'));
    await mkdir(path.join(root, 'envs', 'analysis'), { recursive: true });
    await mkdir(path.join(root, 'envs', 'shared'), { recursive: true });
    await mkdir(path.join(extra, 'shared'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
    await rm(extra, { recursive: true, force: true });
  });

  it('resolves --prefix against the working directory', async () => {
    expect(await resolveTargetPrefix({ prefix: 'envs/local' }, config(), '/work')).toBe(
      path.resolve('/work', 'envs/local')
    );
  });

  it('expands variables in --prefix', async () => {
    const prefix = await resolveTargetPrefix(
      { prefix: '$ROOT/envs/analysis' },
      config({ env: { ROOT: root } }),
      '/work'
    );
    expect(prefix).toBe(path.join(root, 'envs', 'analysis'));
  });

  it('looks names up in the environment directories', async () => {
    expect(await resolveTargetPrefix({ name: 'analysis' }, config(), '/work')).toBe(
      path.join(root, 'envs', 'analysis')
    );
  });

  it('uses the first directory holding the name', async () => {
    expect(await resolveTargetPrefix({ name: 'shared' }, config(), '/work')).toBe(
      path.join(extra, 'shared')
    );
  });

  it('maps base and root to the root prefix', async () => {
    expect(await resolveTargetPrefix({ name: 'base' }, config(), '/work')).toBe(root);
    expect(await resolveTargetPrefix({ name: 'root' }, config(), '/work')).toBe(root);
  });

  it('fails for base when the root prefix is unknown', async () => {
    await expect(locateNamedEnvironment('base', config({ rootPrefix: undefined }))).rejects.toBeInstanceOf(
      EnvironmentLocationNotFoundError
    );
  });

  it('fails for an unknown name', async () => {
    await expect(resolveTargetPrefix({ name: 'missing' }, config(), '/work')).rejects.toBeInstanceOf(
      EnvironmentLocationNotFoundError
    );
  });

  it('prefers the active environment over the file name', async () => {
    const prefix = await resolveTargetPrefix(
      { fileName: 'analysis' },
      config({ activePrefix: '/opt/conda/envs/active' }),
      '/work'
    );
    expect(prefix).toBe('/opt/conda/envs/active');
  });

  it('falls back to the file name', async () => {
    expect(await resolveTargetPrefix({ fileName: 'analysis' }, config(), '/work')).toBe(
      path.join(root, 'envs', 'analysis')
    );
  });

  it('fails when nothing selects an environment', async () => {
    await expect(resolveTargetPrefix({}, config(), '/work')).rejects.toBeInstanceOf(
      EnvironmentLocationNotFoundError
    );
  });
});
