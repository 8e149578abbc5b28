/**
 * Runtime Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { OptionsError } from '@envcompare/core';
import { loadRuntimeConfig } from '../config.js';

const HOME = '/home/dev';

describe('loadRuntimeConfig', () => {
  it('uses defaults when nothing is set', () => {
    const config = loadRuntimeConfig({}, HOME);

    expect(config.activePrefix).toBeUndefined();
    expect(config.condaExe).toBe('conda');
    expect(config.rootPrefix).toBeUndefined();
    expect(config.envsDirs).toEqual([path.join(HOME, '.conda', 'envs')]);
    expect(config.homeDir).toBe(HOME);
    expect(config.logLevel).toBeUndefined();
  });

  it('derives the root prefix from CONDA_EXE', () => {
    const config = loadRuntimeConfig({ CONDA_EXE: '/opt/conda/bin/conda' }, HOME);

    expect(config.condaExe).toBe('/opt/conda/bin/conda');
    expect(config.rootPrefix).toBe('/opt/conda');
    expect(config.envsDirs).toEqual([
      path.join('/opt/conda', 'envs'),
      path.join(HOME, '.conda', 'envs'),
    ]);
  });

  it('prefers CONDA_ROOT over CONDA_EXE', () => {
    const config = loadRuntimeConfig(
      { CONDA_ROOT: '/srv/miniconda', CONDA_EXE: '/opt/conda/bin/conda' },
      HOME
    );
    expect(config.rootPrefix).toBe('/srv/miniconda');
  });

  it('searches CONDA_ENVS_PATH entries first', () => {
    const config = loadRuntimeConfig(
      { CONDA_ENVS_PATH: ['/data/envs', '/scratch/envs'].join(path.delimiter), CONDA_ROOT: '/opt/conda' },
      HOME
    );
    expect(config.envsDirs).toEqual([
      '/data/envs',
      '/scratch/envs',
      path.join('/opt/conda', 'envs'),
      path.join(HOME, '.conda', 'envs'),
    ]);
  });

  it('treats empty values as unset', () => {
    const config = loadRuntimeConfig({ CONDA_PREFIX: '', ENVCOMPARE_LOG_LEVEL: '' }, HOME);
    expect(config.activePrefix).toBeUndefined();
    expect(config.logLevel).toBeUndefined();
  });

  it('reads the active prefix and log level', () => {
    const config = loadRuntimeConfig(
      { CONDA_PREFIX: '/opt/conda/envs/analysis', ENVCOMPARE_LOG_LEVEL: 'debug' },
      HOME
    );
    expect(config.activePrefix).toBe('/opt/conda/envs/analysis');
    expect(config.logLevel).toBe('debug');
  });

  it('rejects an unknown log level', () => {
    let caught: unknown;
    try {
      loadRuntimeConfig({ ENVCOMPARE_LOG_LEVEL: 'loud' }, HOME);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(OptionsError);
    if (caught instanceof OptionsError) {
      expect(caught.code).toBe('E5001');
      expect(caught.details?.[0]).toMatch(/^ENVCOMPARE_LOG_LEVEL: /);
    }
  });
});
