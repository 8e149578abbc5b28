/**
 * Compare Options Tests
 */

import { describe, it, expect } from 'vitest';
import { OptionsError } from '@envcompare/core';
import { parseCompareOptions } from '../options.js';

function optionsError(fn: () => unknown): OptionsError {
  try {
    fn();
  } catch (error) {
    if (error instanceof OptionsError) return error;
    throw error;
  }
  throw new Error('expected an OptionsError');
}

describe('parseCompareOptions', () => {
  it('takes one environment file in reconcile mode', () => {
    expect(parseCompareOptions({ targets: ['environment.yml'] })).toEqual({
      json: false,
      diff: false,
      verbose: false,
      file: 'environment.yml',
    });
  });

  it('keeps the target selection', () => {
    const options = parseCompareOptions({ name: 'analysis', json: true, targets: ['env.yml'] });
    expect(options.name).toBe('analysis');
    expect(options.json).toBe(true);
    expect(options.file).toBe('env.yml');
  });

  it('takes two environments in diff mode', () => {
    const options = parseCompareOptions({ diff: true, targets: ['env1', 'env2'] });
    expect(options.environments).toEqual(['env1', 'env2']);
    expect(options.file).toBeUndefined();
  });

  it('requires an environment file', () => {
    expect(optionsError(() => parseCompareOptions({ targets: [] })).message).toBe(
      'An environment file is required'
    );
  });

  it('rejects several environment files', () => {
    expect(optionsError(() => parseCompareOptions({ targets: ['a.yml', 'b.yml'] })).message).toBe(
      'Expected one environment file (got 2)'
    );
  });

  it('requires exactly two environments with --diff', () => {
    expect(optionsError(() => parseCompareOptions({ diff: true, targets: ['env1'] })).message).toBe(
      '--diff takes exactly two environment names (got 1)'
    );
  });

  it('rejects --name together with --prefix', () => {
    const error = optionsError(() =>
      parseCompareOptions({ name: 'analysis', prefix: '/opt/env', targets: ['env.yml'] })
    );
    expect(error.message).toBe('-n/--name and -p/--prefix cannot be used together');
    expect(error.code).toBe('E5001');
  });

  it('rejects a blank name', () => {
    expect(optionsError(() => parseCompareOptions({ name: '  ', targets: ['env.yml'] })).message).toMatch(
      /^name: /
    );
  });
});
