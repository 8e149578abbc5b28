/**
 * Core Domain
 *
 * Exports the comparison domain: value types, the match-spec grammar,
 * the reconciler and the diff reporter.
 */

export * from './types.js';
export * from './errors.js';
export * from './version.js';
export * from './match-spec.js';
export * from './inventory.js';
export * from './reconciler.js';
export * from './diff-report.js';
