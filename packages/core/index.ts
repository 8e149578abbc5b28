/**
 * @envcompare/core
 *
 * Reconciliation engine for comparing installed packages against an
 * environment specification, and for reporting the package delta
 * between two environments.
 *
 * @module packages/core
 */

// Domain
export * from './domain/index.js';

// Ports
export * from './ports/index.js';

// Services
export { compareEnvironments, type EnvironmentComparisonConfig } from './services/environment-comparison.js';
