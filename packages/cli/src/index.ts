/**
 * envcompare CLI
 *
 * Compares the packages installed in a conda environment with an
 * environment file, or with another environment.
 *
 * @module @envcompare/cli
 */

// =============================================================================
// Command Exports
// =============================================================================

export { createCompareCommand, registerCommands } from './commands/index.js';
export { compareCommand, type CompareCommandDeps } from './commands/compare/compare.js';
export { diffCommand, type DiffCommandDeps } from './commands/compare/diff.js';
export { parseCompareOptions, type CompareOptions } from './commands/compare/options.js';

// =============================================================================
// Adapter Exports
// =============================================================================

export { PrefixInventoryReader, isCondaEnvironment } from './commands/compare/adapters/PrefixInventoryReader.js';
export { EnvironmentFileSource } from './commands/compare/adapters/EnvironmentFileSource.js';
export { CondaListLister } from './commands/compare/adapters/CondaListLister.js';
export { GnuDiffer } from './commands/compare/adapters/GnuDiffer.js';
export { resolveTargetPrefix } from './commands/compare/adapters/TargetPrefix.js';

// =============================================================================
// Utility Exports
// =============================================================================

export { loadRuntimeConfig, type RuntimeConfig } from './config.js';
export { createLogger, resolveLogLevel } from './utils/logger.js';
export { handleError, shouldUseColor } from './commands/compare/utils.js';
