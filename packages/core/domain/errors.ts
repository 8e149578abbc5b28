/**
 * Environment Comparison Error Hierarchy
 *
 * Every fatal condition of a comparison run is a CompareError carrying a
 * stable code. Per-entry misses and mismatches are not errors; they are
 * reported through ComparisonResult.
 *
 * @module packages/core/domain/errors
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Error code categories:
 * - LOCATION_*: environment prefix errors (1xxx)
 * - SPEC_*: specification source errors (2xxx)
 * - PARSE_*: specification entry errors (3xxx)
 * - TOOL_*: external tool errors (4xxx)
 * - OPTIONS_*: command-line usage errors (5xxx)
 */
export const ErrorCodes = {
  LOCATION_NOT_FOUND: 'E1001',

  SPEC_NOT_FOUND: 'E2001',
  SPEC_INVALID: 'E2002',

  PARSE_INVALID_ENTRY: 'E3001',

  TOOL_UNAVAILABLE: 'E4001',
  TOOL_FAILED: 'E4002',

  OPTIONS_INVALID: 'E5001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ============================================================================
// Base Error Class
// ============================================================================

export interface CompareErrorOptions {
  code: ErrorCode;
  suggestion?: string;
  details?: string[];
  cause?: unknown;
}

/**
 * Base error class for all fatal comparison errors
 */
export class CompareError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode;

  /** Suggested action for the user */
  readonly suggestion?: string;

  /** Additional details about the error */
  readonly details?: string[];

  constructor(message: string, options: CompareErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'CompareError';
    this.code = options.code;
    this.suggestion = options.suggestion;
    this.details = options.details;
  }

  /**
   * Format error for display
   */
  toDisplayString(): string {
    let output = `${this.message} [${this.code}]`;
    if (this.details && this.details.length > 0) {
      output += '\n' + this.details.map((d) => `  - ${d}`).join('\n');
    }
    if (this.suggestion) {
      output += `\n\nSuggestion: ${this.suggestion}`;
    }
    return output;
  }

  /**
   * Format error for JSON output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      details: this.details,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

// ============================================================================
// Location Errors
// ============================================================================

/**
 * The installation root does not exist or is not an environment
 */
export class EnvironmentLocationNotFoundError extends CompareError {
  readonly location: string;

  constructor(location: string, options: { suggestion?: string; cause?: unknown } = {}) {
    super(`Not a conda environment: ${location}`, {
      code: ErrorCodes.LOCATION_NOT_FOUND,
      suggestion:
        options.suggestion ??
        'Pass an existing environment with -n/--name or -p/--prefix, or activate one first.',
      cause: options.cause,
    });
    this.name = 'EnvironmentLocationNotFoundError';
    this.location = location;
  }
}

// ============================================================================
// Specification Source Errors
// ============================================================================

/**
 * The specification file cannot be located or read
 */
export class SpecNotFoundError extends CompareError {
  readonly source: string;

  constructor(source: string, options: { reason?: string; cause?: unknown } = {}) {
    super(`Environment file not found: ${source}`, {
      code: ErrorCodes.SPEC_NOT_FOUND,
      details: options.reason ? [options.reason] : undefined,
      suggestion: 'Check the path or URL of the environment file.',
      cause: options.cause,
    });
    this.name = 'SpecNotFoundError';
    this.source = source;
  }
}

/**
 * The specification file was read but its content is unusable
 */
export class EnvironmentFileError extends CompareError {
  readonly source: string;

  constructor(source: string, message: string, details: string[] = []) {
    super(`${message}: ${source}`, {
      code: ErrorCodes.SPEC_INVALID,
      details: details.length > 0 ? details : undefined,
      suggestion: 'Fix the environment file and run the comparison again.',
    });
    this.name = 'EnvironmentFileError';
    this.source = source;
  }
}

// ============================================================================
// Parse Errors
// ============================================================================

/**
 * A specification entry could not be parsed
 */
export class SpecParseError extends CompareError {
  readonly entry: string;
  readonly reason: string;

  /** Position of the entry in the specification list, when known */
  readonly index?: number;

  constructor(entry: string, reason: string, index?: number) {
    super(`Invalid package specification "${entry}": ${reason}`, {
      code: ErrorCodes.PARSE_INVALID_ENTRY,
      details: index !== undefined ? [`entry #${index + 1} of the specification list`] : undefined,
      suggestion: 'Use the form name, name=version, name=version=build or name>=version.',
    });
    this.name = 'SpecParseError';
    this.entry = entry;
    this.reason = reason;
    this.index = index;
  }

  /**
   * Attach the list position to an error raised while parsing a lone entry
   */
  atIndex(index: number): SpecParseError {
    return new SpecParseError(this.entry, this.reason, index);
  }
}

// ============================================================================
// External Tool Errors
// ============================================================================

/**
 * A required external program is not installed
 */
export class ExternalToolUnavailableError extends CompareError {
  readonly tool: string;

  constructor(tool: string) {
    super(`${tool} command could not be found. Please install it to proceed.`, {
      code: ErrorCodes.TOOL_UNAVAILABLE,
    });
    this.name = 'ExternalToolUnavailableError';
    this.tool = tool;
  }
}

/**
 * An external program ran but failed
 */
export class ExternalToolError extends CompareError {
  readonly tool: string;
  readonly exitCode: number | null;

  constructor(tool: string, exitCode: number | null, stderr: string, cause?: unknown) {
    super(`${tool} failed${exitCode !== null ? ` with exit code ${exitCode}` : ''}`, {
      code: ErrorCodes.TOOL_FAILED,
      details: stderr.trim() ? [stderr.trim()] : undefined,
      cause,
    });
    this.name = 'ExternalToolError';
    this.tool = tool;
    this.exitCode = exitCode;
  }
}

// ============================================================================
// Usage Errors
// ============================================================================

export class OptionsError extends CompareError {
  constructor(message: string, details: string[] = []) {
    super(message, {
      code: ErrorCodes.OPTIONS_INVALID,
      details: details.length > 0 ? details : undefined,
      suggestion: 'Run "envcompare compare --help" for usage.',
    });
    this.name = 'OptionsError';
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if an error is a CompareError
 */
export function isCompareError(error: unknown): error is CompareError {
  return error instanceof CompareError;
}

/**
 * Extract error code from any error
 */
export function getErrorCode(error: unknown): ErrorCode | string {
  if (error instanceof CompareError) {
    return error.code;
  }
  if (error instanceof Error && 'code' in error) {
    return String(error.code);
  }
  return 'UNKNOWN';
}
