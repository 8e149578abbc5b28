/**
 * Environment File Parser
 *
 * Parses the two environment description formats the comparison accepts:
 *
 * - environment.yml: YAML validated against EnvironmentFileSchema, with
 *   string dependencies for conda and `{ pip: [...] }` blocks for pip
 * - requirements.txt: one specification per line, `#` comments allowed
 *
 * Parsing is pure; reading the source is EnvironmentFileSource's job.
 *
 * @module packages/cli/commands/compare/adapters/EnvironmentFileParser
 */

import * as yaml from 'js-yaml';
import { EnvironmentFileError, type EnvironmentDependencies } from '@envcompare/core';
import { EnvironmentFileSchema } from './schemas.js';

/**
 * Parsed content, before the source location is attached
 */
export interface ParsedEnvironmentFile {
  name?: string;
  channels: string[];
  dependencies: EnvironmentDependencies;
}

// ============================================================================
// YAML
// ============================================================================

/**
 * Parse environment.yml content
 *
 * @param content - File content
 * @param source - Path or URL, used in error messages
 * @throws EnvironmentFileError on YAML syntax errors, schema violations or an empty file
 */
export function parseEnvironmentYaml(content: string, source: string): ParsedEnvironmentFile {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      const location = error.mark ? ` (line ${error.mark.line + 1})` : '';
      throw new EnvironmentFileError(source, 'YAML syntax error', [`${error.reason}${location}`]);
    }
    throw error;
  }

  if (raw === null || raw === undefined) {
    throw new EnvironmentFileError(source, 'Environment file is empty');
  }

  const result = EnvironmentFileSchema.safeParse(raw);
  if (!result.success) {
    throw new EnvironmentFileError(
      source,
      'Invalid environment file',
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }

  const conda: string[] = [];
  const pip: string[] = [];
  for (const entry of result.data.dependencies) {
    if (typeof entry === 'string') {
      conda.push(entry);
    } else {
      pip.push(...entry.pip);
    }
  }

  return {
    name: result.data.name,
    channels: result.data.channels,
    dependencies: { conda, pip },
  };
}

// ============================================================================
// Requirements
// ============================================================================

/**
 * Parse a requirements list (one specification per line)
 *
 * @throws EnvironmentFileError for explicit (@EXPLICIT) package lists
 */
export function parseRequirements(content: string, source: string): ParsedEnvironmentFile {
  const conda: string[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '@EXPLICIT') {
      throw new EnvironmentFileError(source, 'Explicit package lists cannot be compared', [
        'the file lists package URLs rather than specifications',
      ]);
    }
    if (line === '' || line.startsWith('#')) continue;
    conda.push(line);
  }

  return { channels: [], dependencies: { conda, pip: [] } };
}

/**
 * True when the source should be read as a requirements list
 */
export function isRequirementsFile(source: string): boolean {
  return /\.txt$/i.test(source.replace(/[?#].*$/, ''));
}
