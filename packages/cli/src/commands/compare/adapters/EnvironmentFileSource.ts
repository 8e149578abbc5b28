/**
 * Environment File Source
 *
 * Implements ISpecificationProvider for local paths and allow-listed URLs.
 *
 * @module packages/cli/commands/compare/adapters/EnvironmentFileSource
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import type { Logger } from 'pino';
import {
  SpecNotFoundError,
  type EnvironmentSpec,
  type ISpecificationProvider,
  type SpecificationLoadOptions,
} from '@envcompare/core';
import { resolveUserPath } from '../../../utils/paths.js';
import {
  isRequirementsFile,
  parseEnvironmentYaml,
  parseRequirements,
  type ParsedEnvironmentFile,
} from './EnvironmentFileParser.js';

/** URL schemes loaded remotely; anything else is treated as a local path */
export const REMOTE_SCHEMES = ['http', 'https', 'file'] as const;

export type FetchFn = (url: string) => Promise<Response>;

export interface EnvironmentFileSourceConfig {
  logger: Logger;
  cwd: string;
  env: Readonly<Record<string, string | undefined>>;
  homeDir: string;
  fetchFn?: FetchFn;
}

/**
 * Scheme of a URL-like source, if it is one of REMOTE_SCHEMES
 */
export function remoteScheme(file: string): string | undefined {
  const index = file.indexOf('://');
  if (index <= 0) return undefined;
  const scheme = file.slice(0, index).toLowerCase();
  return REMOTE_SCHEMES.find((allowed) => allowed === scheme);
}

export class EnvironmentFileSource implements ISpecificationProvider {
  private readonly logger: Logger;
  private readonly cwd: string;
  private readonly env: Readonly<Record<string, string | undefined>>;
  private readonly homeDir: string;
  private readonly fetchFn: FetchFn;

  constructor(config: EnvironmentFileSourceConfig) {
    this.logger = config.logger;
    this.cwd = config.cwd;
    this.env = config.env;
    this.homeDir = config.homeDir;
    this.fetchFn = config.fetchFn ?? ((url) => fetch(url));
  }

  async load(file: string, options: SpecificationLoadOptions = {}): Promise<EnvironmentSpec> {
    const scheme = remoteScheme(file);

    let source: string;
    let content: string;
    let parsed: ParsedEnvironmentFile;

    if (scheme === 'http' || scheme === 'https') {
      source = file;
      content = await this.fetchText(file);
      parsed = parseEnvironmentYaml(content, source);
    } else {
      source =
        scheme === 'file'
          ? this.fileUrlToPath(file)
          : resolveUserPath(file, this.cwd, this.env, this.homeDir);
      content = await this.readLocal(source);
      parsed = isRequirementsFile(source)
        ? parseRequirements(content, source)
        : parseEnvironmentYaml(content, source);
    }

    this.logger.debug(
      {
        source,
        conda: parsed.dependencies.conda.length,
        pip: parsed.dependencies.pip.length,
      },
      'Loaded environment file'
    );

    return {
      name: options.name ?? parsed.name,
      channels: parsed.channels,
      dependencies: parsed.dependencies,
      source,
    };
  }

  // ===========================================================================
  // Reading
  // ===========================================================================

  private async fetchText(url: string): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchFn(url);
    } catch (error) {
      throw new SpecNotFoundError(url, {
        reason: error instanceof Error ? error.message : String(error),
        cause: error,
      });
    }

    if (!response.ok) {
      throw new SpecNotFoundError(url, {
        reason: `HTTP ${response.status} ${response.statusText}`.trim(),
      });
    }
    return response.text();
  }

  private async readLocal(filePath: string): Promise<string> {
    try {
      return await readFile(filePath, 'utf-8');
    } catch (error) {
      throw new SpecNotFoundError(filePath, {
        reason: error instanceof Error ? error.message : String(error),
        cause: error,
      });
    }
  }

  private fileUrlToPath(url: string): string {
    try {
      return fileURLToPath(url);
    } catch (error) {
      throw new SpecNotFoundError(url, {
        reason: error instanceof Error ? error.message : String(error),
        cause: error,
      });
    }
  }
}
