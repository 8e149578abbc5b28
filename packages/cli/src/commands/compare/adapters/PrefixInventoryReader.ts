/**
 * Prefix Inventory Reader
 *
 * Implements IInventoryProvider by reading an environment prefix directly:
 * the JSON records under `conda-meta/`, plus Python distributions that
 * were installed by pip into the environment's site-packages.
 *
 * @module packages/cli/commands/compare/adapters/PrefixInventoryReader
 */

import { readdir, readFile, stat } from 'fs/promises';
import * as path from 'path';
import type { Logger } from 'pino';
import {
  EnvironmentLocationNotFoundError,
  type IInventoryProvider,
  type PackageRecord,
} from '@envcompare/core';
import { CondaMetaRecordSchema, type CondaMetaRecord } from './schemas.js';

/** Build string given to packages installed by pip */
export const PYPI_BUILD = 'pypi_0';

export interface PrefixInventoryReaderConfig {
  logger: Logger;
  /** Include pip-installed distributions (default true) */
  pipInterop?: boolean;
}

/**
 * True when `prefix` holds a conda-meta/history file
 */
export async function isCondaEnvironment(prefix: string): Promise<boolean> {
  try {
    const info = await stat(path.join(prefix, 'conda-meta', 'history'));
    return info.isFile();
  } catch {
    return false;
  }
}

/**
 * Normalize a Python distribution name (lowercase, runs of -_. become -)
 */
export function normalizePythonName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-');
}

/**
 * Read Name and Version from a dist-info METADATA file
 */
export function parseDistMetadata(content: string): { name: string; version: string } | null {
  let name: string | undefined;
  let version: string | undefined;

  for (const line of content.split(/\r?\n/)) {
    // headers end at the first blank line
    if (line.trim() === '') break;
    const match = /^(Name|Version):\s*(.+?)\s*$/.exec(line);
    if (!match) continue;
    if (match[1] === 'Name') name ??= match[2];
    else version ??= match[2];
  }

  return name !== undefined && version !== undefined ? { name, version } : null;
}

export class PrefixInventoryReader implements IInventoryProvider {
  private readonly logger: Logger;
  private readonly pipInterop: boolean;

  constructor(config: PrefixInventoryReaderConfig) {
    this.logger = config.logger;
    this.pipInterop = config.pipInterop ?? true;
  }

  async list(prefix: string): Promise<PackageRecord[]> {
    if (!(await isCondaEnvironment(prefix))) {
      throw new EnvironmentLocationNotFoundError(prefix);
    }

    const condaRecords = await this.readCondaMeta(prefix);
    const records: PackageRecord[] = condaRecords.map((record): PackageRecord => ({
      name: record.name.toLowerCase(),
      version: record.version,
      build: record.build,
      channel: record.channel,
      source: 'conda',
    }));

    if (this.pipInterop) {
      records.push(...(await this.readPipDistributions(prefix, condaRecords)));
    }

    this.logger.debug({ prefix, count: records.length }, 'Read environment inventory');
    return records.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  // ===========================================================================
  // conda-meta
  // ===========================================================================

  private async readCondaMeta(prefix: string): Promise<CondaMetaRecord[]> {
    const metaDir = path.join(prefix, 'conda-meta');
    const files = (await readdir(metaDir)).filter((file) => file.endsWith('.json')).sort();
    const records: CondaMetaRecord[] = [];

    for (const file of files) {
      const filePath = path.join(metaDir, file);
      let raw: unknown;
      try {
        raw = JSON.parse(await readFile(filePath, 'utf-8'));
      } catch (error) {
        this.logger.warn({ file: filePath, err: error }, 'Skipping unreadable package record');
        continue;
      }

      const result = CondaMetaRecordSchema.safeParse(raw);
      if (!result.success) {
        this.logger.warn(
          { file: filePath, issues: result.error.issues.map((issue) => issue.message) },
          'Skipping invalid package record'
        );
        continue;
      }
      records.push(result.data);
    }

    return records;
  }

  // ===========================================================================
  // pip interop
  // ===========================================================================

  private async readPipDistributions(
    prefix: string,
    condaRecords: readonly CondaMetaRecord[]
  ): Promise<PackageRecord[]> {
    const condaNames = new Set(condaRecords.map((record) => normalizePythonName(record.name)));
    const condaFiles = new Set(
      condaRecords.flatMap((record) => record.files.map((file) => file.replace(/\\/g, '/')))
    );

    const records: PackageRecord[] = [];
    for (const sitePackages of await findSitePackages(prefix)) {
      let entries: string[];
      try {
        entries = (await readdir(sitePackages)).filter((entry) => entry.endsWith('.dist-info')).sort();
      } catch (error) {
        this.logger.debug({ dir: sitePackages, err: error }, 'Cannot list site-packages');
        continue;
      }

      for (const entry of entries) {
        const metadataPath = path.join(sitePackages, entry, 'METADATA');
        const relative = path.relative(prefix, metadataPath).split(path.sep).join('/');
        if (condaFiles.has(relative)) continue;

        let content: string;
        try {
          content = await readFile(metadataPath, 'utf-8');
        } catch (error) {
          this.logger.debug({ file: metadataPath, err: error }, 'Skipping distribution without METADATA');
          continue;
        }

        const metadata = parseDistMetadata(content);
        if (metadata === null) {
          this.logger.warn({ file: metadataPath }, 'Skipping distribution with incomplete METADATA');
          continue;
        }

        const key = normalizePythonName(metadata.name);
        if (condaNames.has(key)) continue;
        condaNames.add(key);

        records.push({
          name: key,
          version: metadata.version,
          build: PYPI_BUILD,
          source: 'pypi',
        });
      }
    }

    return records;
  }
}

/**
 * site-packages directories of a prefix: lib/python3.x/site-packages on
 * POSIX layouts, Lib/site-packages on Windows layouts.
 */
async function findSitePackages(prefix: string): Promise<string[]> {
  const dirs: string[] = [];

  try {
    const libEntries = (await readdir(path.join(prefix, 'lib'))).filter((entry) =>
      /^python\d/.test(entry)
    );
    for (const entry of libEntries.sort()) {
      dirs.push(path.join(prefix, 'lib', entry, 'site-packages'));
    }
  } catch (error) {
    if (!isMissingDirectory(error)) throw error;
  }

  dirs.push(path.join(prefix, 'Lib', 'site-packages'));
  return dirs;
}

function isMissingDirectory(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}
