/**
 * Zod schemas for the files the compare adapters read
 *
 * @module packages/cli/commands/compare/adapters/schemas
 */

import { z } from 'zod';

// =============================================================================
// conda-meta records
// =============================================================================

/**
 * One `conda-meta/<dist>.json` record. Older records carry `build_string`
 * instead of `build`.
 */
export const CondaMetaRecordSchema = z
  .object({
    name: z.string().min(1),
    version: z.string().min(1),
    build: z.string().optional(),
    build_string: z.string().optional(),
    channel: z.string().optional(),
    files: z.array(z.string()).optional(),
  })
  .passthrough()
  .transform((record, ctx) => {
    const build = record.build ?? record.build_string;
    if (build === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'record has no build string', path: ['build'] });
      return z.NEVER;
    }
    return {
      name: record.name,
      version: record.version,
      build,
      channel: record.channel,
      files: record.files ?? [],
    };
  });

export type CondaMetaRecord = z.output<typeof CondaMetaRecordSchema>;

// =============================================================================
// Environment files
// =============================================================================

const PipBlockSchema = z.object({ pip: z.array(z.string()) }).strict();

export const DependencyEntrySchema = z.union([z.string(), PipBlockSchema]);

/**
 * environment.yml content. Keys the comparison does not use
 * (prefix, variables) are accepted and ignored.
 */
export const EnvironmentFileSchema = z
  .object({
    name: z.string().min(1).optional(),
    channels: z.array(z.string()).nullish().transform((channels) => channels ?? []),
    dependencies: z
      .array(DependencyEntrySchema)
      .nullish()
      .transform((entries) => entries ?? []),
  })
  .passthrough();

export type EnvironmentFile = z.output<typeof EnvironmentFileSchema>;
