/**
 * Compare Command Options
 *
 * Validates what commander collected into a CompareOptions value.
 *
 * @module packages/cli/commands/compare/options
 */

import { z } from 'zod';
import { OptionsError } from '@envcompare/core';

const nonEmpty = z.string().trim().min(1);

const RawCompareOptionsSchema = z
  .object({
    prefix: nonEmpty.optional(),
    name: nonEmpty.optional(),
    json: z.boolean().default(false),
    diff: z.boolean().default(false),
    verbose: z.boolean().default(false),
    targets: z.array(z.string()).default([]),
  })
  .superRefine((raw, ctx) => {
    if (raw.prefix !== undefined && raw.name !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: '-n/--name and -p/--prefix cannot be used together',
      });
    }
    if (raw.diff) {
      if (raw.targets.length !== 2) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `--diff takes exactly two environment names (got ${raw.targets.length})`,
        });
      }
      if (raw.prefix !== undefined || raw.name !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: '--diff does not take -n/--name or -p/--prefix',
        });
      }
    } else if (raw.targets.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          raw.targets.length === 0
            ? 'An environment file is required'
            : `Expected one environment file (got ${raw.targets.length})`,
      });
    }
  });

export type RawCompareOptions = z.input<typeof RawCompareOptionsSchema>;

export interface CompareOptions {
  prefix?: string;
  name?: string;
  json: boolean;
  diff: boolean;
  verbose: boolean;
  /** Environment file (reconcile mode) */
  file?: string;
  /** Environments to diff (diff mode) */
  environments?: [string, string];
}

/**
 * Validate raw command-line values
 *
 * @throws OptionsError listing every problem found
 */
export function parseCompareOptions(raw: RawCompareOptions): CompareOptions {
  const result = RawCompareOptionsSchema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new OptionsError(messages[0] ?? 'Invalid options', messages.slice(1));
  }

  const { targets, ...rest } = result.data;
  const [first, second] = targets;

  if (rest.diff && first !== undefined && second !== undefined) {
    return { ...rest, environments: [first, second] };
  }
  return { ...rest, file: first };
}
