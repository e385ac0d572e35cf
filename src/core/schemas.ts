/**
 * Zod schemas for every JSON artifact the core reads.
 *
 * Record schemas are built with `inInputOrder`: fields the core does not
 * interpret must survive a parse/serialize round trip untouched, and so must
 * the order of every key.
 *
 * @module core/schemas
 */

import { z } from 'zod';
import { CP_TIERS, type CpTier } from './types.js';

/**
 * Validate against `schema` but yield the input value itself.
 *
 * A zod object puts its declared keys first when it parses, which would
 * reorder every record the core writes back. Only for schemas without
 * transforms or defaults, whose output is their input.
 */
export function inInputOrder<S extends z.ZodTypeAny>(schema: S): z.ZodType<z.output<S>> {
  return z.custom<z.output<S>>().superRefine((value, ctx) => {
    const result = schema.safeParse(value);
    if (!result.success) {
      for (const issue of result.error.issues) {
        ctx.addIssue(issue);
      }
    }
  });
}

/**
 * Lowercase slug; also keeps codenames from escaping the root
 */
export const CodenameSchema = z
  .string()
  .regex(/^[a-z0-9][a-z0-9_-]*$/, 'Codename must be a lowercase slug (a-z, 0-9, "_" or "-")');

/**
 * CP tier given as a number or a numeric string (CLI arguments, JSON)
 */
export const CpTierSchema = z
  .union([z.number(), z.string().regex(/^\d+$/).transform(Number)])
  .refine((value): value is CpTier => (CP_TIERS as readonly number[]).includes(value), {
    message: `CP tier must be one of ${CP_TIERS.join(', ')}`,
  });

/**
 * Cup definition (gamemaster/cups/<codename>.json)
 */
export const CupDefinitionSchema = inInputOrder(
  z
    .object({
      name: z.string().optional(),
      title: z.string().optional(),
      league: z.union([z.number(), z.string()]).optional(),
      link: z.string().optional(),
      include: z.array(z.unknown()).optional(),
      exclude: z.array(z.unknown()).optional(),
    })
    .passthrough()
);

export type CupDefinition = z.infer<typeof CupDefinitionSchema>;

/**
 * One entry of gamemaster/formats.json
 */
export const FormatsEntrySchema = inInputOrder(
  z
    .object({
      cup: z.string(),
      title: z.string(),
      cp: z.number().optional(),
      meta: z.string().optional(),
    })
    .passthrough()
);

export type FormatsEntry = z.infer<typeof FormatsEntrySchema>;

export const FormatsFileSchema = z.array(FormatsEntrySchema);

/**
 * Ranking or override record: only the species identifier is interpreted
 */
export const RankedEntrySchema = inInputOrder(
  z
    .object({
      speciesId: z.string(),
      moveset: z.array(z.string()).optional(),
    })
    .passthrough()
);

export type RankedEntry = z.infer<typeof RankedEntrySchema>;

export const RankedListSchema = z.array(RankedEntrySchema);

/**
 * Record set fed to the threat-group filter; identifiers may be absent
 */
export const SpeciesRecordSchema = inInputOrder(
  z
    .object({
      speciesId: z.string().optional(),
    })
    .passthrough()
);

export type SpeciesRecord = z.infer<typeof SpeciesRecordSchema>;

export const SpeciesRecordListSchema = z.array(SpeciesRecordSchema);

/**
 * Include/exclude rule of a cup definition that lists species ids
 */
export const IdFilterRuleSchema = z
  .object({
    filterType: z.literal('id'),
    values: z.array(z.string()),
  })
  .passthrough();

/**
 * Format zod issues as `path: message` pairs
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}
