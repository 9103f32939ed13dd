/**
 * Zod schemas for validating connector inputs
 */

import { z } from 'zod';
import { FILTER_OPERATORS, type FilterCondition } from '../types/filter.js';

/** Filter operator enum */
export const filterOperatorSchema = z.enum(FILTER_OPERATORS);

/** Single filter condition */
export const filterConditionSchema = z
  .object({
    field: z.string().min(1),
    op: filterOperatorSchema,
    value: z.unknown(),
  })
  .strict()
  // z.unknown() infers an optional key; FilterCondition requires it
  .transform(({ field, op, value }): FilterCondition => ({ field, op, value }));

export const domainLeafSchema = z.tuple([z.string().min(1), z.string().min(1), z.unknown()]);

export const domainTermSchema = z.union([z.enum(['&', '|', '!']), domainLeafSchema]);

export const domainSchema = z.array(domainTermSchema);

/** A filter is either a raw domain or a list of unified conditions */
export const filterSchema = z.union([domainSchema, z.array(filterConditionSchema)]);

export const offsetSchema = z.number().int().min(0);

export const limitSchema = z.number().int().min(0);

/**
 * All issues on one line, each prefixed with its path unless it is at the root
 */
export function formatZodError(err: z.ZodError, title?: string): string {
  const issues = err.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });

  return title ? `${title}: ${issues.join('; ')}` : issues.join('; ');
}
