// =============================================================================
// CASE EVALUATION — Input Validation
//
// zod schemas for every value an operation accepts from a caller.
// Failures become INVALID_ARGUMENT. Free-text classification fields
// are accepted verbatim; only ranges, types and the PIN format are
// checked.
// =============================================================================

import { z } from 'zod';
import { invalidArgument } from '../errors';
import { JsonValue } from '../types/evaluation';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

const scoreSchema = (field: string) =>
  z.number({ invalid_type_error: `${field} must be a number` })
    .int(`${field} must be an integer`)
    .min(1, `${field} must be between 1 and 5`)
    .max(5, `${field} must be between 1 and 5`);

// ── Profiles ───────────────────────────────────────────────────────────

export const roleSchema = z.enum(['admin', 'navigator'], {
  errorMap: () => ({ message: 'role must be "admin" or "navigator"' }),
});

export const pinSchema = z.string().regex(/^\d{4}$/, 'PIN must be exactly four decimal digits');

export const newProfileSchema = z.object({
  id: z.string().min(1, 'id is required'),
  role: roleSchema,
  fullName: z.string().trim().min(1, 'fullName is required'),
  pin: pinSchema.nullish(),
});

export const profilePatchSchema = z.object({
  role: roleSchema.optional(),
  fullName: z.string().trim().min(1, 'fullName cannot be empty').optional(),
  pin: pinSchema.nullable().optional(),
});

// ── Cases ──────────────────────────────────────────────────────────────

export const newCaseSchema = z.object({
  batchId: z.string().nullish(),
  label: z.string().nullish(),
  narrativeSummary: z.string().nullish(),
  format1StateLog: jsonValueSchema.optional(),
  format2Triples: jsonValueSchema.optional(),
  format3RlScenario: jsonValueSchema.optional(),
});

export const casePatchSchema = z.object({
  batchId: z.string().nullable().optional(),
  label: z.string().nullable().optional(),
  narrativeSummary: z.string().nullable().optional(),
  format1StateLog: jsonValueSchema.optional(),
  format2Triples: jsonValueSchema.optional(),
  format3RlScenario: jsonValueSchema.optional(),
});

export const caseImportSchema = z.object({
  batchId: z.string().min(1, 'batchId is required'),
  cases: z.array(newCaseSchema).min(1, 'cases must not be empty'),
});

// ── Sessions & Ratings ─────────────────────────────────────────────────

export const startSessionSchema = z.object({
  caseId: z.string().min(1, 'caseId is required'),
  navigatorId: z.string().min(1).optional(),
});

export const overallScoreSchema = scoreSchema('overallFieldAuthenticity');

/** Rating index columns are Postgres INT. */
export const MAX_RATING_INDEX = 2147483647;

export const ratingIndexSchema = z.number({ invalid_type_error: 'index must be a number' })
  .int('index must be an integer')
  .nonnegative('index must not be negative')
  .max(MAX_RATING_INDEX, 'index out of range');

export const timelineRatingSchema = z.object({
  clinicalImpact: z.string(),
  environmentalImpact: z.string(),
  homeServiceAdoptionImpact: z.string(),
  eddDelta: z.string(),
  bottleneckRealism: z.boolean({ invalid_type_error: 'bottleneckRealism must be a boolean' }),
});

export const tacticRatingSchema = z.object({
  intentFeasibilityScore: scoreSchema('intentFeasibilityScore'),
});

export const boundaryRatingSchema = z.object({
  pnCategory: z.string(),
  aiIntendedCategory: z.string(),
});

/**
 * Parse a caller-supplied value, throwing INVALID_ARGUMENT with the
 * first issue on failure.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.errors[0];
    const where = issue && issue.path.length > 0 ? ` (${issue.path.join('.')})` : '';
    throw invalidArgument(`Invalid ${what}${where}: ${issue ? issue.message : 'malformed input'}`);
  }
  return result.data;
}
