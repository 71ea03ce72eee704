//NOTE(self): Zod runtime validation for every input boundary — CLI flags, batch files, issue bodies
//NOTE(self): Enum inputs are trimmed and lower-cased before they are checked against the taxonomy

import { z } from 'zod';
import { PRIORITIES, DOMAINS, STATUSES } from '@common/taxonomy.js';
import {
  DEFAULT_PRIORITY,
  DEFAULT_DOMAIN,
  QUICK_PHASE_DURATION,
  QUICK_PHASE_DEPENDENCIES,
} from '@common/config.js';
import { ValidationError } from '@common/errors.js';

function caseInsensitiveEnum<T extends string>(name: string, values: readonly [T, ...T[]]) {
  return z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(values, {
      errorMap: (issue, ctx) => ({
        message: issue.code === 'invalid_enum_value'
          ? `Unknown ${name} "${String(issue.received)}" (expected one of: ${values.join(', ')})`
          : ctx.defaultError,
      }),
    }));
}

export const PrioritySchema = caseInsensitiveEnum('priority', PRIORITIES);
export const DomainSchema = caseInsensitiveEnum('domain', DOMAINS);
export const StatusSchema = caseInsensitiveEnum('status', STATUSES);

// ─── Plan Overview ──────────────────────────────────────────────────────────

export const PlanInputSchema = z.object({
  title: z.string().trim().min(1, 'Plan title must not be empty'),
  priority: PrioritySchema.default(DEFAULT_PRIORITY),
  domain: DomainSchema.default(DEFAULT_DOMAIN),
});

export type PlanInput = z.infer<typeof PlanInputSchema>;
export type RawPlanInput = z.input<typeof PlanInputSchema>;

// ─── Phases ─────────────────────────────────────────────────────────────────

export const PhaseSpecSchema = z.object({
  name: z.string().trim().min(1, 'Phase name must not be empty'),
  duration: z.string().trim().transform(v => v || QUICK_PHASE_DURATION),
  dependencies: z.string().trim().transform(v => v || QUICK_PHASE_DEPENDENCIES),
});

export type PhaseSpec = z.infer<typeof PhaseSpecSchema>;

export const IssueNumberSchema = z.coerce
  .number({ invalid_type_error: 'Plan id must be a number' })
  .int('Plan id must be a whole number')
  .positive('Plan id must be positive');

// ─── Release Tracking Issue ─────────────────────────────────────────────────

export const TrackingFieldsSchema = z.object({
  version: z.string().trim().min(1, 'Tracking issue has no Version field'),
  sha256: z.string().trim().min(1),
  sourceUrl: z.string().trim().url(),
});

export type TrackingFields = z.infer<typeof TrackingFieldsSchema>;

//NOTE(self): Parse or throw a ValidationError carrying every issue zod found
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(formatZodError(result.error));
  }
  return result.data;
}

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
