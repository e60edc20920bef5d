import { z, ZodError, ZodType, ZodTypeDef } from 'zod';
import { isIsoDate } from '../../utils/dates';
import { normalizeTicker } from '../../signals/ticker-filter';
import { createAPIError } from './error-handler';

/**
 * Input Validation
 *
 * Request bodies and queries are parsed with Zod schemas; failures answer
 * 400 VALIDATION_ERROR through the error handler.
 */

const isoDate = z.string().refine(isIsoDate, 'Expected a date as YYYY-MM-DD');

// Query strings carry booleans as text
const queryBoolean = z
  .union([z.boolean(), z.enum(['true', 'false'])])
  .transform(value => value === true || value === 'true');

export const schemas = {
  cycleRun: z
    .object({
      date: isoDate.optional(),
      force: z.boolean().default(false),
    })
    .strict(),

  sellChecksRun: z
    .object({
      date: isoDate.optional(),
      execute: z.boolean().default(false),
    })
    .strict(),

  cooldownCreate: z
    .object({
      ticker: z
        .string()
        .transform(normalizeTicker)
        .pipe(z.string().regex(/^[A-Z][A-Z0-9.\-]{0,9}$/, 'Invalid ticker')),
      date: isoDate.optional(),
    })
    .strict(),

  dateQuery: z.object({
    date: isoDate.optional(),
    blockedOnly: queryBoolean.optional(),
  }),
};

function formatZodError(error: ZodError): string {
  return error.errors
    .map(err => {
      const path = err.path.join('.');
      return path ? `${path}: ${err.message}` : err.message;
    })
    .join('; ');
}

/**
 * Parse `value` with `schema` or throw a 400 VALIDATION_ERROR.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw createAPIError(formatZodError(result.error), 400, 'VALIDATION_ERROR');
  }
  return result.data;
}
