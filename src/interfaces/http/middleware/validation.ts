/**
 * Request Validation
 * Layer: Interfaces (HTTP)
 *
 * `parseRequest(schema, input)` checks a request part (query, body, params)
 * against a Zod schema and returns the parsed, typed value. On failure it
 * throws a ValidationError (400) listing every offending field, which the
 * global error handler turns into `{ status: 'error', message }`.
 *
 * Controllers call it directly rather than writing back into `req`, since
 * Express 5 exposes `req.query` as a read-only getter.
 *
 * The schemas for the catalog endpoints live here too. `skip` and `limit`
 * must be integer text; range clamping is the service's job, so `-5` passes
 * here and becomes 0 later, while `abc` or `1.5` is rejected. Digits beyond
 * the safe-integer range are pinned to it here, since Number() would turn
 * them into exponent form and the SQL driver would misread the offset.
 *
 * A repeated text filter (`?search=a&search=b`) keeps its last value.
 */
import { ValidationError } from '@shared/errors/AppError';
import { z } from 'zod/v4';

const integerParam = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, 'must be an integer')
  .transform((value) =>
    Math.min(Math.max(Number(value), -Number.MAX_SAFE_INTEGER), Number.MAX_SAFE_INTEGER),
  );

function lastValue(value: unknown): unknown {
  return Array.isArray(value) ? value[value.length - 1] : value;
}

const textParam = z.preprocess(lastValue, z.string());

export const searchParamsSchema = z.object({
  search: textParam.optional(),
  provincia: textParam.optional(),
  skip: integerParam.optional(),
  limit: integerParam.optional(),
});

export type SearchParams = z.output<typeof searchParamsSchema>;

export function parseRequest<T extends z.ZodType>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => {
        const field = issue.path.map(String).join('.');
        return field ? `${field}: ${issue.message}` : issue.message;
      })
      .join('; ');
    throw new ValidationError(messages);
  }

  return result.data;
}
