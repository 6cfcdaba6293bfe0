import { z } from 'zod';

const principal = z.string().trim().min(1, 'must be a non-empty principal');

/** A state by name (`"Rated"`) or 1-based ordinal (`4`). */
const stateRef = z.union([z.string().trim().min(1), z.number().int()]);

export const createServiceSchema = z.object({
  recipient: principal,
});

export const assignCompanionSchema = z.object({
  companion: principal,
});

// Range checks for the rating stay with the state machine so that they map to
// InvalidRating rather than a generic bad request.
export const changeStateSchema = z.object({
  state: stateRef,
  rating: z.number().optional(),
});

export const configureStateUriSchema = z.object({
  state: stateRef,
  uri: z.string().trim().min(1, 'must be a non-empty URI'),
});

/** Decimal digits only: no sign, blanks, exponent or hex prefix. */
const digits = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform(Number);

export const tokenIdSchema = digits;

// `?tokenId=` with no value is treated as absent
const blankAsAbsent = z.literal('').transform(() => undefined);

export const journalQuerySchema = z.object({
  limit: z.union([blankAsAbsent, digits.pipe(z.number().min(1).max(500))]).optional(),
  tokenId: z.union([blankAsAbsent, digits]).optional(),
});

export function validateRequest<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
): { success: true; data: T } | { success: false; error: string } {
  const result = schema.safeParse(body);
  if (!result.success) {
    return {
      success: false,
      error: result.error.issues
        .map((issue) =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
        )
        .join('; '),
    };
  }
  return { success: true, data: result.data };
}
