import { z } from 'zod';

/**
 * Error code enum for standardized error responses
 */
export const ErrorCodeSchema = z.enum(['BAD_REQUEST', 'NOT_FOUND', 'INTERNAL_ERROR']);

export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

/**
 * Error envelope: `{ success: false, error: { code, message } }`
 */
export const ErrorEnvelopeSchema = z.object({
  success: z.literal(false),
  error: z.object({
    code: ErrorCodeSchema,
    message: z.string(),
  }),
});

export type ErrorEnvelope = z.infer<typeof ErrorEnvelopeSchema>;

export function errorEnvelope(code: ErrorCode, message: string): ErrorEnvelope {
  return { success: false, error: { code, message } };
}
