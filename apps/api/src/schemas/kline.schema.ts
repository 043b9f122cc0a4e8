import { z } from 'zod';
import { DecimalStringSchema, IntervalSchema } from '@candlevault/schemas';

/** Largest instant a JavaScript Date can hold */
const MAX_UTC_MILLIS = 8.64e15;

const utcMillisSchema = (name: string) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, `${name} must be UTC milliseconds`)
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().max(MAX_UTC_MILLIS, `${name} is out of range`));

/**
 * GET /api/v1/kline query string
 *
 * `limit` must be an integer when present; values outside 1..1000 fall back
 * to 1000 in the handler.
 */
export const KlineQuerySchema = z.object({
  symbol: z.string().trim().min(1, 'symbol is required'),
  interval: IntervalSchema,
  start_time: utcMillisSchema('start_time').optional(),
  end_time: utcMillisSchema('end_time').optional(),
  limit: z
    .string()
    .trim()
    .regex(/^-?\d+$/, 'limit must be an integer')
    .transform((val) => parseInt(val, 10))
    .optional(),
});

export type KlineQueryParams = z.infer<typeof KlineQuerySchema>;

/**
 * One stored bar as returned to clients
 */
export const KlineViewSchema = z.object({
  timestamp: z.string().describe('Bar open time, local wall clock (yyyy-MM-dd HH:mm:ss)'),
  timestamp_ms: z.number().int().describe('Bar open time, UTC epoch milliseconds'),
  open: DecimalStringSchema,
  high: DecimalStringSchema,
  low: DecimalStringSchema,
  close: DecimalStringSchema,
  volume: DecimalStringSchema,
  note: z.string().nullable(),
});

export type KlineView = z.infer<typeof KlineViewSchema>;

export const KlineResponseSchema = z.object({
  symbol: z.string(),
  interval: IntervalSchema,
  data: z.array(KlineViewSchema),
  count: z.number().int(),
});
