import { z } from 'zod';

/**
 * Interval enum - bar durations this service keeps in sync
 *
 * Uses the upstream (Binance) spelling so values can be passed straight
 * through as the `interval` query parameter.
 */
export const IntervalSchema = z.enum([
  '5m',   // 5 minutes
  '30m',  // 30 minutes
  '1h',   // 1 hour
  '4h',   // 4 hours
]);
export type Interval = z.infer<typeof IntervalSchema>;

export const SUPPORTED_INTERVALS: readonly Interval[] = IntervalSchema.options;

/**
 * Exact decimal as the upstream sends it ("42000.01000000").
 * Never parsed to a float.
 */
export const DecimalStringSchema = z
  .string()
  .regex(/^-?\d+(\.\d+)?$/, 'Expected a decimal string');

/**
 * Upstream kline row
 *
 * [0] openTime, [1] open, [2] high, [3] low, [4] close, [5] volume,
 * [6] closeTime, [7] quoteVolume, ... (trailing fields are ignored)
 */
export const KlineRowSchema = z
  .tuple([
    z.number().int().nonnegative(),
    DecimalStringSchema,
    DecimalStringSchema,
    DecimalStringSchema,
    DecimalStringSchema,
    DecimalStringSchema,
  ])
  .rest(z.unknown());

/**
 * Decoded upstream bar. Timestamps are UTC milliseconds.
 */
export interface RawKline {
  openTime: number;
  open: string;
  high: string;
  low: string;
  close: string;
  volume: string;
}

export type KlineDecodeResult =
  | { ok: true; kline: RawKline }
  | { ok: false; reason: string };

/** Minimum number of positional fields in an upstream row */
export const KLINE_MIN_FIELDS = 6;

/**
 * Decode one upstream row into a fixed-shape record.
 *
 * Rows shorter than six fields, with a non-integer open time or with
 * non-string prices are rejected with a reason instead of throwing.
 */
export function decodeKline(row: unknown): KlineDecodeResult {
  if (!Array.isArray(row)) {
    return { ok: false, reason: 'row is not an array' };
  }
  if (row.length < KLINE_MIN_FIELDS) {
    return { ok: false, reason: `expected at least ${KLINE_MIN_FIELDS} fields, got ${row.length}` };
  }

  const parsed = KlineRowSchema.safeParse(row);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return {
      ok: false,
      reason: `field ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'invalid'}`,
    };
  }

  const [openTime, open, high, low, close, volume] = parsed.data;
  return { ok: true, kline: { openTime, open, high, low, close, volume } };
}

/**
 * Stored kline record
 *
 * `timestamp` is the bucket-open time as a local wall-clock string
 * (`yyyy-MM-dd HH:mm:ss`) in the configured zone; it is the primary key.
 */
export const KlineRecordSchema = z.object({
  timestamp: z.string().min(1),
  open: DecimalStringSchema,
  high: DecimalStringSchema,
  low: DecimalStringSchema,
  close: DecimalStringSchema,
  volume: DecimalStringSchema,
  note: z.string().nullable(),
});
export type KlineRecord = z.infer<typeof KlineRecordSchema>;

/**
 * Query options for reading stored klines. Bounds are inclusive local
 * wall-clock strings; either may be omitted.
 */
export interface KlineQuery {
  start?: string;
  end?: string;
  limit: number;
}
