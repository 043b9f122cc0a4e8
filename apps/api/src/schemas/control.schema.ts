import { z } from 'zod';
import { IntervalSchema } from '@candlevault/schemas';

/**
 * POST /api/v1/update body
 */
export const UpdateRequestSchema = z.object({
  symbol: z.string().trim().min(1, 'symbol is required'),
  intervals: z.array(IntervalSchema).min(1, 'intervals must not be empty'),
});

export const UpdateResponseSchema = z.object({
  message: z.string(),
  symbol: z.string(),
  intervals: z.array(IntervalSchema),
});

/**
 * POST /api/v1/network body
 */
export const NetworkModeRequestSchema = z.object({
  use_proxy: z.boolean(),
});

export const NetworkStatusSchema = z.object({
  use_proxy: z.boolean(),
  base_url: z.string(),
  proxy_url: z.string(),
  test_symbol: z.string(),
  last_checked_at: z.string().nullable(),
  last_probe_ok: z.boolean().nullable(),
});

export const NetworkModeResponseSchema = z.object({
  message: z.string(),
  use_proxy: z.boolean(),
});

export const NetworkTestResponseSchema = z.object({
  connected: z.boolean(),
  use_proxy: z.boolean(),
  mode: z.enum(['direct', 'proxy']),
});

export const SchedulerStatusSchema = z.object({
  running: z.boolean(),
  schedule: z.string(),
  symbols: z.array(z.string()),
  intervals: z.array(IntervalSchema),
  last_tick_at: z.string().nullable(),
  last_updates: z.record(z.string(), z.record(z.string(), z.string())),
  frequencies: z.record(z.string(), z.number()),
  in_flight: z.array(z.string()),
});

export const SchedulerTransitionSchema = z.object({
  message: z.string(),
  running: z.boolean(),
});
