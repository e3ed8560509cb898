import { z } from 'zod';

const isoDate = z.string().datetime({ offset: true });

export const rateViewSchema = z.object({
  pair: z.string(),
  from: z.string(),
  to: z.string(),
  rate: z.number(),
  updatedAt: isoDate,
  source: z.string(),
  origin: z.string(),
  fresh: z.boolean(),
  ageSeconds: z.number()
});

export const rateListSchema = z.object({
  baseCurrency: z.string(),
  lastRefresh: isoDate.nullable(),
  ttlSeconds: z.number(),
  rates: z.array(rateViewSchema)
});

export const rateDescriptionSchema = z.object({
  from: z.string(),
  to: z.string(),
  rate: z.number(),
  reverseRate: z.number(),
  updatedAt: isoDate,
  source: z.string(),
  via: z.string(),
  fresh: z.boolean(),
  ageSeconds: z.number(),
  ttlSeconds: z.number()
});

const errorSummarySchema = z.object({ code: z.string(), message: z.string() });
const classCountsSchema = z.object({ fetched: z.number(), saved: z.number(), rejected: z.number() });

export const updateResultSchema = z.object({
  runId: z.string(),
  trigger: z.string(),
  success: z.boolean(),
  elapsedMs: z.number(),
  lastRefresh: isoDate.nullable(),
  sources: z.array(
    z.object({
      source: z.string(),
      ok: z.boolean(),
      fetched: z.number(),
      attempts: z.number(),
      elapsedMs: z.number(),
      error: errorSummarySchema.optional()
    })
  ),
  counts: z.object({ fiat: classCountsSchema, crypto: classCountsSchema }),
  totals: classCountsSchema,
  error: errorSummarySchema.optional()
});

export const historySchema = z.object({
  entries: z.array(
    z.object({
      id: z.string(),
      from: z.string(),
      to: z.string(),
      rate: z.number(),
      timestamp: isoDate,
      source: z.string()
    })
  )
});

export const schedulerStatusSchema = z.object({
  running: z.boolean(),
  intervalMs: z.number(),
  ttlSeconds: z.number(),
  scheduledRuns: z.number(),
  successfulRuns: z.number(),
  failedRuns: z.number(),
  inFlight: z.boolean(),
  lastRunAt: isoDate.nullable(),
  lastSuccessAt: isoDate.nullable(),
  nextRunAt: isoDate.nullable()
});

export type RateView = z.infer<typeof rateViewSchema>;
export type RateList = z.infer<typeof rateListSchema>;
export type RateDescription = z.infer<typeof rateDescriptionSchema>;
export type UpdateResultView = z.infer<typeof updateResultSchema>;
export type HistoryView = z.infer<typeof historySchema>;
export type SchedulerStatusView = z.infer<typeof schedulerStatusSchema>;

export type CommandResponse =
  | { kind: 'show-rates'; body: RateList }
  | { kind: 'get-rate'; body: RateDescription }
  | { kind: 'history'; body: HistoryView }
  | { kind: 'scheduler-status'; body: SchedulerStatusView }
  | { kind: 'update-rates'; body: UpdateResultView };
