import { z } from 'zod';

// ── Tickets ───────────────────────────────────────────────────

export const ticketSchema = z.object({
  title: z.string().min(1),
  status: z.string().min(1),
  assignee: z.string().min(1),
  priority: z.string().min(1),
  description: z.string(),
  created: z.string().min(1),
  updated: z.string().min(1),
});

export type Ticket = z.infer<typeof ticketSchema>;

export const ticketCollectionSchema = z.record(z.string().min(1), ticketSchema);

// ── Docs ──────────────────────────────────────────────────────

export const docSchema = z.object({
  title: z.string().min(1),
  content: z.string(),
  updated: z.string().min(1),
});

export type Doc = z.infer<typeof docSchema>;

export const docCollectionSchema = z.record(z.string().min(1), docSchema);

// ── Metrics ───────────────────────────────────────────────────

export const trendSchema = z.enum(['up', 'down', 'flat']);

export type Trend = z.infer<typeof trendSchema>;

export const metricSchema = z.object({
  current: z.number(),
  previous: z.number(),
  trend: trendSchema,
  changePct: z.number(),
  period: z.string().min(1),
});

export type Metric = z.infer<typeof metricSchema>;

export const metricCollectionSchema = z.record(z.string().min(1), metricSchema);
