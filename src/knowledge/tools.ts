import { z } from 'zod';

import type { Metric } from '../schema/index.js';
import type { KnowledgeBase } from './store.js';

// ── Tool contract ────────────────────────────────────────────

export interface Tool {
  name: string;
  description: string;
  /** Parameter names, for the prompt. */
  parameters: readonly string[];
  /** Validate raw model-supplied input and run. Never throws on bad input. */
  invoke(input: unknown): string;
}

function defineTool<Shape extends z.ZodRawShape>(spec: {
  name: string;
  description: string;
  input: Shape;
  run: (input: z.objectOutputType<Shape, z.ZodTypeAny, 'strip'>) => string;
}): Tool {
  const schema = z.object(spec.input);
  return {
    name: spec.name,
    description: spec.description,
    parameters: Object.keys(spec.input),
    invoke(input) {
      const parsed = schema.safeParse(input ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((i) => `${i.path.join('.') || 'input'}: ${i.message}`)
          .join('; ');
        return `Invalid input for ${spec.name}: ${issues}`;
      }
      return spec.run(parsed.data);
    },
  };
}

// ── Formatting ───────────────────────────────────────────────

function signed(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(1)}`;
}

function formatTrend(metric: Metric): string {
  return `${metric.trend} ${signed(metric.changePct)}%`;
}

function matches(query: string, ...fields: string[]): boolean {
  const needle = query.toLowerCase();
  return fields.some((f) => f.toLowerCase().includes(needle));
}

// ── Search tools ─────────────────────────────────────────────

export function createSearchTools(kb: KnowledgeBase): Tool[] {
  const searchTickets = defineTool({
    name: 'search_tickets',
    description: 'Search tickets by keyword (title, description, priority, status, assignee).',
    input: { query: z.string().min(1) },
    run: ({ query }) => {
      const hits: string[] = [];
      for (const [id, t] of kb.tickets) {
        if (matches(query, t.title, t.description, t.priority, t.status, t.assignee)) {
          hits.push(
            `${id}: ${t.title} (Status: ${t.status}, Priority: ${t.priority}, Assignee: ${t.assignee})`,
          );
        }
      }
      if (hits.length === 0) return `No tickets found matching '${query}'`;
      return `Found ${String(hits.length)} ticket(s):\n${hits.join('\n')}`;
    },
  });

  const searchDocs = defineTool({
    name: 'search_docs',
    description: 'Search documentation pages by keyword (title and content).',
    input: { query: z.string().min(1) },
    run: ({ query }) => {
      const hits: string[] = [];
      for (const [key, d] of kb.docs) {
        if (matches(query, d.title, d.content)) {
          hits.push(`• ${d.title} (Key: ${key}, Updated: ${d.updated})`);
        }
      }
      if (hits.length === 0) return `No docs found matching '${query}'`;
      return `Found ${String(hits.length)} document(s):\n${hits.join('\n')}`;
    },
  });

  return [searchTickets, searchDocs];
}

// ── Retrieve tools ───────────────────────────────────────────

export function createRetrieveTools(kb: KnowledgeBase): Tool[] {
  const getTicketDetails = defineTool({
    name: 'get_ticket_details',
    description: 'Get full details for one ticket by id, e.g. SHOP-2847.',
    input: { ticketId: z.string().min(1) },
    run: ({ ticketId }) => {
      const id = ticketId.trim().toUpperCase();
      const t = kb.tickets.get(id);
      if (!t) return `Ticket ${ticketId} not found`;
      return [
        `Ticket ${id}: ${t.title}`,
        `Status: ${t.status}`,
        `Assignee: ${t.assignee}`,
        `Priority: ${t.priority}`,
        `Created: ${t.created}`,
        `Updated: ${t.updated}`,
        '',
        'Description:',
        t.description,
      ].join('\n');
    },
  });

  const getDoc = defineTool({
    name: 'get_doc',
    description: 'Get the full content of one documentation page by key.',
    input: { docKey: z.string().min(1) },
    run: ({ docKey }) => {
      const d = kb.docs.get(docKey.trim());
      if (!d) {
        return `Document '${docKey}' not found. Available keys: ${[...kb.docs.keys()].join(', ')}`;
      }
      return [d.title, `Last updated: ${d.updated}`, '', 'Content:', d.content].join('\n');
    },
  });

  return [getTicketDetails, getDoc];
}

// ── Analyze tools ────────────────────────────────────────────

export function createAnalyzeTools(kb: KnowledgeBase): Tool[] {
  const getMetric = defineTool({
    name: 'get_metric',
    description: 'Get the current value, previous value and trend of one metric.',
    input: { metricName: z.string().min(1) },
    run: ({ metricName }) => {
      const m = kb.metrics.get(metricName.trim());
      if (!m) {
        return `Metric '${metricName}' not found. Available: ${[...kb.metrics.keys()].join(', ')}`;
      }
      return [
        `${metricName}:`,
        `Current: ${String(m.current)}`,
        `Previous: ${String(m.previous)}`,
        `Trend: ${m.trend} (${signed(m.changePct)}%)`,
        `Period: ${m.period}`,
      ].join('\n');
    },
  });

  const compareMetrics = defineTool({
    name: 'compare_metrics',
    description: 'Compare two metrics side by side.',
    input: { metricA: z.string().min(1), metricB: z.string().min(1) },
    run: ({ metricA, metricB }) => {
      const a = kb.metrics.get(metricA.trim());
      const b = kb.metrics.get(metricB.trim());
      if (!a || !b) return `One or both metrics not found: ${metricA}, ${metricB}`;
      return [
        'Comparison:',
        `${metricA}: ${String(a.current)} (${formatTrend(a)})`,
        `${metricB}: ${String(b.current)} (${formatTrend(b)})`,
      ].join('\n');
    },
  });

  const listMetrics = defineTool({
    name: 'list_metrics',
    description: 'List every available metric with its current value and trend.',
    input: {},
    run: () => {
      const lines = [...kb.metrics].map(
        ([name, m]) => `• ${name}: ${String(m.current)} (${formatTrend(m)})`,
      );
      return `Available metrics:\n${lines.join('\n')}`;
    },
  });

  return [getMetric, compareMetrics, listMetrics];
}
