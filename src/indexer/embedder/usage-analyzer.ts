/**
 * Usage log analysis
 *
 * Reads embedding-usage.log lines back into records and totals them for
 * `docqa usage`. Lines that don't parse (other log output, truncated
 * writes) are skipped and counted.
 */

import type { UsageOperation } from './types.js';
import { USAGE_MARKER } from './usage-log.js';

export interface ParsedUsage {
  timestamp: Date;
  operation: UsageOperation;
  model: string;
  tokens: number;
  requests: number;
  elapsedMs: number;
  cost: number;
}

export interface UsageTotals {
  calls: number;
  tokens: number;
  requests: number;
  cost: number;
  /** Mean wall-clock time per call in milliseconds */
  averageMs: number;
}

export interface UsageSummary {
  total: UsageTotals;
  byOperation: Record<string, UsageTotals>;
  byModel: Record<string, UsageTotals>;
  /** Cost per UTC day (YYYY-MM-DD), oldest first */
  costByDay: Array<{ day: string; cost: number }>;
  skippedLines: number;
}

const LINE_PATTERN = new RegExp(
  '^(\\S+) \\| ' +
    USAGE_MARKER +
    ' \\| Operation: (single_text|batch_chunks)' +
    ' \\| Model: (.+?)' +
    ' \\| Tokens: ([\\d,]+)' +
    ' \\| Requests: (\\d+)' +
    ' \\| Time: ([\\d.]+)s' +
    ' \\| Cost: \\$([\\d.]+) USD$'
);

function isOperation(value: string): value is UsageOperation {
  return value === 'single_text' || value === 'batch_chunks';
}

/**
 * Parse one log line, or null when it isn't a usage line.
 */
export function parseUsageLine(line: string): ParsedUsage | null {
  const match = LINE_PATTERN.exec(line.trim());
  if (!match) return null;

  const [, iso, operation, model, tokens, requests, seconds, cost] = match;
  const timestamp = new Date(iso);
  if (Number.isNaN(timestamp.getTime()) || !isOperation(operation)) return null;

  return {
    timestamp,
    operation,
    model,
    tokens: Number(tokens.replaceAll(',', '')),
    requests: Number(requests),
    elapsedMs: Math.round(Number(seconds) * 1000),
    cost: Number(cost),
  };
}

function emptyTotals(): UsageTotals {
  return { calls: 0, tokens: 0, requests: 0, cost: 0, averageMs: 0 };
}

function add(totals: UsageTotals, usage: ParsedUsage): void {
  totals.averageMs = (totals.averageMs * totals.calls + usage.elapsedMs) / (totals.calls + 1);
  totals.calls++;
  totals.tokens += usage.tokens;
  totals.requests += usage.requests;
  totals.cost += usage.cost;
}

/**
 * Total the usage lines, optionally only those at or after `since`.
 */
export function summarizeUsage(lines: Iterable<string>, options: { since?: Date } = {}): UsageSummary {
  const summary: UsageSummary = {
    total: emptyTotals(),
    byOperation: {},
    byModel: {},
    costByDay: [],
    skippedLines: 0,
  };
  const days = new Map<string, number>();

  for (const line of lines) {
    if (line.trim().length === 0) continue;

    const usage = parseUsageLine(line);
    if (!usage) {
      summary.skippedLines++;
      continue;
    }
    if (options.since && usage.timestamp < options.since) continue;

    add(summary.total, usage);
    add((summary.byOperation[usage.operation] ??= emptyTotals()), usage);
    add((summary.byModel[usage.model] ??= emptyTotals()), usage);

    const day = usage.timestamp.toISOString().slice(0, 10);
    days.set(day, (days.get(day) ?? 0) + usage.cost);
  }

  summary.costByDay = [...days.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([day, cost]) => ({ day, cost }));

  return summary;
}
