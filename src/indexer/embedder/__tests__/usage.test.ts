/**
 * Usage log and analyzer tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { FileUsageLog, computeCost, formatUsageLine, pricePer1k } from '../usage-log.js';
import { parseUsageLine, summarizeUsage } from '../usage-analyzer.js';
import type { UsageRecord } from '../types.js';

const TABLE = { prices: { 'text-embedding-3-small': 0.02 }, defaultPricePer1k: 0.1 };

function usage(overrides: Partial<UsageRecord> = {}): UsageRecord {
  return {
    operation: 'batch_chunks',
    model: 'text-embedding-3-small',
    tokens: 1234,
    requests: 1,
    elapsedMs: 532,
    cost: 0.00002468,
    timestamp: new Date('2026-03-01T10:00:00.000Z'),
    ...overrides,
  };
}

describe('pricing', () => {
  it('uses the model price when listed', () => {
    expect(pricePer1k('text-embedding-3-small', TABLE)).toBe(0.02);
    expect(computeCost(1500, 'text-embedding-3-small', TABLE)).toBeCloseTo(0.03, 10);
  });

  it('falls back to the default price', () => {
    expect(pricePer1k('mystery-model', TABLE)).toBe(0.1);
    expect(computeCost(1500, 'mystery-model', TABLE)).toBeCloseTo(0.15, 10);
  });
});

describe('formatUsageLine', () => {
  it('writes one pipe-separated line', () => {
    expect(formatUsageLine(usage())).toBe(
      '2026-03-01T10:00:00.000Z | EMBEDDING_USAGE | Operation: batch_chunks | ' +
        'Model: text-embedding-3-small | Tokens: 1,234 | Requests: 1 | Time: 0.532s | ' +
        'Cost: $0.000025 USD'
    );
  });
});

describe('FileUsageLog', () => {
  let tempDir: string | undefined;

  afterEach(() => {
    if (tempDir) fs.rmSync(tempDir, { recursive: true, force: true });
    tempDir = undefined;
  });

  it('creates the log directory and appends a line per record', () => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'docqa-usage-'));
    const logPath = path.join(tempDir, 'logs', 'embedding-usage.log');
    const log = new FileUsageLog(logPath);

    log.record(usage());
    log.record(usage({ operation: 'single_text', tokens: 5 }));

    const lines = fs.readFileSync(logPath, 'utf-8').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[1]).toContain('Operation: single_text');
    expect(lines[1]).toContain('Tokens: 5 |');
  });
});

describe('parseUsageLine', () => {
  it('reads back a formatted line', () => {
    expect(parseUsageLine(formatUsageLine(usage()))).toEqual({
      timestamp: new Date('2026-03-01T10:00:00.000Z'),
      operation: 'batch_chunks',
      model: 'text-embedding-3-small',
      tokens: 1234,
      requests: 1,
      elapsedMs: 532,
      cost: 0.000025,
    });
  });

  it('returns null for other lines', () => {
    expect(parseUsageLine('2026-03-01T10:00:00.000Z | ERROR | something else')).toBeNull();
    expect(parseUsageLine('')).toBeNull();
  });
});

describe('summarizeUsage', () => {
  const lines = [
    formatUsageLine(usage({ tokens: 1000, elapsedMs: 400, cost: 0.00002 })),
    formatUsageLine(
      usage({
        operation: 'single_text',
        tokens: 10,
        elapsedMs: 200,
        cost: 0.0000002,
        timestamp: new Date('2026-03-02T08:00:00.000Z'),
      })
    ),
    'not a usage line',
    '',
    formatUsageLine(
      usage({
        model: 'text-embedding-3-large',
        tokens: 2000,
        elapsedMs: 600,
        cost: 0.00026,
        timestamp: new Date('2026-03-02T09:00:00.000Z'),
      })
    ),
  ];

  it('totals by operation and model', () => {
    const summary = summarizeUsage(lines);

    expect(summary.total).toMatchObject({ calls: 3, tokens: 3010, requests: 3 });
    expect(summary.total.averageMs).toBeCloseTo(400, 10);
    expect(summary.byOperation['batch_chunks']).toMatchObject({ calls: 2, tokens: 3000 });
    expect(summary.byOperation['batch_chunks'].averageMs).toBeCloseTo(500, 10);
    expect(summary.byOperation['single_text']).toMatchObject({ calls: 1, tokens: 10 });
    expect(summary.byModel['text-embedding-3-large'].cost).toBeCloseTo(0.00026, 10);
    expect(summary.skippedLines).toBe(1);
  });

  it('reports cost per day, oldest first', () => {
    const { costByDay } = summarizeUsage(lines);

    expect(costByDay.map((entry) => entry.day)).toEqual(['2026-03-01', '2026-03-02']);
    expect(costByDay[0].cost).toBeCloseTo(0.00002, 10);
    expect(costByDay[1].cost).toBeCloseTo(0.00026, 10);
  });

  it('ignores records before since', () => {
    const summary = summarizeUsage(lines, { since: new Date('2026-03-02T00:00:00.000Z') });

    expect(summary.total.calls).toBe(2);
    expect(summary.byOperation['batch_chunks'].calls).toBe(1);
  });
});
