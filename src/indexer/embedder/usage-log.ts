/**
 * Embedding usage log
 *
 * One human-readable line per embedding call, appended to
 * <home>/logs/embedding-usage.log:
 *
 *   2026-03-01T10:00:00.000Z | EMBEDDING_USAGE | Operation: batch_chunks | Model: text-embedding-3-small | Tokens: 1,234 | Requests: 1 | Time: 0.532s | Cost: $0.000025 USD
 *
 * The analyzer (usage-analyzer.ts) parses these lines back.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { PriceTable, UsageRecord, UsageSink } from './types.js';

export const USAGE_MARKER = 'EMBEDDING_USAGE';

/**
 * Price per 1K tokens for a model, falling back to the default price.
 */
export function pricePer1k(model: string, table: PriceTable): number {
  return table.prices[model] ?? table.defaultPricePer1k;
}

/**
 * (tokens / 1000) × price per 1K tokens
 */
export function computeCost(tokens: number, model: string, table: PriceTable): number {
  return (tokens / 1000) * pricePer1k(model, table);
}

export function formatUsageLine(usage: UsageRecord): string {
  return [
    usage.timestamp.toISOString(),
    USAGE_MARKER,
    `Operation: ${usage.operation}`,
    `Model: ${usage.model}`,
    `Tokens: ${usage.tokens.toLocaleString('en-US')}`,
    `Requests: ${usage.requests}`,
    `Time: ${(usage.elapsedMs / 1000).toFixed(3)}s`,
    `Cost: $${usage.cost.toFixed(6)} USD`,
  ].join(' | ');
}

/**
 * Appends usage lines to a file, creating its directory on first write.
 */
export class FileUsageLog implements UsageSink {
  private directoryReady = false;

  constructor(readonly filePath: string) {}

  record(usage: UsageRecord): void {
    if (!this.directoryReady) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.directoryReady = true;
    }
    fs.appendFileSync(this.filePath, formatUsageLine(usage) + '\n', 'utf-8');
  }
}
