/**
 * Search Result Formatter
 *
 * Text and JSON renderings of search results for the CLI.
 *
 * @example
 * ```typescript
 * formatResult(result);
 * // [0.92] guide.txt (chunk 1)
 * //   Machine Learning is a subset of AI. Machine learning systems...
 * ```
 */

import type { FormatOptions, FormattedResultJSON, ScoredChunk, SearchOutcome } from './types.js';

const DEFAULT_SNIPPET_LENGTH = 200;
const SNIPPET_INDENT = '  ';

/**
 * Two decimals: formatScore(0.9234) === '0.92'
 */
export function formatScore(score: number): string {
  return score.toFixed(2);
}

/**
 * Collapse whitespace to single spaces and cut to maxLength with "...".
 */
export function truncateSnippet(content: string, maxLength: number = DEFAULT_SNIPPET_LENGTH): string {
  const normalized = content.replace(/\s+/g, ' ').trim();
  if (normalized.length <= maxLength) {
    return normalized;
  }
  return normalized.slice(0, maxLength) + '...';
}

export function formatResult(result: ScoredChunk, options: FormatOptions = {}): string {
  const { snippetLength = DEFAULT_SNIPPET_LENGTH, showScore = true, showOffsets = false } = options;

  const parts: string[] = [];
  if (showScore) {
    parts.push(`[${formatScore(result.similarity)}]`);
  }
  parts.push(result.sourceLabel);
  if (showOffsets) {
    parts.push(`chars ${result.chunk.startChar}-${result.chunk.endChar}`);
  }

  return `${parts.join(' ')}\n${SNIPPET_INDENT}${truncateSnippet(result.chunk.content, snippetLength)}`;
}

/**
 * Results separated by blank lines.
 */
export function formatResults(results: ScoredChunk[], options: FormatOptions = {}): string {
  return results.map((result) => formatResult(result, options)).join('\n\n');
}

/**
 * One line for the whole result set: "Relevance: 0.812 (Good)"
 */
export function formatOutcomeSummary(outcome: SearchOutcome): string {
  if (outcome.status === 'empty') {
    return 'No relevant context found';
  }
  return `Relevance: ${outcome.relevanceScore.toFixed(3)} (${outcome.quality})`;
}

export function formatResultJSON(result: ScoredChunk): FormattedResultJSON {
  return {
    similarity: result.similarity,
    distance: result.distance,
    filename: result.filename,
    documentId: result.chunk.documentId,
    chunkIndex: result.chunk.chunkIndex,
    startChar: result.chunk.startChar,
    endChar: result.chunk.endChar,
    content: result.chunk.content,
  };
}

export function formatOutcomeJSON(outcome: SearchOutcome): {
  status: SearchOutcome['status'];
  relevanceScore: number | null;
  quality: string | null;
  results: FormattedResultJSON[];
} {
  const results: ScoredChunk[] = outcome.results;
  return {
    status: outcome.status,
    relevanceScore: outcome.relevanceScore,
    quality: outcome.quality,
    results: results.map(formatResultJSON),
  };
}
