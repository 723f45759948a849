/**
 * Relevance scoring
 *
 * Two different numbers come out of a search:
 * - per chunk, similarity = 1 - distance
 * - per result set, relevance = mean(1 / (1 + distance))
 *
 * The quality label summarizes mean similarity for display only.
 */

import type { NearestChunk } from '../database/chunk-store.js';
import type { QualityLabel, ScoredChunk, SearchOutcome } from './types.js';

const QUALITY_THRESHOLDS: Array<[number, QualityLabel]> = [
  [0.8, 'Excellent'],
  [0.6, 'Good'],
  [0.4, 'Fair'],
];

export function similarityFromDistance(distance: number): number {
  return 1 - distance;
}

/**
 * Mean of 1 / (1 + distance), or null for no results.
 */
export function relevanceScore(distances: number[]): number | null {
  if (distances.length === 0) return null;
  return distances.reduce((sum, d) => sum + 1 / (1 + d), 0) / distances.length;
}

export function qualityLabel(meanSimilarity: number): QualityLabel {
  for (const [threshold, label] of QUALITY_THRESHOLDS) {
    if (meanSimilarity >= threshold) return label;
  }
  return 'Poor';
}

export function sourceLabel(filename: string, chunkIndex: number): string {
  return `${filename} (chunk ${chunkIndex})`;
}

/**
 * Score nearest-neighbor results, keeping their order.
 */
export function scoreResults(nearest: NearestChunk[]): SearchOutcome {
  if (nearest.length === 0) {
    return { status: 'empty', results: [], relevanceScore: null, meanSimilarity: null, quality: null };
  }

  const results: ScoredChunk[] = nearest.map(({ chunk, filename, distance }) => ({
    chunk,
    filename,
    distance,
    similarity: similarityFromDistance(distance),
    sourceLabel: sourceLabel(filename, chunk.chunkIndex),
  }));

  const meanSimilarity = results.reduce((sum, r) => sum + r.similarity, 0) / results.length;

  return {
    status: 'found',
    results,
    relevanceScore: relevanceScore(results.map((r) => r.distance)) ?? 0,
    meanSimilarity,
    quality: qualityLabel(meanSimilarity),
  };
}
