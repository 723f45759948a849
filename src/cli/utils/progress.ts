/**
 * Progress Reporter
 *
 * Shows ingest progress while a document is chunked, embedded and stored:
 * - Interactive: one ora spinner per stage
 * - Text: plain lines for non-TTY output
 * - JSON: nothing; the command prints a single result object at the end
 *
 * Spinner updates are throttled to 100ms to prevent flickering.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { IngestCallbacks, IngestStage, StageStats } from '../../indexer/pipeline.js';

const STAGE_LABELS: Record<IngestStage, string> = {
  chunking: 'Chunking',
  embedding: 'Embedding',
  storing: 'Storing',
};

export interface ProgressReporterOptions {
  /** Suppress all progress output */
  json: boolean;
  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

export class ProgressReporter {
  private spinner: Ora | null = null;
  private currentStage: IngestStage | null = null;
  private currentTotal = 0;
  private lastUpdateTime = 0;

  private static readonly UPDATE_THROTTLE_MS = 100;

  constructor(private readonly options: ProgressReporterOptions) {}

  startStage(stage: IngestStage, total: number): void {
    this.currentStage = stage;
    this.currentTotal = total;
    if (this.options.json) return;

    const label = STAGE_LABELS[stage];
    if (this.options.isInteractive) {
      this.spinner?.stop();
      this.spinner = ora({ text: `${label}...`, prefixText: chalk.cyan(label.padEnd(10)) }).start();
    } else {
      console.log(`${label}...`);
    }
  }

  updateProgress(processed: number): void {
    if (!this.currentStage || this.options.json || !this.spinner) return;

    const now = performance.now();
    if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    const percentage = this.currentTotal > 0 ? Math.round((processed / this.currentTotal) * 100) : 100;
    this.spinner.text = `${processed}/${this.currentTotal} (${percentage}%)`;
  }

  completeStage(stats: StageStats): void {
    if (!this.options.json) {
      const summary = `${stats.processed.toLocaleString()} chunks ${chalk.dim(`(${stats.durationMs}ms)`)}`;
      if (this.spinner) {
        this.spinner.succeed(summary);
      } else {
        console.log(`${STAGE_LABELS[stats.stage]} complete: ${summary}`);
      }
    }
    this.currentStage = null;
    this.spinner = null;
  }

  /**
   * Stop the running spinner with a failure mark.
   */
  fail(): void {
    this.spinner?.fail();
    this.spinner = null;
    this.currentStage = null;
  }

  /**
   * Callbacks for IngestionPipeline and DocumentService.
   */
  callbacks(): IngestCallbacks {
    return {
      onStageStart: (stage, total) => this.startStage(stage, total),
      onProgress: (_stage, processed) => this.updateProgress(processed),
      onStageComplete: (_stage, stats) => this.completeStage(stats),
    };
  }
}

export function createProgressReporter(options: { json: boolean }): ProgressReporter {
  return new ProgressReporter({
    json: options.json,
    isInteractive: Boolean(process.stdout.isTTY),
  });
}
