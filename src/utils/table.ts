/**
 * Box-drawn tables for CLI output (document list, usage summaries).
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export interface Column<R> {
  /** Header text */
  header: string;
  /** Cell text for a row */
  value: (row: R) => string | number;
  /** Alignment (default: left) */
  align?: Alignment;
}

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1B\[[0-9;]*m/g;

function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

function pad(text: string, width: number, align: Alignment): string {
  const padding = ' '.repeat(Math.max(0, width - visibleLength(text)));
  return align === 'right' ? padding + text : text + padding;
}

/**
 * Render rows as a table:
 *
 * ┌────┬───────────┐
 * │ ID │ Filename  │
 * ├────┼───────────┤
 * │  1 │ guide.txt │
 * └────┴───────────┘
 */
export function formatTable<R>(columns: Column<R>[], rows: R[]): string {
  if (columns.length === 0) return '';

  const cells = rows.map((row) => columns.map((col) => String(col.value(row))));
  const widths = columns.map((col, i) =>
    Math.max(visibleLength(col.header), ...cells.map((line) => visibleLength(line[i] ?? '')))
  );

  const rule = (left: string, middle: string, right: string): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(middle) + right;

  const line = (values: string[], header = false): string =>
    '│' +
    columns
      .map((col, i) => {
        const padded = pad(values[i] ?? '', widths[i] ?? 0, header ? 'left' : (col.align ?? 'left'));
        return ` ${header ? chalk.bold(padded) : padded} `;
      })
      .join('│') +
    '│';

  return [
    rule('┌', '┬', '┐'),
    line(columns.map((c) => c.header), true),
    rule('├', '┼', '┤'),
    ...cells.map((values) => line(values)),
    rule('└', '┴', '┘'),
  ].join('\n');
}
