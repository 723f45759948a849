import { describe, it, expect } from 'vitest';
import chalk from 'chalk';
import { formatTable, type Column } from '../table.js';

// eslint-disable-next-line no-control-regex
const strip = (text: string): string => text.replace(/\x1B\[[0-9;]*m/g, '');

interface Item {
  id: number;
  name: string;
}

const columns: Column<Item>[] = [
  { header: 'ID', value: (r) => r.id, align: 'right' },
  { header: 'Name', value: (r) => r.name },
];

describe('formatTable', () => {
  it('renders headers, rows and borders', () => {
    const result = strip(
      formatTable(columns, [
        { id: 1, name: 'guide.txt' },
        { id: 12, name: 'a.md' },
      ])
    );

    expect(result.split('\n')).toEqual([
      '┌────┬───────────┐',
      '│ ID │ Name      │',
      '├────┼───────────┤',
      '│  1 │ guide.txt │',
      '│ 12 │ a.md      │',
      '└────┴───────────┘',
    ]);
  });

  it('measures colored cells by their visible width', () => {
    const result = strip(formatTable(columns, [{ id: 3, name: chalk.green('ok') }]));

    expect(result.split('\n')[3]).toBe('│  3 │ ok   │');
  });

  it('renders only headers when there are no rows', () => {
    expect(strip(formatTable(columns, [])).split('\n')).toHaveLength(4);
  });

  it('returns empty string without columns', () => {
    expect(formatTable([], [{ id: 1, name: 'x' }])).toBe('');
  });
});
