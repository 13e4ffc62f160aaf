/**
 * Table formatting for CLI output (box-drawing characters).
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right' | 'center';

export interface Column {
  /** Header text */
  header: string;
  /** Key looked up in each row */
  key: string;
  /** Alignment (default: left) */
  align?: Alignment;
  /** Minimum width */
  minWidth?: number;
  /** Longer values are cut and end with an ellipsis */
  maxWidth?: number;
}

export type Row = Record<string, string | number | boolean | null | undefined>;

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1B\[[0-9;]*m/g;

function visibleLength(str: string): number {
  return str.replace(ANSI_PATTERN, '').length;
}

function pad(str: string, width: number, align: Alignment): string {
  const padding = width - visibleLength(str);
  if (padding <= 0) return str;

  if (align === 'right') return ' '.repeat(padding) + str;
  if (align === 'center') {
    const left = Math.floor(padding / 2);
    return ' '.repeat(left) + str + ' '.repeat(padding - left);
  }
  return str + ' '.repeat(padding);
}

function cellText(column: Column, row: Row): string {
  const value = row[column.key];
  const text = value === null || value === undefined ? '' : String(value);
  if (column.maxWidth !== undefined && visibleLength(text) > column.maxWidth) {
    return text.replace(ANSI_PATTERN, '').slice(0, Math.max(0, column.maxWidth - 1)) + '…';
  }
  return text;
}

/**
 * Format rows as a table.
 *
 * ```
 * ┌───────────┬───────┐
 * │ Session   │ Loops │
 * ├───────────┼───────┤
 * │ 3f2a…     │     2 │
 * └───────────┴───────┘
 * ```
 */
export function formatTable(columns: Column[], rows: Row[]): string {
  if (columns.length === 0) return '';

  const cells = rows.map((row) => columns.map((col) => cellText(col, row)));
  const widths = columns.map((col, i) =>
    Math.max(
      col.header.length,
      col.minWidth ?? 0,
      ...cells.map((rowCells) => visibleLength(rowCells[i] ?? ''))
    )
  );

  const border = (left: string, middle: string, right: string): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(middle) + right;

  const line = (values: string[], header = false): string =>
    '│' +
    columns
      .map((col, i) => {
        const padded = pad(values[i] ?? '', widths[i] ?? 0, col.align ?? 'left');
        return ` ${header ? chalk.bold(padded) : padded} `;
      })
      .join('│') +
    '│';

  return [
    border('┌', '┬', '┐'),
    line(columns.map((c) => c.header), true),
    border('├', '┼', '┤'),
    ...cells.map((rowCells) => line(rowCells)),
    border('└', '┴', '┘'),
  ].join('\n');
}
