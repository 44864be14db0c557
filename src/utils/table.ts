/**
 * Table Formatting
 *
 * Box-drawn tables for `status` and `cache stats`. Widths ignore ANSI
 * colour codes, so cells may be pre-coloured with chalk.
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export interface Column {
  header: string;
  /** Key of the cell value in each row */
  key: string;
  align?: Alignment;
  /** Longer values are cut and end with an ellipsis */
  maxWidth?: number;
}

export type Row = Record<string, string | number | null | undefined>;

export interface TableOptions {
  /** Row drawn below a separator, e.g. totals */
  footer?: Row;
}

const ANSI_PATTERN = /\x1B\[[0-9;]*m/g; // eslint-disable-line no-control-regex

function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

function cellText(row: Row, column: Column): string {
  const value = row[column.key];
  const text = value === null || value === undefined ? '' : String(value);
  if (column.maxWidth === undefined || visibleLength(text) <= column.maxWidth) {
    return text;
  }
  // Truncation works on the plain text; colours are dropped
  const plain = text.replace(ANSI_PATTERN, '');
  return `${plain.slice(0, Math.max(0, column.maxWidth - 1))}…`;
}

function pad(text: string, width: number, align: Alignment): string {
  const fill = ' '.repeat(Math.max(0, width - visibleLength(text)));
  return align === 'right' ? fill + text : text + fill;
}

/**
 * Format rows as a table.
 *
 * @example
 * ```ts
 * formatTable(
 *   [
 *     { header: 'Namespace', key: 'namespace' },
 *     { header: 'Vectors', key: 'count', align: 'right' },
 *   ],
 *   [{ namespace: 'manuals', count: 120 }],
 *   { footer: { namespace: 'Total', count: 120 } }
 * );
 * // ┌───────────┬─────────┐
 * // │ Namespace │ Vectors │
 * // ├───────────┼─────────┤
 * // │ manuals   │     120 │
 * // ├───────────┼─────────┤
 * // │ Total     │     120 │
 * // └───────────┴─────────┘
 * ```
 */
export function formatTable(columns: Column[], rows: Row[], options: TableOptions = {}): string {
  if (columns.length === 0) return '';

  const body = rows.map((row) => columns.map((column) => cellText(row, column)));
  const footerRow = options.footer;
  const footer = footerRow ? columns.map((column) => cellText(footerRow, column)) : undefined;

  const widths = columns.map((column, i) => {
    const lengths = [...body, ...(footer ? [footer] : [])].map((cells) => visibleLength(cells[i] ?? ''));
    return Math.max(column.header.length, ...lengths);
  });

  const rule = (left: string, middle: string, right: string): string =>
    left + widths.map((width) => '─'.repeat(width + 2)).join(middle) + right;

  const line = (cells: string[], style: (text: string) => string = (text) => text): string =>
    '│' +
    columns
      .map((column, i) => ` ${style(pad(cells[i] ?? '', widths[i] ?? 0, column.align ?? 'left'))} `)
      .join('│') +
    '│';

  const lines = [
    rule('┌', '┬', '┐'),
    line(
      columns.map((column) => column.header),
      chalk.bold
    ),
    rule('├', '┼', '┤'),
    ...body.map((cells) => line(cells)),
  ];
  if (footer) {
    lines.push(rule('├', '┼', '┤'), line(footer, chalk.bold));
  }
  lines.push(rule('└', '┴', '┘'));

  return lines.join('\n');
}
