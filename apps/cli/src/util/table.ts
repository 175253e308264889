/**
 * Minimal table formatter for CLI output.
 * Prints a simple ASCII table with column headers and rows.
 */

export interface TableOptions {
  /** Widest a column may grow before values are cut (default 40) */
  maxWidth?: number;
  /** Text printed instead of a table when there are no rows */
  emptyText?: string;
}

export function formatTable(
  columns: string[],
  rows: Record<string, unknown>[],
  options: TableOptions = {},
): string {
  const maxWidth = options.maxWidth ?? 40;
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return options.emptyText ?? '(no entries)';

  const widths = columns.map((col) => col.length);
  for (const row of rows) {
    for (let i = 0; i < columns.length; i++) {
      const val = formatValue(row[columns[i]]);
      widths[i] = Math.min(Math.max(widths[i], val.length), maxWidth);
    }
  }

  const lines: string[] = [];
  lines.push(columns.map((col, i) => col.padEnd(widths[i])).join(' | ').trimEnd());
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));

  for (const row of rows) {
    const line = columns
      .map((col, i) => {
        const val = formatValue(row[col]);
        return val.length > widths[i] ? val.slice(0, widths[i] - 1) + '…' : val.padEnd(widths[i]);
      })
      .join(' | ');
    lines.push(line.trimEnd());
  }

  return lines.join('\n');
}

function formatValue(val: unknown): string {
  if (val === null || val === undefined) return '';
  if (typeof val === 'string') return val.replace(/\r?\n/g, ' ');
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}
