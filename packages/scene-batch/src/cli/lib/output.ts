/**
 * Output Formatting for CLI Commands
 *
 * Tables and JSON for command results. Log lines go through the logger;
 * these helpers write what a command is asked to print.
 *
 * @module cli/lib/output
 */

/**
 * Column definition for table output
 */
export interface TableColumn<T> {
  readonly header: string;
  readonly value: (row: T) => string | number;
  readonly align?: 'left' | 'right';
}

/**
 * Format rows as a table
 */
export function formatTable<T>(rows: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (rows.length === 0) {
    return 'No entries found.';
  }

  const cells = rows.map((row) => columns.map((col) => String(col.value(row))));
  const widths = columns.map((col, i) =>
    Math.max(col.header.length, ...cells.map((line) => (line[i] ?? '').length))
  );

  const pad = (text: string, i: number): string => {
    const width = widths[i] ?? text.length;
    return columns[i]?.align === 'right' ? text.padStart(width) : text.padEnd(width);
  };

  const headerRow = columns.map((col, i) => pad(col.header, i)).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = cells.map((line) => line.map((cell, i) => pad(cell, i)).join(' | '));

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Format data as JSON
 */
export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Print an error line to stderr
 */
export function printError(message: string): void {
  console.error(`\x1b[31mError:\x1b[0m ${message}`);
}
