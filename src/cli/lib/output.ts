/**
 * Output Formatting for CLI Commands
 *
 * Command results go to standard output, either as a table/summary for
 * people or as JSON for scripts. Diagnostics never pass through here.
 *
 * @module cli/lib/output
 */

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

/**
 * Format data as a table
 */
export function formatTable<T extends Record<string, unknown>>(
  data: readonly T[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const render = (col: TableColumn, row: T): string => {
    const value = row[col.key];
    return col.formatter ? col.formatter(value) : String(value ?? '');
  };

  const widths = columns.map((col) => {
    if (col.width) return col.width;
    return Math.max(col.header.length, ...data.map((row) => render(col, row).length));
  });

  const headerRow = columns.map((col, i) => padCell(col.header, widths[i], col.align ?? 'left')).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) =>
    columns.map((col, i) => padCell(render(col, row), widths[i], col.align ?? 'left')).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Pad a cell value to the specified width
 */
function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Write a result to standard output
 */
export function printOutput(output: string): void {
  process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);
}

export function printJson<T>(data: T): void {
  printOutput(formatJson(data));
}
