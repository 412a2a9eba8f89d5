/**
 * Plain-text table rendering for the `table` output format.
 */

export interface ColumnConfig {
  header: string;
  align?: 'left' | 'right';
}

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

function pad(text: string, width: number, align: 'left' | 'right'): string {
  const padding = width - visibleLength(text);
  if (padding <= 0) return text;
  return align === 'right' ? ' '.repeat(padding) + text : text + ' '.repeat(padding);
}

/** Columns separated by two spaces, a dashed rule under the header */
export function renderTable(
  columns: readonly ColumnConfig[],
  rows: readonly (readonly string[])[],
  colorHeader: (text: string) => string = (text) => text,
): string {
  const widths = columns.map((col, i) =>
    Math.max(col.header.length, ...rows.map((row) => visibleLength(row[i] ?? ''))),
  );

  const lines: string[] = [];
  const header = columns.map((col, i) => pad(col.header, widths[i] ?? 0, col.align ?? 'left'));
  lines.push(colorHeader(header.join('  ').trimEnd()));
  lines.push(widths.map((w) => '-'.repeat(w)).join('  '));

  for (const row of rows) {
    const cells = columns.map((col, i) => pad(row[i] ?? '', widths[i] ?? 0, col.align ?? 'left'));
    lines.push(cells.join('  ').trimEnd());
  }

  return lines.join('\n');
}
