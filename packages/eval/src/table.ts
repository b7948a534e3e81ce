export type TableCell = string | number;

const NUMERIC = /^[+-]?\d+(\.\d+)?$/;

function cellText(cell: TableCell): string {
  return typeof cell === 'number' ? String(cell) : cell;
}

function width(text: string): number {
  return Array.from(text).length;
}

function pad(text: string, size: number, alignRight: boolean): string {
  const fill = ' '.repeat(Math.max(0, size - width(text)));
  return alignRight ? fill + text : text + fill;
}

/**
 * Renders rows as a grid table:
 *
 * ```
 * +---------+---------+
 * | Model   |   Score |
 * +=========+=========+
 * | model-a |    8.50 |
 * +---------+---------+
 * ```
 *
 * Columns whose cells all look numeric are right-aligned, header included.
 * Headers get two spare columns of width.
 */
export function renderGridTable(
  headers: readonly string[],
  rows: readonly (readonly TableCell[])[],
): string {
  const texts = rows.map((row) => headers.map((_, i) => cellText(row[i] ?? '')));

  const numeric = headers.map(
    (_, i) =>
      texts.length > 0 && texts.every((row) => NUMERIC.test(row[i] ?? '')),
  );
  const widths = headers.map((header, i) =>
    Math.max(width(header) + 2, ...texts.map((row) => width(row[i] ?? ''))),
  );

  const border = (fill: string): string =>
    '+' + widths.map((size) => fill.repeat(size + 2)).join('+') + '+';
  const line = (cells: readonly string[]): string =>
    '| ' +
    cells
      .map((cell, i) => pad(cell, widths[i] ?? 0, numeric[i] ?? false))
      .join(' | ') +
    ' |';

  const out = [border('-'), line(headers), border('=')];
  for (const row of texts) {
    out.push(line(row), border('-'));
  }
  return out.join('\n');
}
