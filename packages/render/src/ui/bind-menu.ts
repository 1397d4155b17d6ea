/**
 * Lay out menu rows as aligned columns. The first pass measures the widest
 * cell of every column but the last; the second pads each cell out to the
 * first tab stop past that width.
 */
export function formatMenuRows(rows: readonly (readonly string[])[], tabstop: number): string[] {
  const widths: number[] = [];

  for (const row of rows) {
    row.slice(0, -1).forEach((cell, column) => {
      widths[column] = Math.max(widths[column] ?? 0, Array.from(cell).length);
    });
  }

  const stops = widths.map((width) => width + tabstop - (width % tabstop));

  return rows.map((row) =>
    row
      .map((cell, column) => {
        const stop = stops[column];
        return stop === undefined || column === row.length - 1
          ? cell
          : cell + ' '.repeat(stop - Array.from(cell).length);
      })
      .join('')
  );
}
