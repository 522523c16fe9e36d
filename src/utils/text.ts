export interface TableOptions {
  /** Column indices to right-align. */
  alignRight?: number[];
  /** Max column width before truncation (default: 50). */
  maxColWidth?: number;
}

/** Cut `value` to `max` characters, marking the cut with "...". */
export function truncate(value: string, max: number): string {
  if (value.length <= max) return value;
  if (max <= 3) return value.slice(0, max);
  return `${value.slice(0, max - 3)}...`;
}

/** Plain-text table with a header row and a dashed separator. */
export function formatTable(rows: string[][], headers: string[], options?: TableOptions): string {
  const maxColWidth = options?.maxColWidth ?? 50;
  const alignRight = new Set(options?.alignRight ?? []);

  const colWidths = headers.map((h) => Math.min(h.length, maxColWidth));
  for (const row of rows) {
    row.forEach((cell, i) => {
      const cellLen = Math.min(cell.length, maxColWidth);
      if (cellLen > (colWidths[i] ?? 0)) {
        colWidths[i] = cellLen;
      }
    });
  }

  const padCell = (value: string, colIndex: number): string => {
    const cut = truncate(value, maxColWidth);
    const width = colWidths[colIndex] ?? cut.length;
    return alignRight.has(colIndex) ? cut.padStart(width) : cut.padEnd(width);
  };

  const headerLine = headers.map((h, i) => padCell(h, i)).join("  ").trimEnd();
  const separatorLine = colWidths.map((w) => "-".repeat(w)).join("  ");
  const dataLines = rows.map((row) => row.map((cell, i) => padCell(cell, i)).join("  ").trimEnd());

  return [headerLine, separatorLine, ...dataLines].join("\n");
}
