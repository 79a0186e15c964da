import { bold, center, gray, ljust, visibleWidth } from './ansi.js';

export interface DataRow {
  kind: 'data';
  cells: string[];
}

export interface SectionRow {
  kind: 'section';
  caption: string;
}

export type TableRow = DataRow | SectionRow;

export class ArityError extends Error {
  constructor(expected: number, actual: number, rowIndex: number) {
    super(`Row ${rowIndex} has ${actual} cells, expected ${expected}`);
    this.name = 'ArityError';
  }
}

const COLUMN_SEPARATOR = gray(' │ ');

export function dataRow(...cells: string[]): DataRow {
  return { kind: 'data', cells };
}

export function sectionRow(caption: string): SectionRow {
  return { kind: 'section', caption };
}

function sectionLabel(caption: string): string {
  return bold(`{ ${caption} }`);
}

function columnWidths(rows: readonly TableRow[]): number[] {
  let widths: number[] | null = null;

  for (let index = 0; index < rows.length; index++) {
    const row = rows[index];
    if (row.kind !== 'data') continue;

    if (widths === null) {
      widths = row.cells.map(() => 0);
    } else if (widths.length !== row.cells.length) {
      throw new ArityError(widths.length, row.cells.length, index);
    }

    for (let i = 0; i < row.cells.length; i++) {
      widths[i] = Math.max(widths[i], visibleWidth(row.cells[i]));
    }
  }

  return widths ?? [];
}

/**
 * Lay out rows into a box-drawn table.
 *
 * Data rows are split into left-justified columns; section rows become
 * full-width captioned dividers. Every returned line has the same visible width.
 */
export function renderTable(rows: readonly TableRow[]): string[] {
  const widths = columnWidths(rows);
  const separatorWidth = visibleWidth(COLUMN_SEPARATOR);

  let interior =
    widths.reduce((sum, w) => sum + w, 0) + separatorWidth * Math.max(widths.length - 1, 0);

  // Grow the last column when a caption does not fit
  for (const row of rows) {
    if (row.kind !== 'section') continue;
    const needed = visibleWidth(sectionLabel(row.caption));
    if (needed > interior) {
      if (widths.length > 0) widths[widths.length - 1] += needed - interior;
      interior = needed;
    }
  }

  const lines: string[] = [];

  rows.forEach((row, i) => {
    if (row.kind === 'section') {
      const label = center(sectionLabel(row.caption), interior, '─');
      if (i === 0) {
        lines.push(`╭─${label}─╮`);
        return;
      }
      if (rows[i - 1].kind === 'data') {
        lines.push(`│ ${' '.repeat(interior)} │`);
      }
      lines.push(`├─${label}─┤`);
      return;
    }

    if (i === 0) {
      lines.push(`╭${'─'.repeat(interior + 2)}╮`);
    }
    const cells = row.cells.map((cell, j) => ljust(cell, widths[j]));
    lines.push(`│ ${cells.join(COLUMN_SEPARATOR)} │`);
  });

  lines.push(`╰${'─'.repeat(interior + 2)}╯`);
  return lines;
}

export function printTable(rows: readonly TableRow[]): void {
  for (const line of renderTable(rows)) {
    console.log(line);
  }
}
