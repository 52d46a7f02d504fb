/**
 * Table Grid Reconstruction
 *
 * Pure helpers that turn engine output (positioned cells, or OCR lines of
 * tokens) into a rectangular grid of strings.
 */

import type { TableGrid } from './types';

export interface PositionedCell {
  /** 1-based */
  row_index: number;
  /** 1-based */
  column_index: number;
  text: string;
}

/**
 * Place cells into a grid sized by the largest row and column index seen.
 * Cells that were never reported stay ''.
 */
export function gridFromCells(cells: PositionedCell[]): TableGrid {
  const placed = cells.filter((c) => c.row_index >= 1 && c.column_index >= 1);
  if (placed.length === 0) return [];

  const maxRow = Math.max(...placed.map((c) => c.row_index));
  const maxCol = Math.max(...placed.map((c) => c.column_index));

  const grid: TableGrid = Array.from({ length: maxRow }, () => Array<string>(maxCol).fill(''));
  for (const cell of placed) {
    grid[cell.row_index - 1][cell.column_index - 1] = cell.text.trim();
  }
  return grid;
}

/**
 * One row per OCR line, one cell per token, short rows padded to the widest.
 * Assumes columns line up token-for-token, which holds for simple tables only.
 */
export function gridFromLines(lines: string[][]): TableGrid {
  const rows = lines
    .map((tokens) => tokens.map((t) => t.trim()).filter((t) => t !== ''))
    .filter((tokens) => tokens.length > 0);
  if (rows.length === 0) return [];

  const maxCols = Math.max(...rows.map((r) => r.length));
  return rows.map((r) => [...r, ...Array<string>(maxCols - r.length).fill('')]);
}
