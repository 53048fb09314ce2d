import type { Cell } from '../../core/calendar/types.js';

/** Merged range in 0-based, end-exclusive indices (the Sheets API GridRange shape). */
export interface MergeRange {
  startRowIndex: number;
  endRowIndex: number;
  startColumnIndex: number;
  endColumnIndex: number;
}

/**
 * Copies the top-left value of each merged range into every cell it covers.
 * The API reports a merged value only in its anchor cell; the calendar relies on
 * merged day columns and merged project names reading the same in every row.
 * Ranges below the last returned row are ignored; short rows are padded with `null`.
 */
export function combineMergedCells(values: readonly (readonly Cell[])[], merges: readonly MergeRange[]): Cell[][] {
  const grid: Cell[][] = values.map((row) => [...row]);

  for (const merge of merges) {
    const anchor = grid[merge.startRowIndex]?.[merge.startColumnIndex];
    if (anchor == null || anchor === '') {
      continue;
    }
    const lastRow = Math.min(merge.endRowIndex, grid.length);
    for (let r = merge.startRowIndex; r < lastRow; r++) {
      const row = grid[r];
      if (!row) {
        continue;
      }
      while (row.length < merge.endColumnIndex) {
        row.push(null);
      }
      for (let c = merge.startColumnIndex; c < merge.endColumnIndex; c++) {
        row[c] = anchor;
      }
    }
  }

  return grid;
}
