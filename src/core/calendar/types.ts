/** A single spreadsheet cell as delivered by a grid source. Absent cells are `null` or `undefined`. */
export type Cell = string | null | undefined;

export type GridRow = readonly Cell[];

/** Rows of cells, top to bottom. Rows may have different lengths. */
export type Grid = readonly GridRow[];

export interface Event {
  /** Empty for shared events that apply to every project in the week. */
  project: string;
  /** Calendar date, `YYYY-MM-DD`. */
  date: string;
  activity: string;
}

export interface DateRange {
  startDate?: string;
  endDate?: string;
}
