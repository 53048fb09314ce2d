import type { Event, Grid, GridRow } from './types.js';
import { cellAt, cellText, parseDayNumber, toCalendarDate } from './gridCell.js';
import { monthOf } from './months.js';

export const DEFAULT_SCHEDULE_YEAR = 2025;

export interface GridParserOptions {
  /** Year applied to every month block; the sheet itself carries no year. */
  year?: number;
}

interface WeekBlock {
  month: number;
  /** Column index → day of month, from the date header row. */
  days: Map<number, number>;
  projectRows: GridRow[];
}

/**
 * Turns the calendar worksheet into a flat list of events.
 *
 * Layout: a month marker row ("ИЮЛЬ") opens a month; inside it every date header row
 * (day numbers in columns 1..N) opens a week whose following rows are projects with
 * their activities under each day column. Malformed cells are skipped, never thrown on.
 */
export class GridParser {
  readonly year: number;

  constructor(options: GridParserOptions = {}) {
    this.year = options.year ?? DEFAULT_SCHEDULE_YEAR;
  }

  parse(grid: Grid): Event[] {
    const events: Event[] = [];
    for (const week of this.collectWeeks(grid)) {
      events.push(...this.processWeek(week));
    }
    // Array#sort is stable: same-day events keep their sheet order
    return events.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  }

  private collectWeeks(grid: Grid): WeekBlock[] {
    const weeks: WeekBlock[] = [];
    let month: number | null = null;
    let i = 0;

    while (i < grid.length) {
      const row = grid[i] ?? [];
      const rowMonth = monthOf(cellAt(row, 0));
      if (rowMonth !== null) {
        month = rowMonth;
        i++;
        continue;
      }

      if (month === null || !isDateHeaderRow(row)) {
        i++;
        continue;
      }

      const days = mapDayColumns(row);
      i++;
      const projectRows: GridRow[] = [];
      while (i < grid.length) {
        const candidate = grid[i] ?? [];
        if (monthOf(cellAt(candidate, 0)) !== null || isDateHeaderRow(candidate)) {
          break;
        }
        projectRows.push(candidate);
        i++;
      }
      weeks.push({ month, days, projectRows });
    }

    return weeks;
  }

  private processWeek(week: WeekBlock): Event[] {
    const events: Event[] = [];
    const verticalByColumn = findVerticalActivities(week.projectRows, week.days);
    const seenShared = new Set<string>();

    for (const row of week.projectRows) {
      const project = cellText(cellAt(row, 0));
      if (!project) {
        continue;
      }

      for (const [column, day] of week.days) {
        const activity = cellText(cellAt(row, column));
        if (!activity) {
          continue;
        }
        const date = toCalendarDate(this.year, week.month, day);
        if (date === null) {
          continue;
        }

        if (verticalByColumn.get(column) === activity) {
          const key = `${date}\u0000${activity}`;
          if (!seenShared.has(key)) {
            seenShared.add(key);
            events.push({ project: '', date, activity });
          }
        } else {
          events.push({ project, date, activity });
        }
      }
    }

    return events;
  }
}

/** A row whose cells after column 0 hold at least one plain day number. */
export function isDateHeaderRow(row: GridRow): boolean {
  for (let column = 1; column < row.length; column++) {
    if (parseDayNumber(row[column]) !== null) {
      return true;
    }
  }
  return false;
}

function mapDayColumns(row: GridRow): Map<number, number> {
  const days = new Map<number, number>();
  for (let column = 1; column < row.length; column++) {
    const day = parseDayNumber(row[column]);
    if (day !== null) {
      days.set(column, day);
    }
  }
  return days;
}

/**
 * Columns where two or more project rows carry the same text and nothing else:
 * that text is one shared event for the day, not one per project.
 */
export function findVerticalActivities(
  projectRows: readonly GridRow[],
  days: ReadonlyMap<number, number>
): Map<number, string> {
  const vertical = new Map<number, string>();

  for (const column of days.keys()) {
    const values = new Set<string>();
    let filled = 0;
    for (const row of projectRows) {
      const text = cellText(cellAt(row, column));
      if (text) {
        values.add(text);
        filled++;
      }
    }

    const [shared] = values;
    if (filled >= 2 && values.size === 1 && shared !== undefined) {
      vertical.set(column, shared);
    }
  }

  return vertical;
}
