import type { Cell, GridRow } from './types.js';

const DAY_PATTERN = /^\d+$/;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function cellText(cell: Cell): string {
  return cell == null ? '' : cell.trim();
}

export function cellAt(row: GridRow | undefined, column: number): Cell {
  return row?.[column];
}

/** Day-of-month written as plain ASCII digits, or `null` for anything else ("пн", "-", "", "1.5"). */
export function parseDayNumber(cell: Cell): number | null {
  const text = cellText(cell);
  if (!DAY_PATTERN.test(text)) {
    return null;
  }
  return Number.parseInt(text, 10);
}

/**
 * Formats a calendar date as `YYYY-MM-DD`.
 * Returns `null` when the day does not exist in that month (day 0, 31 April, 29 February of a common year).
 */
export function toCalendarDate(year: number, month: number, day: number): string | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return null;
  }
  if (month < 1 || month > 12 || day < 1) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  return toCalendarDate(Number(match[1]), Number(match[2]), Number(match[3])) === value;
}
