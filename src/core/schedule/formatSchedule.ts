import type { Event } from '../calendar/types.js';
import { MONTH_NAMES_GENITIVE } from '../calendar/months.js';

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** "2025-07-05" → "5 июля" */
export function formatDayHeading(date: string): string {
  const [, month, day] = date.split('-').map(Number);
  const monthName = month ? MONTH_NAMES_GENITIVE[month - 1] : undefined;
  return monthName && day ? `${day} ${monthName}` : date;
}

/** Telegram HTML message listing one day's events; shared events come without a project. */
export function formatDayEvents(date: string, events: readonly Event[]): string {
  const heading = `<b>${escapeHtml(formatDayHeading(date))}</b>`;
  if (events.length === 0) {
    return `${heading}\nСобытий нет.`;
  }
  const lines = events.map((event) =>
    event.project
      ? `• ${escapeHtml(event.project)}: ${escapeHtml(event.activity)}`
      : `• ${escapeHtml(event.activity)}`
  );
  return [heading, ...lines].join('\n');
}

/** Calendar date (`YYYY-MM-DD`) of `now` in the given IANA timezone. */
export function todayInTimezone(timezone: string, now: Date = new Date()): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(now);

  const year = parts.find((part) => part.type === 'year')?.value;
  const month = parts.find((part) => part.type === 'month')?.value;
  const day = parts.find((part) => part.type === 'day')?.value;
  return `${year}-${month}-${day}`;
}
