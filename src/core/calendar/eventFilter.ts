import type { DateRange, Event } from './types.js';

/** Inclusive range filter on `date`. Either bound may be omitted. */
export function filterEvents(events: readonly Event[], range: DateRange = {}): Event[] {
  const { startDate, endDate } = range;
  if (!startDate && !endDate) {
    return [...events];
  }
  return events.filter(
    (event) => (!startDate || event.date >= startDate) && (!endDate || event.date <= endDate)
  );
}

export function groupEventsByDate(events: readonly Event[]): Map<string, Event[]> {
  const groups = new Map<string, Event[]>();
  for (const event of events) {
    const bucket = groups.get(event.date);
    if (bucket) {
      bucket.push(event);
    } else {
      groups.set(event.date, [event]);
    }
  }
  return groups;
}
