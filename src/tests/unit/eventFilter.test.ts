import { describe, it, expect } from 'vitest';
import { filterEvents, groupEventsByDate } from '../../core/calendar/eventFilter.js';
import type { Event } from '../../core/calendar/types.js';

const events: Event[] = [
  { project: 'A', date: '2025-07-01', activity: 'a' },
  { project: '', date: '2025-07-02', activity: 'shared' },
  { project: 'B', date: '2025-07-02', activity: 'b' },
  { project: 'A', date: '2025-07-05', activity: 'c' },
];

describe('filterEvents', () => {
  it('returns a copy of everything without bounds', () => {
    const result = filterEvents(events);
    expect(result).toEqual(events);
    expect(result).not.toBe(events);
  });

  it('includes both bounds', () => {
    expect(filterEvents(events, { startDate: '2025-07-02', endDate: '2025-07-05' })).toEqual(events.slice(1));
  });

  it('selects a single day when start equals end', () => {
    expect(filterEvents(events, { startDate: '2025-07-02', endDate: '2025-07-02' })).toEqual([
      { project: '', date: '2025-07-02', activity: 'shared' },
      { project: 'B', date: '2025-07-02', activity: 'b' },
    ]);
  });

  it('accepts a single bound', () => {
    expect(filterEvents(events, { startDate: '2025-07-03' })).toEqual([events[3]]);
    expect(filterEvents(events, { endDate: '2025-07-01' })).toEqual([events[0]]);
  });

  it('returns nothing for an inverted range', () => {
    expect(filterEvents(events, { startDate: '2025-07-05', endDate: '2025-07-01' })).toEqual([]);
  });
});

describe('groupEventsByDate', () => {
  it('groups in first-seen order', () => {
    const groups = groupEventsByDate(events);
    expect([...groups.keys()]).toEqual(['2025-07-01', '2025-07-02', '2025-07-05']);
    expect(groups.get('2025-07-02')).toHaveLength(2);
  });
});
