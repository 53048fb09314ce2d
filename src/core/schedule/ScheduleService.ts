import type { DateRange, Event } from '../calendar/types.js';
import type { GridParser } from '../calendar/GridParser.js';
import { filterEvents } from '../calendar/eventFilter.js';
import type { GridSourcePort } from '../../ports/GridSourcePort.js';
import { createLogger } from '../../utils/logger.js';

export interface ScheduleServiceOptions {
  /** How long parsed events are served from memory. 0 disables caching. */
  ttlSeconds: number;
  now?: () => number;
}

interface CachedSchedule {
  events: Event[];
  fetchedAt: number;
  /** Sequence number of the fetch that produced this entry. */
  fetchId: number;
}

/**
 * Serves parsed calendar events from a grid source with a time-boxed in-memory cache.
 * Callers arriving while a fetch is running share it. A failed fetch propagates its
 * error and leaves the previous cache entry untouched.
 */
export class ScheduleService {
  private readonly logger = createLogger({ component: 'ScheduleService' });
  private readonly ttlMs: number;
  private readonly now: () => number;
  private cache: CachedSchedule | null = null;
  private inFlight: Promise<Event[]> | null = null;
  private lastFetchId = 0;

  constructor(
    private readonly source: GridSourcePort,
    private readonly parser: GridParser,
    options: ScheduleServiceOptions
  ) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? Date.now;
  }

  async getEvents(range: DateRange = {}): Promise<Event[]> {
    const events = await this.load(false);
    return filterEvents(events, range);
  }

  async getEventsForDay(date: string): Promise<Event[]> {
    return this.getEvents({ startDate: date, endDate: date });
  }

  /** Re-reads the source whatever the cache holds; the cache is replaced only on success. */
  async refreshEvents(): Promise<Event[]> {
    this.logger.info({ source: this.source.describe() }, 'Forced schedule refresh');
    const events = await this.load(true);
    return [...events];
  }

  isConnected(): boolean {
    return this.source.isConnected();
  }

  private load(force: boolean): Promise<Event[]> {
    if (!force) {
      if (this.cache && this.now() - this.cache.fetchedAt < this.ttlMs) {
        return Promise.resolve(this.cache.events);
      }
      if (this.inFlight) {
        return this.inFlight;
      }
    }

    const pending = this.fetchAndParse();
    this.inFlight = pending;
    const clear = (): void => {
      if (this.inFlight === pending) {
        this.inFlight = null;
      }
    };
    void pending.then(clear, clear);
    return pending;
  }

  private async fetchAndParse(): Promise<Event[]> {
    const fetchId = ++this.lastFetchId;
    const logger = this.logger.child({ method: 'fetchAndParse', fetchId });
    const grid = await this.source.fetchGrid();
    const events = this.parser.parse(grid);
    logger.info({ rows: grid.length, events: events.length, year: this.parser.year }, 'Schedule parsed');

    // A slower fetch started earlier must not replace what a later one stored
    if (this.cache && this.cache.fetchId > fetchId) {
      logger.debug({ cachedFetchId: this.cache.fetchId }, 'Newer schedule already cached');
      return events;
    }
    this.cache = { events, fetchedAt: this.now(), fetchId };
    return events;
  }
}
