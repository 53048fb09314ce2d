import type { Grid } from '../core/calendar/types.js';

export interface GridSourcePort {
  /** Reads the whole calendar grid. Rejects with `SheetFetchError` when the source cannot be read. */
  fetchGrid(): Promise<Grid>;
  /** Whether the last fetch attempt reached the source. */
  isConnected(): boolean;
  /** Human-readable name of the source, for logs. */
  describe(): string;
}
