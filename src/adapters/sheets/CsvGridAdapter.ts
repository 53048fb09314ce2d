import { readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import type { Grid } from '../../core/calendar/types.js';
import type { GridSourcePort } from '../../ports/GridSourcePort.js';
import { createLogger } from '../../utils/logger.js';
import { SheetFetchError } from '../../utils/errors.js';

/** Calendar grid from a CSV export of the worksheet (merged cells already expanded by the export). */
export class CsvGridAdapter implements GridSourcePort {
  private readonly logger = createLogger({ adapter: 'CsvGridAdapter' });
  private connected = false;

  constructor(private readonly csvPath: string) {}

  async fetchGrid(): Promise<Grid> {
    const logger = this.logger.child({ method: 'fetchGrid', csvPath: this.csvPath });
    let text: string;
    try {
      text = await readFile(this.csvPath, 'utf8');
    } catch (error) {
      this.connected = false;
      logger.error({ error }, 'Failed to read calendar CSV');
      throw new SheetFetchError(`Failed to read calendar CSV "${this.csvPath}"`, { cause: error });
    }

    const grid = parseCsvGrid(text);
    this.connected = true;
    logger.info({ rows: grid.length }, 'Calendar grid loaded from CSV');
    return grid;
  }

  isConnected(): boolean {
    return this.connected;
  }

  describe(): string {
    return `csv:${this.csvPath}`;
  }
}

export function parseCsvGrid(text: string): string[][] {
  // Strip a UTF-8 BOM left by spreadsheet exports
  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const parsed = Papa.parse<string[]>(source, { header: false, skipEmptyLines: false });
  const rows = parsed.data;
  // A trailing newline yields one extra [''] row
  const last = rows[rows.length - 1];
  if (last && last.length === 1 && last[0] === '') {
    rows.pop();
  }
  return rows;
}
