/**
 * Prints the events parsed from the configured calendar (Sheets, or CALENDAR_CSV_PATH).
 * Run with: npx tsx scripts/parse-calendar.ts [file.csv]
 */
import 'dotenv/config';
import { loadConfig } from '../src/config/index.js';
import { GridParser } from '../src/core/calendar/GridParser.js';
import { groupEventsByDate } from '../src/core/calendar/eventFilter.js';
import { CsvGridAdapter } from '../src/adapters/sheets/CsvGridAdapter.js';
import { createGridSource } from '../src/adapters/sheets/createGridSource.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const csvPath = process.argv[2];
  const source = csvPath ? new CsvGridAdapter(csvPath) : createGridSource(config);
  const parser = new GridParser({ year: config.scheduleYear });

  const grid = await source.fetchGrid();
  const events = parser.parse(grid);

  console.log(`Source: ${source.describe()}; rows: ${grid.length}; events: ${events.length}\n`);
  for (const [date, dayEvents] of groupEventsByDate(events)) {
    console.log(date);
    for (const event of dayEvents) {
      console.log(`  ${event.project || '(общее)'}: ${event.activity}`);
    }
  }
}

main().catch((error) => {
  console.error('Failed to parse calendar:', error);
  process.exit(1);
});
