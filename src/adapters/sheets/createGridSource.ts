import type { Config } from '../../config/index.js';
import type { GridSourcePort } from '../../ports/GridSourcePort.js';
import { ConfigError } from '../../utils/errors.js';
import { CsvGridAdapter } from './CsvGridAdapter.js';
import { GoogleSheetsAdapter } from './GoogleSheetsAdapter.js';

/** A CSV export wins over Sheets when both are configured. */
export function createGridSource(
  config: Pick<Config, 'calendarCsvPath' | 'spreadsheetUrl' | 'worksheetName' | 'googleCredentialsPath'>
): GridSourcePort {
  if (config.calendarCsvPath) {
    return new CsvGridAdapter(config.calendarCsvPath);
  }
  if (config.spreadsheetUrl) {
    return new GoogleSheetsAdapter({
      spreadsheetUrl: config.spreadsheetUrl,
      worksheetName: config.worksheetName,
      credentialsPath: config.googleCredentialsPath,
    });
  }
  throw new ConfigError('Either SPREADSHEET_URL or CALENDAR_CSV_PATH must be set');
}
