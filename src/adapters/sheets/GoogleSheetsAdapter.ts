import { resolve } from 'node:path';
import { google } from 'googleapis';
import type { Cell, Grid } from '../../core/calendar/types.js';
import type { GridSourcePort } from '../../ports/GridSourcePort.js';
import { createLogger } from '../../utils/logger.js';
import { ConfigError, SheetFetchError } from '../../utils/errors.js';
import { combineMergedCells, type MergeRange } from './mergedCells.js';

const SHEETS_READONLY_SCOPE = 'https://www.googleapis.com/auth/spreadsheets.readonly';
const SPREADSHEET_ID_PATTERN = /\/spreadsheets\/d\/([a-zA-Z0-9-_]+)/;
const BARE_ID_PATTERN = /^[a-zA-Z0-9-_]{20,}$/;

/** The two Sheets v4 reads the calendar needs. */
export interface SheetsApi {
  getValues(spreadsheetId: string, range: string): Promise<unknown[][]>;
  /** Merged ranges of one worksheet; rejects when the worksheet does not exist. */
  getMerges(spreadsheetId: string, worksheetName: string): Promise<MergeRange[]>;
}

export interface GoogleSheetsAdapterOptions {
  spreadsheetUrl: string;
  worksheetName: string;
  credentialsPath: string;
  /** Title rows above the calendar itself. */
  skipLeadingRows?: number;
  api?: SheetsApi;
}

export class GoogleSheetsAdapter implements GridSourcePort {
  private readonly logger = createLogger({ adapter: 'GoogleSheetsAdapter' });
  private readonly spreadsheetId: string;
  private readonly worksheetName: string;
  private readonly skipLeadingRows: number;
  private readonly api: SheetsApi;
  private connected = false;

  constructor(options: GoogleSheetsAdapterOptions) {
    this.spreadsheetId = extractSpreadsheetId(options.spreadsheetUrl);
    this.worksheetName = options.worksheetName;
    this.skipLeadingRows = options.skipLeadingRows ?? 2;
    this.api = options.api ?? createGoogleSheetsApi(resolve(process.cwd(), options.credentialsPath));
  }

  async fetchGrid(): Promise<Grid> {
    const logger = this.logger.child({ method: 'fetchGrid', worksheet: this.worksheetName });
    const range = quoteSheetName(this.worksheetName);

    try {
      const [values, merges] = await Promise.all([
        this.api.getValues(this.spreadsheetId, range),
        this.api.getMerges(this.spreadsheetId, this.worksheetName),
      ]);
      const cells = values.map((row) => row.map(toCell));
      const grid = combineMergedCells(cells, merges).slice(this.skipLeadingRows);

      this.connected = true;
      logger.info({ rows: grid.length, merges: merges.length }, 'Calendar grid fetched');
      return grid;
    } catch (error) {
      this.connected = false;
      logger.error({ error }, 'Failed to fetch calendar grid');
      throw new SheetFetchError(`Failed to read worksheet "${this.worksheetName}"`, { cause: error });
    }
  }

  isConnected(): boolean {
    return this.connected;
  }

  describe(): string {
    return `google-sheets:${this.spreadsheetId}/${this.worksheetName}`;
  }
}

export function extractSpreadsheetId(urlOrId: string): string {
  const trimmed = urlOrId.trim();
  const match = SPREADSHEET_ID_PATTERN.exec(trimmed);
  if (match?.[1]) {
    return match[1];
  }
  if (BARE_ID_PATTERN.test(trimmed)) {
    return trimmed;
  }
  throw new ConfigError(`Cannot extract spreadsheet id from "${urlOrId}"`);
}

/** A1 notation for a whole worksheet: names are single-quoted, embedded quotes doubled. */
export function quoteSheetName(name: string): string {
  return `'${name.replace(/'/g, "''")}'`;
}

function toCell(value: unknown): Cell {
  if (value === null || value === undefined) {
    return null;
  }
  return typeof value === 'string' ? value : String(value);
}

function createGoogleSheetsApi(keyFile: string): SheetsApi {
  const auth = new google.auth.GoogleAuth({ keyFile, scopes: [SHEETS_READONLY_SCOPE] });
  const sheets = google.sheets({ version: 'v4', auth });

  return {
    async getValues(spreadsheetId, range) {
      const response = await sheets.spreadsheets.values.get({
        spreadsheetId,
        range,
        valueRenderOption: 'FORMATTED_VALUE',
      });
      const rows: unknown[][] = response.data.values ?? [];
      return rows;
    },

    async getMerges(spreadsheetId, worksheetName) {
      const response = await sheets.spreadsheets.get({
        spreadsheetId,
        ranges: [quoteSheetName(worksheetName)],
        fields: 'sheets(properties.title,merges)',
      });
      const sheet = response.data.sheets?.find((item) => item.properties?.title === worksheetName);
      if (!sheet) {
        throw new Error(`Worksheet "${worksheetName}" not found`);
      }
      return (sheet.merges ?? []).map((merge) => ({
        startRowIndex: merge.startRowIndex ?? 0,
        endRowIndex: merge.endRowIndex ?? 0,
        startColumnIndex: merge.startColumnIndex ?? 0,
        endColumnIndex: merge.endColumnIndex ?? 0,
      }));
    },
  };
}
