import { describe, it, expect, vi } from 'vitest';
import {
  GoogleSheetsAdapter,
  extractSpreadsheetId,
  quoteSheetName,
  type SheetsApi,
} from '../../adapters/sheets/GoogleSheetsAdapter.js';
import type { MergeRange } from '../../adapters/sheets/mergedCells.js';
import { ConfigError, SheetFetchError } from '../../utils/errors.js';

const SPREADSHEET_ID = '1AbCdEfGhIjKlMnOpQrStUvWxYz0123456789';

function fakeApi(values: unknown[][], merges: MergeRange[] = []) {
  const getValues = vi.fn<SheetsApi['getValues']>().mockResolvedValue(values);
  const getMerges = vi.fn<SheetsApi['getMerges']>().mockResolvedValue(merges);
  return { api: { getValues, getMerges }, getValues, getMerges };
}

describe('GoogleSheetsAdapter', () => {
  it('reads the worksheet, fills merged cells and skips the title rows', async () => {
    const { api, getValues, getMerges } = fakeApi(
      [
        ['Календарь'],
        [],
        ['ИЮЛЬ'],
        ['', 1, 2],
        ['Проект А', 'Сбор'],
        ['Проект Б', null, 'Съемка'],
      ],
      [{ startRowIndex: 4, endRowIndex: 5, startColumnIndex: 1, endColumnIndex: 3 }]
    );
    const adapter = new GoogleSheetsAdapter({
      spreadsheetUrl: `https://docs.google.com/spreadsheets/d/${SPREADSHEET_ID}/edit#gid=0`,
      worksheetName: 'календарь new',
      credentialsPath: 'credentials.json',
      api,
    });

    const grid = await adapter.fetchGrid();

    expect(getValues).toHaveBeenCalledWith(SPREADSHEET_ID, "'календарь new'");
    expect(getMerges).toHaveBeenCalledWith(SPREADSHEET_ID, 'календарь new');
    expect(grid).toEqual([
      ['ИЮЛЬ'],
      ['', '1', '2'],
      ['Проект А', 'Сбор', 'Сбор'],
      ['Проект Б', null, 'Съемка'],
    ]);
    expect(adapter.isConnected()).toBe(true);
  });

  it('wraps API failures in SheetFetchError', async () => {
    const { api, getValues } = fakeApi([]);
    getValues.mockRejectedValueOnce(new Error('The caller does not have permission'));
    const adapter = new GoogleSheetsAdapter({
      spreadsheetUrl: SPREADSHEET_ID,
      worksheetName: 'календарь new',
      credentialsPath: 'credentials.json',
      api,
    });

    await expect(adapter.fetchGrid()).rejects.toBeInstanceOf(SheetFetchError);
    expect(adapter.isConnected()).toBe(false);
  });

  it('describes itself by spreadsheet and worksheet', () => {
    const adapter = new GoogleSheetsAdapter({
      spreadsheetUrl: SPREADSHEET_ID,
      worksheetName: 'лист',
      credentialsPath: 'credentials.json',
      api: fakeApi([]).api,
    });

    expect(adapter.describe()).toBe(`google-sheets:${SPREADSHEET_ID}/лист`);
  });
});

describe('extractSpreadsheetId', () => {
  it('accepts URLs and bare ids', () => {
    expect(extractSpreadsheetId(`https://docs.google.com/spreadsheets/d/${SPREADSHEET_ID}/edit`)).toBe(
      SPREADSHEET_ID
    );
    expect(extractSpreadsheetId(` ${SPREADSHEET_ID} `)).toBe(SPREADSHEET_ID);
  });

  it('rejects anything else', () => {
    expect(() => extractSpreadsheetId('https://example.com/sheet')).toThrow(ConfigError);
  });
});

describe('quoteSheetName', () => {
  it('doubles embedded quotes', () => {
    expect(quoteSheetName("Anna's sheet")).toBe("'Anna''s sheet'");
  });
});
