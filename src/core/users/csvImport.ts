import Papa from 'papaparse';
import type { UserProfileRepository } from '../../persistence/repositories/UserProfileRepository.js';
import { createLogger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { toCalendarDate } from '../calendar/gridCell.js';
import type { DriverLicense, Printer, UserProfile, UserStatus } from './userProfile.js';

/** Column headers of the organiser sign-up form export. */
export const CSV_COLUMNS = {
  telegramId: 'Telegram ID',
  fullName: 'ФИО',
  telegramNickname: 'Ник в ТГ',
  vkNickname: 'Ник в ВК',
  status: 'Статус',
  phoneNumber: 'Номер телефона',
  liveMetroStation: 'Станция метро, на которой ты живешь',
  studyMetroStation: 'Станция метро, на которой ты учишься/работаешь',
  yearOfAdmission: 'Год поступления в СтС',
  hasDriverLicense: 'Есть ли у тебя водительские права и/или машина?',
  dateOfBirth: 'Дата Рождения',
  hasPrinter: 'Если ли у тебя принтер?',
  canHostNight: 'Можем ли мы проводить ночь креатива/ночь оформления у тебя дома?',
} as const;

const STATUS_CODES: Record<string, UserStatus> = { '0': 'inactive', '1': 'work', '2': 'active', '3': 'graduated' };
const LICENSE_CODES: Record<string, DriverLicense> = { '0': 'no', '1': 'yes', '2': 'yes_and_car' };
const PRINTER_CODES: Record<string, Printer> = { '0': 'no', '1': 'black', '2': 'color', '3': 'black_and_color' };

export interface CsvImportOptions {
  /** Leave existing users untouched (default) instead of overwriting them. */
  skipExisting?: boolean;
  now?: Date;
}

export interface CsvImportResult {
  importedCount: number;
  updatedCount: number;
  skippedCount: number;
  errors: string[];
  success: boolean;
}

type CsvRow = Record<string, string | undefined>;

const logger = createLogger({ component: 'csvImport' });

export function importUsersFromCsv(
  csvText: string,
  repository: UserProfileRepository,
  options: CsvImportOptions = {}
): CsvImportResult {
  const skipExisting = options.skipExisting ?? true;
  const now = options.now ?? new Date();
  const result: CsvImportResult = { importedCount: 0, updatedCount: 0, skippedCount: 0, errors: [], success: true };

  const parsed = Papa.parse<CsvRow>(csvText, { header: true, skipEmptyLines: true });

  parsed.data.forEach((row, index) => {
    // Row 1 is the header line
    const rowNumber = index + 2;
    try {
      const telegramId = parseTelegramId(row[CSV_COLUMNS.telegramId]);
      const fullName = (row[CSV_COLUMNS.fullName] ?? '').trim();
      if (telegramId === null || !fullName) {
        result.errors.push(`Строка ${rowNumber}: Отсутствует Telegram ID или ФИО`);
        result.skippedCount++;
        return;
      }

      const exists = repository.exists(telegramId);
      if (exists && skipExisting) {
        result.skippedCount++;
        return;
      }

      const profile = rowToProfile(row, telegramId, fullName, now);
      if (exists) {
        repository.update(telegramId, profile);
        result.updatedCount++;
      } else {
        repository.create(profile);
        result.importedCount++;
      }
    } catch (error) {
      result.errors.push(`Строка ${rowNumber}: ${errorMessage(error)}`);
      result.skippedCount++;
    }
  });

  result.success = result.errors.length === 0;
  logger.info(
    {
      imported: result.importedCount,
      updated: result.updatedCount,
      skipped: result.skippedCount,
      errors: result.errors.length,
    },
    'CSV import finished'
  );
  return result;
}

function rowToProfile(row: CsvRow, telegramId: number, fullName: string, now: Date): UserProfile {
  const field = (column: string): string => (row[column] ?? '').trim();
  return {
    telegramId,
    fullName,
    telegramNickname: field(CSV_COLUMNS.telegramNickname),
    vkNickname: field(CSV_COLUMNS.vkNickname),
    status: STATUS_CODES[field(CSV_COLUMNS.status)] ?? 'inactive',
    phoneNumber: field(CSV_COLUMNS.phoneNumber),
    liveMetroStation: parseStations(field(CSV_COLUMNS.liveMetroStation)),
    studyMetroStation: parseStations(field(CSV_COLUMNS.studyMetroStation)),
    yearOfAdmission: parseYear(field(CSV_COLUMNS.yearOfAdmission), now),
    hasDriverLicense: LICENSE_CODES[field(CSV_COLUMNS.hasDriverLicense)] ?? 'no',
    dateOfBirth: parseBirthDate(field(CSV_COLUMNS.dateOfBirth), now),
    hasPrinter: PRINTER_CODES[field(CSV_COLUMNS.hasPrinter)] ?? 'no',
    canHostNight: field(CSV_COLUMNS.canHostNight) === '1',
  };
}

export function parseTelegramId(value: string | undefined): number | null {
  const text = (value ?? '').trim();
  if (!/^\d+$/.test(text)) {
    return null;
  }
  const id = Number(text);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export function parseStations(value: string): string[] {
  return value
    .split(',')
    .map((station) => station.trim())
    .filter((station) => station.length > 0);
}

function parseYear(value: string, now: Date): number {
  return /^\d{4}$/.test(value) ? Number(value) : now.getFullYear();
}

/** `DD.MM.YYYY`; blank or unreadable dates fall back to today. */
export function parseBirthDate(value: string, now: Date): string {
  const match = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/.exec(value);
  const parsed = match ? toCalendarDate(Number(match[3]), Number(match[2]), Number(match[1])) : null;
  return parsed ?? toLocalIsoDate(now);
}

function toLocalIsoDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}
