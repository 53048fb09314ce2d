import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';
import { ConflictError } from '../../utils/errors.js';
import {
  DRIVER_LICENSE_OPTIONS,
  PRINTER_OPTIONS,
  USER_STATUSES,
  type DriverLicense,
  type Printer,
  type UserProfile,
  type UserProfileChanges,
  type UserStatus,
} from '../../core/users/userProfile.js';

type UserProfileRow = {
  telegram_id: number;
  telegram_nickname: string;
  vk_nickname: string;
  status: string;
  full_name: string;
  phone_number: string;
  live_metro_station: string;
  study_metro_station: string;
  year_of_admission: number;
  has_driver_license: string;
  date_of_birth: string;
  has_printer: string;
  can_host_night: number;
};

const COLUMNS = `telegram_id, telegram_nickname, vk_nickname, status, full_name, phone_number,
  live_metro_station, study_metro_station, year_of_admission, has_driver_license,
  date_of_birth, has_printer, can_host_night`;

export class UserProfileRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  getByTelegramId(telegramId: number): UserProfile | null {
    const row = this.db
      .prepare(`SELECT ${COLUMNS} FROM user_profiles WHERE telegram_id = ?`)
      .get(telegramId) as UserProfileRow | undefined;
    return row ? rowToProfile(row) : null;
  }

  exists(telegramId: number): boolean {
    const row = this.db.prepare('SELECT 1 FROM user_profiles WHERE telegram_id = ?').get(telegramId);
    return row !== undefined;
  }

  create(profile: UserProfile): UserProfile {
    if (this.exists(profile.telegramId)) {
      throw new ConflictError(`User ${profile.telegramId} already exists`);
    }
    this.db
      .prepare(
        `INSERT INTO user_profiles (${COLUMNS})
         VALUES (@telegram_id, @telegram_nickname, @vk_nickname, @status, @full_name, @phone_number,
           @live_metro_station, @study_metro_station, @year_of_admission, @has_driver_license,
           @date_of_birth, @has_printer, @can_host_night)`
      )
      .run(profileToRow(profile));
    return this.getByTelegramId(profile.telegramId) ?? profile;
  }

  /** Applies only the provided fields. Returns `null` when the user does not exist. */
  update(telegramId: number, changes: UserProfileChanges): UserProfile | null {
    const existing = this.getByTelegramId(telegramId);
    if (!existing) {
      return null;
    }
    const merged: UserProfile = {
      telegramId,
      telegramNickname: changes.telegramNickname ?? existing.telegramNickname,
      vkNickname: changes.vkNickname ?? existing.vkNickname,
      status: changes.status ?? existing.status,
      fullName: changes.fullName ?? existing.fullName,
      phoneNumber: changes.phoneNumber ?? existing.phoneNumber,
      liveMetroStation: changes.liveMetroStation ?? existing.liveMetroStation,
      studyMetroStation: changes.studyMetroStation ?? existing.studyMetroStation,
      yearOfAdmission: changes.yearOfAdmission ?? existing.yearOfAdmission,
      hasDriverLicense: changes.hasDriverLicense ?? existing.hasDriverLicense,
      dateOfBirth: changes.dateOfBirth ?? existing.dateOfBirth,
      hasPrinter: changes.hasPrinter ?? existing.hasPrinter,
      canHostNight: changes.canHostNight ?? existing.canHostNight,
    };
    this.db
      .prepare(
        `UPDATE user_profiles SET
           telegram_nickname = @telegram_nickname,
           vk_nickname = @vk_nickname,
           status = @status,
           full_name = @full_name,
           phone_number = @phone_number,
           live_metro_station = @live_metro_station,
           study_metro_station = @study_metro_station,
           year_of_admission = @year_of_admission,
           has_driver_license = @has_driver_license,
           date_of_birth = @date_of_birth,
           has_printer = @has_printer,
           can_host_night = @can_host_night,
           updated_at = strftime('%s', 'now')
         WHERE telegram_id = @telegram_id`
      )
      .run(profileToRow(merged));
    return this.getByTelegramId(telegramId);
  }

  delete(telegramId: number): boolean {
    const result = this.db.prepare('DELETE FROM user_profiles WHERE telegram_id = ?').run(telegramId);
    return result.changes > 0;
  }

  getAll(): UserProfile[] {
    const rows = this.db.prepare(`SELECT ${COLUMNS} FROM user_profiles ORDER BY id`).all() as UserProfileRow[];
    return rows.map(rowToProfile);
  }

  getByStatus(status: UserStatus): UserProfile[] {
    const rows = this.db
      .prepare(`SELECT ${COLUMNS} FROM user_profiles WHERE status = ? ORDER BY id`)
      .all(status) as UserProfileRow[];
    return rows.map(rowToProfile);
  }

  /** Course N means admitted N years before the current year. */
  getByCourse(courseNumber: number, now: Date = new Date()): UserProfile[] {
    const targetYear = now.getFullYear() - courseNumber;
    const rows = this.db
      .prepare(`SELECT ${COLUMNS} FROM user_profiles WHERE year_of_admission = ? ORDER BY id`)
      .all(targetYear) as UserProfileRow[];
    return rows.map(rowToProfile);
  }
}

function profileToRow(profile: UserProfile): UserProfileRow {
  return {
    telegram_id: profile.telegramId,
    telegram_nickname: profile.telegramNickname,
    vk_nickname: profile.vkNickname,
    status: profile.status,
    full_name: profile.fullName,
    phone_number: profile.phoneNumber,
    live_metro_station: JSON.stringify(profile.liveMetroStation),
    study_metro_station: JSON.stringify(profile.studyMetroStation),
    year_of_admission: profile.yearOfAdmission,
    has_driver_license: profile.hasDriverLicense,
    date_of_birth: profile.dateOfBirth,
    has_printer: profile.hasPrinter,
    can_host_night: profile.canHostNight ? 1 : 0,
  };
}

function rowToProfile(row: UserProfileRow): UserProfile {
  return {
    telegramId: row.telegram_id,
    telegramNickname: row.telegram_nickname,
    vkNickname: row.vk_nickname,
    status: pick(USER_STATUSES, row.status, 'inactive'),
    fullName: row.full_name,
    phoneNumber: row.phone_number,
    liveMetroStation: parseStations(row.live_metro_station),
    studyMetroStation: parseStations(row.study_metro_station),
    yearOfAdmission: row.year_of_admission,
    hasDriverLicense: pick<DriverLicense>(DRIVER_LICENSE_OPTIONS, row.has_driver_license, 'no'),
    dateOfBirth: row.date_of_birth,
    hasPrinter: pick<Printer>(PRINTER_OPTIONS, row.has_printer, 'no'),
    canHostNight: row.can_host_night === 1,
  };
}

function pick<T extends string>(options: readonly T[], value: string, fallback: T): T {
  return options.find((option) => option === value) ?? fallback;
}

function parseStations(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === 'string') : [];
}
