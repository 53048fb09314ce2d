import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { join, dirname as pathDirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { mkdirSync } from 'node:fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = pathDirname(__filename);

const logger = createLogger({ component: 'database' });

const IN_MEMORY = ':memory:';

let db: Database.Database | null = null;

export function getDatabase(dbPath?: string): Database.Database {
  if (db) {
    return db;
  }
  db = openDatabase(dbPath ?? process.env.DATABASE_PATH ?? join(__dirname, '../../data', 'schedule.db'));
  return db;
}

/** Opens (and migrates) a database without touching the shared instance; `:memory:` works for tests. */
export function openDatabase(dbPath: string): Database.Database {
  logger.info({ dbPath }, 'Initializing database');

  if (dbPath !== IN_MEMORY) {
    mkdirSync(pathDirname(dbPath), { recursive: true });
  }

  const database = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    database.pragma('journal_mode = WAL');
  }
  database.pragma('foreign_keys = ON');

  runMigrations(database);
  return database;
}

function runMigrations(database: Database.Database): void {
  logger.info('Running database migrations');

  // Metro station lists are stored as JSON arrays
  database.exec(`
    CREATE TABLE IF NOT EXISTS user_profiles (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      telegram_id INTEGER NOT NULL UNIQUE,
      telegram_nickname TEXT NOT NULL,
      vk_nickname TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('inactive', 'work', 'active', 'graduated')),
      full_name TEXT NOT NULL,
      phone_number TEXT NOT NULL,
      live_metro_station TEXT NOT NULL DEFAULT '[]',
      study_metro_station TEXT NOT NULL DEFAULT '[]',
      year_of_admission INTEGER NOT NULL,
      has_driver_license TEXT NOT NULL CHECK (has_driver_license IN ('no', 'yes', 'yes_and_car')),
      date_of_birth TEXT NOT NULL,
      has_printer TEXT NOT NULL CHECK (has_printer IN ('no', 'black', 'color', 'black_and_color')),
      can_host_night INTEGER NOT NULL DEFAULT 0,
      created_at INTEGER DEFAULT (strftime('%s', 'now')),
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );

    CREATE INDEX IF NOT EXISTS idx_user_profiles_status ON user_profiles(status);
    CREATE INDEX IF NOT EXISTS idx_user_profiles_year ON user_profiles(year_of_admission);
  `);

  logger.info('Database migrations completed');
}

export function closeDatabase(): void {
  if (db) {
    logger.info('Closing database connection');
    db.close();
    db = null;
  }
}
