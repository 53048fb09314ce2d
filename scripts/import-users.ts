/**
 * Imports organiser profiles from the sign-up form CSV export.
 * Run with: npx tsx scripts/import-users.ts <file.csv> [--overwrite]
 */
import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { getDatabase, closeDatabase } from '../src/persistence/database.js';
import { UserProfileRepository } from '../src/persistence/repositories/UserProfileRepository.js';
import { importUsersFromCsv } from '../src/core/users/csvImport.js';

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const csvPath = args.find((arg) => !arg.startsWith('--'));
  if (!csvPath) {
    console.error('Usage: npx tsx scripts/import-users.ts <file.csv> [--overwrite]');
    process.exit(1);
  }

  const csvText = await readFile(csvPath, 'utf8');
  const repository = new UserProfileRepository(getDatabase());
  const result = importUsersFromCsv(csvText, repository, { skipExisting: !args.includes('--overwrite') });
  closeDatabase();

  console.log('='.repeat(50));
  console.log(`Импортировано новых пользователей: ${result.importedCount}`);
  console.log(`Обновлено существующих пользователей: ${result.updatedCount}`);
  console.log(`Пропущено записей: ${result.skippedCount}`);
  console.log(`Успешно: ${result.success}`);
  if (result.errors.length > 0) {
    console.log('\nОшибки:');
    for (const error of result.errors) {
      console.log(`  - ${error}`);
    }
  }
  console.log('='.repeat(50));
}

main().catch((error) => {
  console.error('Import failed:', error);
  process.exit(1);
});
