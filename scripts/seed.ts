import 'dotenv/config';
import { loadConfig } from '../src/config';
import { connectDatabase, closeDatabase } from '../src/utils/dbConnection';
import { initDatabase } from '../src/database/migrate';
import { seedTemplatesIfEmpty } from '../src/services/templates/catalog';
import { getDbInfo } from '../src/services/diagnostics/dbInfo';

// Creates / migrates the database file and loads the default templates if it has none.
function run() {
  const config = loadConfig();
  initDatabase(connectDatabase(config.dbPath));
  const created = seedTemplatesIfEmpty();
  const info = getDbInfo();
  console.log('Seeded templates:', created, 'db:', info.dbPath, 'counts:', info.counts);
  closeDatabase();
}

try {
  run();
} catch (e) {
  console.error(e);
  process.exit(1);
}
