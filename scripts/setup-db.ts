import { config } from '../src/config';
import { closeDb, initDb, query } from '../src/database';

/**
 * Creates the schema without starting the bot. Safe to re-run: every table
 * is created only if missing.
 */
function setupDatabase() {
  try {
    console.log(`Setting up database at ${config.databasePath}...`);
    initDb();

    const tables = query<{ name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    );
    console.log(`Tables: ${tables.map((table) => table.name).join(', ')}`);

    closeDb();
    console.log('Database setup complete!');
    process.exit(0);
  } catch (error) {
    console.error('Database setup failed:', error);
    process.exit(1);
  }
}

setupDatabase();
