import { Database } from 'sqlite';

/**
 * Database migration scripts for SQLite schema creation
 */

export interface Migration {
  version: number;
  name: string;
  up: (db: Database) => Promise<void>;
  down: (db: Database) => Promise<void>;
}

export const migrations: Migration[] = [
  {
    version: 0,
    name: 'create_migration_history_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS migration_history (
          version INTEGER PRIMARY KEY,
          name TEXT NOT NULL,
          applied_at TEXT NOT NULL
        );
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS migration_history;');
    }
  },
  {
    version: 1,
    name: 'create_deferred_emails_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS deferred_emails (
          message_id TEXT PRIMARY KEY,
          thread_id TEXT NOT NULL DEFAULT '',
          sender TEXT NOT NULL DEFAULT '',
          display_name TEXT NOT NULL DEFAULT '',
          subject TEXT NOT NULL DEFAULT '',
          body TEXT NOT NULL DEFAULT '',
          received_at TEXT NOT NULL,
          labels TEXT NOT NULL DEFAULT '[]',
          recipients TEXT NOT NULL DEFAULT '[]',
          priority_score INTEGER NOT NULL DEFAULT 0,
          deferred_at TEXT NOT NULL
        );
      `);

      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_deferred_emails_received_at ON deferred_emails(received_at);
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS deferred_emails;');
    }
  }
];

/**
 * Run all pending migrations
 */
export async function runMigrations(db: Database): Promise<void> {
  console.log('🔄 Running database migrations...');

  // Ensure migration history table exists first
  const historyMigration = migrations.find(m => m.name === 'create_migration_history_table');
  if (historyMigration) {
    await historyMigration.up(db);
  }

  const currentVersionResult = await db.get<{ version: number | null }>(
    'SELECT MAX(version) as version FROM migration_history'
  );
  const currentVersion = currentVersionResult?.version ?? -1;

  for (const migration of migrations) {
    if (migration.version > currentVersion) {
      try {
        await db.exec('BEGIN TRANSACTION;');
        await migration.up(db);

        await db.run(
          'INSERT INTO migration_history (version, name, applied_at) VALUES (?, ?, ?)',
          [migration.version, migration.name, new Date().toISOString()]
        );

        await db.exec('COMMIT;');
        console.log(`✅ Migration ${migration.version} completed successfully`);
      } catch (error) {
        await db.exec('ROLLBACK;');
        console.error(`❌ Migration ${migration.version} failed:`, error);
        throw error;
      }
    }
  }

  console.log('✅ All migrations completed successfully');
}

/**
 * Rollback the last migration
 */
export async function rollbackLastMigration(db: Database): Promise<void> {
  const lastMigration = await db.get<{ version: number; name: string }>(
    'SELECT version, name FROM migration_history ORDER BY version DESC LIMIT 1'
  );

  if (!lastMigration) {
    console.log('No migrations to rollback');
    return;
  }

  const migration = migrations.find(m => m.version === lastMigration.version);
  if (!migration) {
    throw new Error(`Migration ${lastMigration.version} not found`);
  }

  try {
    await db.exec('BEGIN TRANSACTION;');
    await db.run('DELETE FROM migration_history WHERE version = ?', [migration.version]);
    await migration.down(db);
    await db.exec('COMMIT;');
    console.log(`✅ Migration ${migration.version} rolled back successfully`);
  } catch (error) {
    await db.exec('ROLLBACK;');
    console.error(`❌ Rollback of migration ${migration.version} failed:`, error);
    throw error;
  }
}
