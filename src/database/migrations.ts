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
    version: 1,
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
    down: async () => {
      // Needed for tracking; never rolled back
    }
  },
  {
    version: 2,
    name: 'create_sync_cursors_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS sync_cursors (
          mailbox_id TEXT PRIMARY KEY,
          cursor TEXT,
          cursor_at TEXT,
          last_sync_at TEXT,
          total_processed INTEGER NOT NULL DEFAULT 0,
          current_sync_status TEXT NOT NULL DEFAULT 'idle' CHECK (current_sync_status IN ('idle', 'syncing', 'error')),
          last_error TEXT
        );
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS sync_cursors;');
    }
  },
  {
    version: 3,
    name: 'create_classifications_table',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS classifications (
          mailbox_id TEXT NOT NULL,
          message_id TEXT NOT NULL,
          subject TEXT NOT NULL,
          sender TEXT NOT NULL,
          confidence REAL NOT NULL,
          is_complaint INTEGER NOT NULL,
          excluded_by TEXT,
          signals TEXT NOT NULL,
          classified_at TEXT NOT NULL,
          forwarded_at TEXT,
          PRIMARY KEY (mailbox_id, message_id)
        );
      `);

      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_classifications_message_id ON classifications(message_id);
        CREATE INDEX IF NOT EXISTS idx_classifications_classified_at ON classifications(classified_at);
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS classifications;');
    }
  },
  {
    version: 4,
    name: 'create_feedback_tables',
    up: async (db: Database) => {
      await db.exec(`
        CREATE TABLE IF NOT EXISTS feedback_signals (
          id TEXT PRIMARY KEY,
          mailbox_id TEXT NOT NULL,
          message_id TEXT NOT NULL,
          kind TEXT NOT NULL CHECK (kind IN ('false_positive', 'false_negative')),
          source TEXT NOT NULL CHECK (source IN ('mailbox', 'operator')),
          subject TEXT,
          body TEXT,
          received_at TEXT NOT NULL,
          processed_at TEXT,
          UNIQUE (kind, mailbox_id, message_id)
        );
      `);

      await db.exec(`
        CREATE TABLE IF NOT EXISTS keyword_adjustments (
          category TEXT NOT NULL,
          term TEXT NOT NULL,
          multiplier REAL NOT NULL,
          updated_at TEXT NOT NULL,
          PRIMARY KEY (category, term)
        );
      `);

      await db.exec(`
        CREATE TABLE IF NOT EXISTS keyword_candidates (
          term TEXT PRIMARY KEY,
          occurrences INTEGER NOT NULL DEFAULT 0,
          last_seen_at TEXT NOT NULL
        );
      `);

      await db.exec(`
        CREATE INDEX IF NOT EXISTS idx_feedback_signals_pending ON feedback_signals(kind, processed_at);
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS keyword_candidates;');
      await db.exec('DROP TABLE IF EXISTS keyword_adjustments;');
      await db.exec('DROP TABLE IF EXISTS feedback_signals;');
    }
  },
  {
    version: 5,
    name: 'create_feedback_checkpoints_table',
    up: async (db: Database) => {
      // Last time each feedback pass scanned a mailbox
      await db.exec(`
        CREATE TABLE IF NOT EXISTS feedback_checkpoints (
          kind TEXT NOT NULL,
          mailbox_id TEXT NOT NULL,
          checked_at TEXT NOT NULL,
          PRIMARY KEY (kind, mailbox_id)
        );
      `);
    },
    down: async (db: Database) => {
      await db.exec('DROP TABLE IF EXISTS feedback_checkpoints;');
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
  const currentVersion = currentVersionResult?.version || 0;

  for (const migration of migrations) {
    if (migration.version > currentVersion) {
      console.log(`🔄 Running migration ${migration.version}: ${migration.name}`);

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
 * Roll back to a specific migration version
 */
export async function rollbackMigration(db: Database, targetVersion: number): Promise<void> {
  console.log(`🔄 Rolling back to migration version ${targetVersion}...`);

  const currentVersionResult = await db.get<{ version: number | null }>(
    'SELECT MAX(version) as version FROM migration_history'
  );
  const currentVersion = currentVersionResult?.version || 0;

  if (targetVersion >= currentVersion) {
    console.log('No rollback needed - target version is current or higher');
    return;
  }

  const migrationsToRollback = migrations
    .filter(m => m.version > targetVersion && m.version <= currentVersion && m.version !== 1)
    .sort((a, b) => b.version - a.version);

  for (const migration of migrationsToRollback) {
    console.log(`🔄 Rolling back migration ${migration.version}: ${migration.name}`);

    try {
      await db.exec('BEGIN TRANSACTION;');
      await migration.down(db);
      await db.run('DELETE FROM migration_history WHERE version = ?', [migration.version]);
      await db.exec('COMMIT;');
      console.log(`✅ Migration ${migration.version} rolled back successfully`);
    } catch (error) {
      await db.exec('ROLLBACK;');
      console.error(`❌ Rollback of migration ${migration.version} failed:`, error);
      throw error;
    }
  }
}
