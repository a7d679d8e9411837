import { Database, open } from 'sqlite';
import sqlite3 from 'sqlite3';
import { runMigrations, rollbackMigration, migrations } from '../../database/migrations';

describe('Database Migrations', () => {
  let db: Database;

  const tableNames = async (): Promise<string[]> => {
    const tables = await db.all<Array<{ name: string }>>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    );
    return tables.map(table => table.name);
  };

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    db = await open({
      filename: ':memory:',
      driver: sqlite3.Database
    });
  });

  afterEach(async () => {
    await db.close();
    jest.restoreAllMocks();
  });

  describe('runMigrations', () => {
    it('should run all migrations successfully', async () => {
      await runMigrations(db);

      const migrationHistory = await db.all<Array<{ version: number; name: string; applied_at: string }>>(
        'SELECT * FROM migration_history ORDER BY version'
      );
      expect(migrationHistory).toHaveLength(migrations.length);

      migrations.forEach((migration, index) => {
        expect(migrationHistory[index].version).toBe(migration.version);
        expect(migrationHistory[index].name).toBe(migration.name);
        expect(migrationHistory[index].applied_at).toBeDefined();
      });
    });

    it('should create all required tables', async () => {
      await runMigrations(db);

      expect(await tableNames()).toEqual([
        'classifications',
        'feedback_checkpoints',
        'feedback_signals',
        'keyword_adjustments',
        'keyword_candidates',
        'migration_history',
        'sync_cursors'
      ]);
    });

    it('should be safe to run twice', async () => {
      await runMigrations(db);
      await runMigrations(db);

      const row = await db.get<{ count: number }>('SELECT COUNT(*) as count FROM migration_history');
      expect(row?.count).toBe(migrations.length);
    });

    it('should reject an unknown sync status', async () => {
      await runMigrations(db);

      await expect(db.run(
        "INSERT INTO sync_cursors (mailbox_id, current_sync_status) VALUES ('support@example.com', 'paused')"
      )).rejects.toThrow(/CHECK constraint failed/);
    });

    it('should keep one feedback signal per kind and message', async () => {
      await runMigrations(db);
      const insert = `INSERT OR IGNORE INTO feedback_signals (id, mailbox_id, message_id, kind, source, received_at)
        VALUES (?, 'support@example.com', 'm1', 'false_positive', 'mailbox', '2024-01-01T00:00:00.000Z')`;

      await db.run(insert, ['a']);
      const duplicate = await db.run(insert, ['b']);

      expect(duplicate.changes).toBe(0);
    });
  });

  describe('rollbackMigration', () => {
    it('should drop tables above the target version', async () => {
      await runMigrations(db);

      await rollbackMigration(db, 3);

      expect(await tableNames()).toEqual(['classifications', 'migration_history', 'sync_cursors']);
      const row = await db.get<{ version: number }>('SELECT MAX(version) as version FROM migration_history');
      expect(row?.version).toBe(3);
    });

    it('should do nothing when already at the target version', async () => {
      await runMigrations(db);

      await rollbackMigration(db, migrations.length);

      expect(await tableNames()).toHaveLength(7);
    });
  });
});
