import { Database, open } from 'sqlite';
import sqlite3 from 'sqlite3';
import path from 'path';
import fs from 'fs';

let db: Database | null = null;

/**
 * Get or create the state database connection.
 * Holds sync cursors, classification records and feedback state.
 */
export async function getDatabase(dbPath?: string): Promise<Database> {
  if (db) {
    return db;
  }

  const filename = dbPath || process.env.DATABASE_PATH || path.join(process.cwd(), 'data', 'complaints.db');

  if (filename !== ':memory:') {
    const dir = path.dirname(filename);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  db = await open({
    filename,
    driver: sqlite3.Database
  });

  await db.exec('PRAGMA foreign_keys = ON');
  if (filename !== ':memory:') {
    // Readers never see a half-applied cursor write
    await db.exec('PRAGMA journal_mode = WAL');
  }

  return db;
}

/**
 * Close database connection
 */
export async function closeDatabase(): Promise<void> {
  if (db) {
    await db.close();
    db = null;
  }
}
