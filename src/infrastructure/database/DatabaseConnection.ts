import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const IN_MEMORY = ':memory:';

/**
 * Database connection manager
 */
export class DatabaseConnection {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string = 'data/dialogs.db') {
    this.dbPath = dbPath === IN_MEMORY ? IN_MEMORY : path.resolve(process.cwd(), dbPath);

    if (this.dbPath !== IN_MEMORY) {
      // Ensure data directory exists
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('synchronous = NORMAL');

    this.initializeTables();
  }

  private initializeTables() {
    // seq is the insertion order; id is the caller-visible identifier
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS messages (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        dialog_id TEXT NOT NULL,
        text TEXT NOT NULL,
        participant_index INTEGER NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_messages_dialog_seq ON messages(dialog_id, seq);
    `);
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  getDatabasePath(): string {
    return this.dbPath;
  }

  /**
   * Round trip to the store; throws when it cannot answer
   */
  ping(): void {
    this.db.prepare('SELECT 1').get();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

// Global instance
let dbInstance: DatabaseConnection | null = null;

export function initializeDatabase(dbPath?: string): DatabaseConnection {
  if (!dbInstance) {
    dbInstance = new DatabaseConnection(dbPath);
  }
  return dbInstance;
}

export function getDatabaseConnection(): DatabaseConnection {
  if (!dbInstance) {
    throw new Error('Database not initialized. Call initializeDatabase first.');
  }
  return dbInstance;
}

export function closeDatabase(): void {
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
  }
}
