import Database from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';

export interface DatabaseOptions {
  /** Path to the SQLite database file. */
  dbPath: string;
  /** Open in read-only mode */
  readonly?: boolean;
}

/**
 * Open a database connection with production pragmas.
 * The metadata store and the SQLite vector index each get their own file,
 * so this is not a singleton.
 */
export function openDatabase(options: DatabaseOptions): Database.Database {
  const dbPath = path.resolve(options.dbPath);

  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath, {
    readonly: options.readonly ?? false,
  });

  applyPragmas(db);
  return db;
}

/**
 * Create an in-memory database with production pragmas.
 * Used for testing — each call returns a fresh isolated DB.
 */
export function createTestDatabase(): Database.Database {
  const db = new Database(':memory:');
  applyPragmas(db);
  return db;
}

function applyPragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('cache_size = -64000');       // 64 MB
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');       // 5 s
  db.pragma('temp_store = MEMORY');
}
