import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import path from 'path';
import fs from 'fs';

export type SqliteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS entities (
    id TEXT PRIMARY KEY,
    owner_session_id TEXT NOT NULL,
    kind TEXT NOT NULL,
    payload_json TEXT NOT NULL,
    created_at TEXT NOT NULL,
    sync_state TEXT NOT NULL,
    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE INDEX IF NOT EXISTS idx_entities_session_created
    ON entities(owner_session_id, created_at DESC);

  CREATE INDEX IF NOT EXISTS idx_entities_sync_state
    ON entities(sync_state, created_at ASC);

  CREATE TABLE IF NOT EXISTS vector_records (
    id TEXT PRIMARY KEY,
    embedding_json TEXT NOT NULL,
    metadata_json TEXT NOT NULL,
    created_at INTEGER NOT NULL,
    backend_origin TEXT NOT NULL,
    native_rowid INTEGER
  );

  CREATE INDEX IF NOT EXISTS idx_vector_records_native_rowid
    ON vector_records(native_rowid);
`;

/**
 * Open (or create) the local SQLite database and apply the schema.
 * `':memory:'` opens a private in-memory database.
 */
export function createDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== ':memory:') {
    const resolved = path.resolve(dbPath);
    if (!fs.existsSync(path.dirname(resolved))) {
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
    }
  }

  const db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.exec(SCHEMA);
  return db;
}

/**
 * Load the sqlite-vec extension into `db`. Returns the extension version,
 * or throws when the native library cannot be loaded on this platform.
 */
export function loadVectorExtension(db: SqliteDatabase): string {
  sqliteVec.load(db);
  const row: unknown = db.prepare('SELECT vec_version() AS version').get();
  if (typeof row === 'object' && row !== null && 'version' in row && typeof row.version === 'string') {
    return row.version;
  }
  throw new Error('sqlite-vec loaded but vec_version() returned no version.');
}
