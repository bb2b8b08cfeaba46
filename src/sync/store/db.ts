import Database from "better-sqlite3";
import path from "path";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("store");

export type SqliteDatabase = Database.Database;

interface Migration {
  version: number;
  name: string;
  apply(db: SqliteDatabase): void;
}

const BASE_SCHEMA = `
CREATE TABLE IF NOT EXISTS shops (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  shop_url TEXT,
  client_id TEXT,
  client_secret TEXT,
  user_id TEXT,
  is_active INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS chats (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  shop_id INTEGER NOT NULL REFERENCES shops (id),
  remote_chat_id TEXT NOT NULL,
  client_name TEXT NOT NULL DEFAULT '',
  client_phone TEXT,
  last_message TEXT NOT NULL DEFAULT '',
  unread_count INTEGER NOT NULL DEFAULT 0,
  status TEXT NOT NULL DEFAULT 'active',
  priority TEXT NOT NULL DEFAULT 'new',
  response_timer INTEGER NOT NULL DEFAULT 0,
  assigned_manager_id INTEGER,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  UNIQUE (shop_id, remote_chat_id)
);

CREATE TABLE IF NOT EXISTS messages (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  chat_id INTEGER NOT NULL REFERENCES chats (id) ON DELETE CASCADE,
  remote_message_id TEXT,
  message_text TEXT NOT NULL,
  message_type TEXT NOT NULL DEFAULT 'incoming',
  sender_name TEXT NOT NULL DEFAULT '',
  manager_id INTEGER,
  is_read INTEGER NOT NULL DEFAULT 0,
  timestamp TEXT NOT NULL,
  created_at TEXT NOT NULL,
  UNIQUE (chat_id, remote_message_id)
);

CREATE INDEX IF NOT EXISTS idx_messages_chat_time ON messages (chat_id, timestamp);

CREATE TABLE IF NOT EXISTS listings (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  listing_id TEXT NOT NULL UNIQUE,
  title TEXT NOT NULL DEFAULT '',
  price REAL NOT NULL DEFAULT 0,
  url TEXT NOT NULL DEFAULT '',
  image_url TEXT NOT NULL DEFAULT '',
  location TEXT NOT NULL DEFAULT '',
  description TEXT NOT NULL DEFAULT '',
  category TEXT NOT NULL DEFAULT '',
  status TEXT NOT NULL DEFAULT 'new',
  notes TEXT,
  assigned_manager_id INTEGER,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_listings_status ON listings (status);

CREATE TABLE IF NOT EXISTS sync_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id TEXT NOT NULL UNIQUE,
  started_at TEXT NOT NULL,
  completed_at TEXT,
  mode TEXT NOT NULL,
  counts_json TEXT NOT NULL,
  status TEXT NOT NULL
);
`;

export function columnExists(db: SqliteDatabase, table: string, column: string): boolean {
  const columns = db.prepare(`PRAGMA table_info(${table})`).all() as Array<{ name: string }>;
  return columns.some((c) => c.name === column);
}

function addColumnIfMissing(db: SqliteDatabase, table: string, column: string, definition: string): void {
  if (!columnExists(db, table, column)) {
    db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
  }
}

// Append-only. Each migration runs once, inside a transaction, in version order.
export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: "base schema",
    apply: (db) => db.exec(BASE_SCHEMA),
  },
  {
    version: 2,
    name: "chat customer and listing context",
    apply: (db) => {
      addColumnIfMissing(db, "chats", "customer_id", "TEXT");
      addColumnIfMissing(db, "chats", "product_url", "TEXT");
      addColumnIfMissing(db, "chats", "listing_data", "TEXT");
    },
  },
];

export function schemaVersion(db: SqliteDatabase): number {
  const version = db.pragma("user_version", { simple: true });
  return typeof version === "number" ? version : 0;
}

export function migrate(db: SqliteDatabase): number {
  const current = schemaVersion(db);
  const pending = MIGRATIONS.filter((m) => m.version > current);

  for (const migration of pending) {
    db.transaction(() => {
      migration.apply(db);
      db.pragma(`user_version = ${migration.version}`);
    })();
    log.info("Applied migration", { version: migration.version, name: migration.name });
  }

  return schemaVersion(db);
}

/** Open a database file (or `:memory:`) and bring its schema up to date. */
export function openDatabase(location: string): SqliteDatabase {
  const db = new Database(location === ":memory:" ? location : path.resolve(location));
  if (location !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
  migrate(db);
  return db;
}

let _db: SqliteDatabase | null = null;

export function getDatabase(location?: string): SqliteDatabase {
  if (!_db) {
    const dbPath = location ?? process.env.SYNC_DB_PATH ?? path.resolve(process.cwd(), "crm_sync.db");
    _db = openDatabase(dbPath);
  }
  return _db;
}

export function closeDatabase(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

export function nowIso(): string {
  return new Date().toISOString();
}
