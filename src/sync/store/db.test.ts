import assert from "node:assert/strict";
import test from "node:test";
import Database from "better-sqlite3";
import { MIGRATIONS, columnExists, migrate, openDatabase, schemaVersion } from "./db";

test("openDatabase brings a fresh store to the latest schema version", () => {
  const db = openDatabase(":memory:");
  assert.equal(schemaVersion(db), MIGRATIONS.length);
  assert.equal(columnExists(db, "chats", "product_url"), true);
  assert.equal(columnExists(db, "chats", "listing_data"), true);
  assert.equal(columnExists(db, "chats", "customer_id"), true);
  db.close();
});

test("migrate upgrades a version 1 store and keeps its rows", () => {
  const db = new Database(":memory:");
  MIGRATIONS[0].apply(db);
  db.pragma("user_version = 1");
  db.prepare("INSERT INTO shops (name, created_at) VALUES (?, ?)").run("Acme", "2024-01-01T00:00:00.000Z");
  db.prepare(
    "INSERT INTO chats (shop_id, remote_chat_id, created_at, updated_at) VALUES (1, 'c1', 'x', 'x')",
  ).run();
  assert.equal(columnExists(db, "chats", "product_url"), false);

  assert.equal(migrate(db), 2);
  assert.equal(columnExists(db, "chats", "product_url"), true);

  assert.equal(db.prepare("SELECT COUNT(*) FROM chats WHERE remote_chat_id = 'c1'").pluck().get(), 1);
  assert.equal(db.prepare("SELECT product_url FROM chats").pluck().get(), null);
  db.close();
});

test("migrate tolerates columns that were added by hand before versioning", () => {
  const db = new Database(":memory:");
  MIGRATIONS[0].apply(db);
  db.exec("ALTER TABLE chats ADD COLUMN product_url TEXT");

  assert.equal(migrate(db), 2);
  assert.equal(columnExists(db, "chats", "listing_data"), true);
  db.close();
});

test("migrate is a no-op on an up-to-date store", () => {
  const db = openDatabase(":memory:");
  assert.equal(migrate(db), MIGRATIONS.length);
  assert.equal(migrate(db), MIGRATIONS.length);
  db.close();
});
