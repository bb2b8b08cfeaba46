import assert from "node:assert/strict";
import test from "node:test";
import { openDatabase } from "./db";
import { createShop, isSyncable, listSyncableShops, setShopActive } from "./shops";

const input = { name: "  Acme  ", clientId: "test-client", clientSecret: "test-secret", userId: "1000" };

test("createShop trims the name and defaults to active", () => {
  const db = openDatabase(":memory:");
  const shop = createShop(db, input);

  assert.equal(shop.name, "Acme");
  assert.equal(shop.isActive, true);
  assert.equal(shop.shopUrl, null);
  assert.equal(isSyncable(shop), true);
});

test("createShop rejects a non-numeric remote user id", () => {
  const db = openDatabase(":memory:");
  assert.throws(() => createShop(db, { ...input, userId: "acme" }));
});

test("listSyncableShops leaves out inactive shops and shops without credentials", () => {
  const db = openDatabase(":memory:");
  const active = createShop(db, input);
  const paused = createShop(db, { ...input, name: "Paused" });
  setShopActive(db, paused.id, false);
  db.prepare("INSERT INTO shops (name, is_active, created_at) VALUES ('Bare', 1, 'x')").run();

  assert.deepEqual(
    listSyncableShops(db).map((s) => s.id),
    [active.id],
  );
});
