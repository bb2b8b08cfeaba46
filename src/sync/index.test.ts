import assert from "node:assert/strict";
import test from "node:test";
import { createSyncContext } from "./index";
import { parseEnv } from "./config/env";
import { openDatabase } from "./store/db";
import { MarketplaceClient } from "./marketplace/client";
import type { SyncableShop } from "./types";

const shop: SyncableShop = {
  id: 1,
  name: "Acme",
  shopUrl: null,
  clientId: "test-client",
  clientSecret: "test-secret",
  userId: "1000",
  isActive: true,
  createdAt: "2024-05-01T12:00:00.000Z",
};

test("createSyncContext keeps one client per shop until its credentials change", () => {
  const ctx = createSyncContext(openDatabase(":memory:"), parseEnv({}));

  const first = ctx.connect(shop);
  assert.ok(first instanceof MarketplaceClient);
  assert.equal(ctx.connect({ ...shop }), first);
  assert.notEqual(ctx.connect({ ...shop, clientSecret: "rotated-secret" }), first);
  assert.notEqual(ctx.connect({ ...shop, id: 2 }), first);
});
