import type { SqliteDatabase } from "./db";
import { nowIso } from "./db";
import type { Shop, SyncableShop } from "@/sync/types";
import { shopInputSchema, type ShopInput } from "@/sync/types/api";

interface RawShopRow {
  id: number;
  name: string;
  shop_url: string | null;
  client_id: string | null;
  client_secret: string | null;
  user_id: string | null;
  is_active: number;
  created_at: string;
}

export function createShop(db: SqliteDatabase, input: ShopInput): Shop {
  const shop = shopInputSchema.parse(input);
  const now = nowIso();

  const info = db.prepare(`
    INSERT INTO shops (name, shop_url, client_id, client_secret, user_id, is_active, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `).run(shop.name, shop.shopUrl ?? null, shop.clientId, shop.clientSecret, shop.userId, shop.isActive ? 1 : 0, now);

  const created = getShop(db, Number(info.lastInsertRowid));
  if (!created) {
    throw new Error(`Shop ${String(info.lastInsertRowid)} vanished right after insert`);
  }
  return created;
}

export function getShop(db: SqliteDatabase, id: number): Shop | undefined {
  const row = db.prepare("SELECT * FROM shops WHERE id = ?").get(id) as RawShopRow | undefined;
  return row ? toShop(row) : undefined;
}

export function listShops(db: SqliteDatabase): Shop[] {
  const rows = db.prepare("SELECT * FROM shops ORDER BY id").all() as RawShopRow[];
  return rows.map(toShop);
}

/** Shops a sync pass should visit: active, with credentials and a remote user id. */
export function listSyncableShops(db: SqliteDatabase): SyncableShop[] {
  return listShops(db).filter(isSyncable);
}

export function isSyncable(shop: Shop): shop is SyncableShop {
  return shop.isActive && !!shop.clientId && !!shop.clientSecret && !!shop.userId;
}

export function setShopActive(db: SqliteDatabase, id: number, active: boolean): boolean {
  const info = db.prepare("UPDATE shops SET is_active = ? WHERE id = ?").run(active ? 1 : 0, id);
  return info.changes > 0;
}

function toShop(row: RawShopRow): Shop {
  return {
    id: row.id,
    name: row.name,
    shopUrl: row.shop_url,
    clientId: row.client_id,
    clientSecret: row.client_secret,
    userId: row.user_id,
    isActive: row.is_active === 1,
    createdAt: row.created_at,
  };
}
