import type { SqliteDatabase } from "@/sync/store/db";
import type { RemoteChatSource } from "@/sync/marketplace/types";
import type { SyncableShop } from "@/sync/types";

export interface SyncSettings {
  siteUrl: string;
  chatPageSize: number;
  listTimeoutMs: number;
  detailTimeoutMs: number;
  messagesTimeoutMs: number;
}

/**
 * Everything a sync pass touches, passed down explicitly: the store handle,
 * the settings, and a factory for each shop's remote client.
 */
export interface SyncContext {
  db: SqliteDatabase;
  settings: SyncSettings;
  connect(shop: SyncableShop): RemoteChatSource;
  now?: () => Date;
}

export const DEFAULT_SETTINGS: SyncSettings = {
  siteUrl: "https://www.avito.ru",
  chatPageSize: 100,
  listTimeoutMs: 10_000,
  detailTimeoutMs: 5_000,
  messagesTimeoutMs: 10_000,
};
