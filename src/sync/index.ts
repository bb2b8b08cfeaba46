import type { SyncEnv } from "@/sync/config/env";
import type { SqliteDatabase } from "@/sync/store/db";
import { MarketplaceClient } from "@/sync/marketplace/client";
import type { RemoteChatSource } from "@/sync/marketplace/types";
import type { SyncContext, SyncSettings } from "@/sync/reconcile/context";
import { syncAllShops, syncShops, type PassOptions } from "@/sync/reconcile/shops";
import { runSyncLoop, type LoopOptions } from "@/sync/scheduler/loop";
import type { SyncRunSummary, SyncableShop } from "@/sync/types";

export type { SyncContext, SyncSettings } from "@/sync/reconcile/context";
export { reconcileChat } from "@/sync/reconcile/chat";
export { extractListingContext, resolveListingContext } from "@/sync/listing/extractor";
export { getChatListingInfo, type ChatListingInfo } from "@/sync/listing/lookup";

export function settingsFromEnv(env: SyncEnv): SyncSettings {
  return {
    siteUrl: env.MARKETPLACE_SITE_URL,
    chatPageSize: env.SYNC_CHAT_PAGE_SIZE,
    listTimeoutMs: env.SYNC_LIST_TIMEOUT_MS,
    detailTimeoutMs: env.SYNC_DETAIL_TIMEOUT_MS,
    messagesTimeoutMs: env.SYNC_MESSAGES_TIMEOUT_MS,
  };
}

/**
 * Build the context a pass runs in. One marketplace client is kept per shop
 * so its access token survives between passes of a loop.
 */
export function createSyncContext(db: SqliteDatabase, env: SyncEnv): SyncContext {
  const clients = new Map<number, { key: string; client: RemoteChatSource }>();

  return {
    db,
    settings: settingsFromEnv(env),
    connect(shop: SyncableShop): RemoteChatSource {
      const key = `${shop.clientId}:${shop.clientSecret}`;
      const cached = clients.get(shop.id);
      if (cached && cached.key === key) return cached.client;

      const client = new MarketplaceClient(
        { clientId: shop.clientId, clientSecret: shop.clientSecret },
        { baseUrl: env.MARKETPLACE_API_URL },
      );
      clients.set(shop.id, { key, client });
      return client;
    },
  };
}

/** One pass over every eligible shop. */
export function runSyncPass(ctx: SyncContext, options?: PassOptions): Promise<SyncRunSummary> {
  return syncAllShops(ctx, options);
}

/** One pass over the chosen shops only. */
export function runSyncPassFor(ctx: SyncContext, shops: SyncableShop[], options?: PassOptions): Promise<SyncRunSummary> {
  return syncShops(ctx, shops, options);
}

export function startSyncLoop(ctx: SyncContext, options: LoopOptions): Promise<number> {
  return runSyncLoop(ctx, options);
}
