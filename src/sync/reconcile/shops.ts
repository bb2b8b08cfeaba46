import { randomUUID } from "crypto";
import type { SyncContext } from "./context";
import { reconcileChat } from "./chat";
import type { ShopSyncResult, SyncMode, SyncRunSummary, SyncableShop } from "@/sync/types";
import { classifyRemoteError } from "@/sync/marketplace/errors";
import { listSyncableShops } from "@/sync/store/shops";
import { completeRun, createRun, type RunCounts } from "@/sync/store/runs";
import { createChildLogger, describeError } from "@/sync/logger";

const log = createChildLogger("shop-sync");

export interface PassOptions {
  mode?: SyncMode;
}

function emptyShopResult(shop: SyncableShop): ShopSyncResult {
  return {
    shopId: shop.id,
    shopName: shop.name,
    success: false,
    chatsCreated: 0,
    chatsUpdated: 0,
    chatsFailed: 0,
    messagesCreated: 0,
    error: null,
    errorKind: null,
  };
}

/** Pull one shop's chats and reconcile them in the order the marketplace returned them. */
export async function syncShop(ctx: SyncContext, shop: SyncableShop): Promise<ShopSyncResult> {
  const result = emptyShopResult(shop);

  try {
    const remote = ctx.connect(shop);
    const chats = await remote.listChats(shop.userId, {
      limit: ctx.settings.chatPageSize,
      offset: 0,
      timeoutMs: ctx.settings.listTimeoutMs,
    });
    log.info("Fetched chats", { shopId: shop.id, shop: shop.name, chats: chats.length });

    for (const payload of chats) {
      const outcome = await reconcileChat(ctx, shop, payload, remote);
      if (outcome.ok) {
        result.chatsCreated += outcome.value.created;
        result.chatsUpdated += outcome.value.updated;
        result.messagesCreated += outcome.value.messages;
      } else {
        result.chatsFailed++;
      }
    }

    result.success = true;
  } catch (error) {
    const failure = classifyRemoteError(error);
    result.error = failure.detail;
    result.errorKind = failure.kind;
    if (failure.kind === "permission") {
      log.warn("No messenger access for shop", { shopId: shop.id, shop: shop.name, error: describeError(error) });
    } else {
      log.error("Shop sync failed", { shopId: shop.id, shop: shop.name, error: describeError(error) });
    }
  }

  return result;
}

export function summarize(
  runId: string,
  mode: SyncMode,
  startedAt: string,
  shops: ShopSyncResult[],
): SyncRunSummary {
  const succeeded = shops.filter((s) => s.success);
  const sum = (pick: (s: ShopSyncResult) => number) => succeeded.reduce((total, s) => total + pick(s), 0);

  return {
    runId,
    mode,
    startedAt,
    completedAt: new Date().toISOString(),
    shopsTotal: shops.length,
    shopsSuccess: succeeded.length,
    shopsFailed: shops.length - succeeded.length,
    chatsCreated: sum((s) => s.chatsCreated),
    chatsUpdated: sum((s) => s.chatsUpdated),
    chatsFailed: sum((s) => s.chatsFailed),
    messagesCreated: sum((s) => s.messagesCreated),
    shops,
  };
}

function countsOf(summary: SyncRunSummary): RunCounts {
  const { shopsTotal, shopsSuccess, shopsFailed, chatsCreated, chatsUpdated, chatsFailed, messagesCreated } = summary;
  return { shopsTotal, shopsSuccess, shopsFailed, chatsCreated, chatsUpdated, chatsFailed, messagesCreated };
}

/** Run a pass over the given shops, one after another, and record it in the run ledger. */
export async function syncShops(
  ctx: SyncContext,
  shops: SyncableShop[],
  options: PassOptions = {},
): Promise<SyncRunSummary> {
  const runId = randomUUID();
  const mode = options.mode ?? "once";
  const startedAt = new Date().toISOString();

  log.info("Starting sync pass", { runId, mode, shops: shops.length });
  recordRun(() => createRun(ctx.db, runId, mode, startedAt));

  const results: ShopSyncResult[] = [];
  for (const shop of shops) {
    results.push(await syncShop(ctx, shop));
  }

  const summary = summarize(runId, mode, startedAt, results);
  // A pass where every shop failed is recorded as failed.
  const status = summary.shopsTotal > 0 && summary.shopsSuccess === 0 ? "failed" : "completed";
  recordRun(() => completeRun(ctx.db, runId, countsOf(summary), status));
  log.info("Sync pass complete", { runId, status, ...countsOf(summary) });
  return summary;
}

/** One pass over every eligible shop. Never throws; failures are reported per shop. */
export async function syncAllShops(ctx: SyncContext, options: PassOptions = {}): Promise<SyncRunSummary> {
  let shops: SyncableShop[];
  try {
    shops = listSyncableShops(ctx.db);
  } catch (error) {
    log.error("Could not load shops, pass skipped", { error: describeError(error) });
    return summarize(randomUUID(), options.mode ?? "once", new Date().toISOString(), []);
  }
  return syncShops(ctx, shops, options);
}

// Run ledger writes never fail the pass.
function recordRun(write: () => void): void {
  try {
    write();
  } catch (error) {
    log.error("Could not write sync run record", { error: describeError(error) });
  }
}
