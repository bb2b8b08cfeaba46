import type { SyncContext } from "./context";
import type { RawPayload, RemoteChatSource } from "@/sync/marketplace/types";
import { isRecord } from "@/sync/marketplace/types";
import type { ChatSyncCounts, Result, SyncFailure, SyncableShop } from "@/sync/types";
import { err, ok } from "@/sync/types";
import { resolveListingContext } from "@/sync/listing/extractor";
import { DEFAULT_CLIENT_NAME, findChat, getChat, insertChat, updateChatFromSync, type ChatSyncFields } from "@/sync/store/chats";
import { reconcileMessages } from "./messages";
import { createChildLogger, describeError } from "@/sync/logger";

const log = createChildLogger("chat-reconciler");

const NOTHING_DONE: ChatSyncCounts = { created: 0, updated: 0, messages: 0 };

export function remoteChatId(payload: RawPayload): string | null {
  const id = payload.id;
  if (typeof id === "number" && Number.isFinite(id)) return String(id);
  if (typeof id === "string" && id.trim() !== "") return id.trim();
  return null;
}

function textOf(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

function pickTextOrContent(record: RawPayload): unknown {
  return record.text ?? record.content;
}

/** Preview text, or undefined when the payload does not carry `last_message` at all. */
export function deriveLastMessage(payload: RawPayload): string | undefined {
  if (!("last_message" in payload)) return undefined;
  const raw = payload.last_message;
  if (!isRecord(raw)) return textOf(raw);

  const picked = pickTextOrContent(raw);
  return textOf(isRecord(picked) ? pickTextOrContent(picked) : picked);
}

/** The first chat participant that is not the shop itself. Undefined when `users` is missing. */
export function deriveCustomer(
  payload: RawPayload,
  shopUserId: string,
): { clientName: string; customerId: string | null } | undefined {
  if (!Array.isArray(payload.users)) return undefined;

  for (const user of payload.users) {
    if (!isRecord(user)) continue;
    const id = textOf(user.id);
    if (id === shopUserId) continue;
    const name = textOf(user.name) || textOf(user.username);
    return { clientName: name || DEFAULT_CLIENT_NAME, customerId: id || null };
  }
  return { clientName: DEFAULT_CLIENT_NAME, customerId: null };
}

export function deriveUnreadCount(payload: RawPayload): number | undefined {
  if (!("unread_count" in payload)) return undefined;
  return Number.isInteger(payload.unread_count) ? Number(payload.unread_count) : 0;
}

/**
 * Merge one remote chat into the store for `shop`: insert it when unseen,
 * otherwise overwrite the fields the payload carries. Then append new
 * messages; a message failure never fails the chat.
 */
export async function reconcileChat(
  ctx: SyncContext,
  shop: SyncableShop,
  payload: RawPayload,
  remote?: RemoteChatSource,
): Promise<Result<ChatSyncCounts, SyncFailure>> {
  const chatId = remoteChatId(payload);
  if (!chatId) {
    log.debug("Skipping chat payload without an id", { shopId: shop.id, keys: Object.keys(payload) });
    return ok(NOTHING_DONE);
  }

  const listing = await resolveListingContext(
    payload,
    { siteUrl: ctx.settings.siteUrl, shopUrl: shop.shopUrl },
    remote ? { remote, userId: shop.userId, chatId, timeoutMs: ctx.settings.detailTimeoutMs } : undefined,
  );
  if (!listing.productUrl) {
    log.debug("No product URL for chat", { shopId: shop.id, chatId, keys: Object.keys(payload) });
  }

  const customer = deriveCustomer(payload, shop.userId);
  const fields: ChatSyncFields = {
    lastMessage: deriveLastMessage(payload),
    clientName: customer?.clientName,
    customerId: customer?.customerId,
    unreadCount: deriveUnreadCount(payload),
    productUrl: listing.productUrl ?? undefined,
    listingData: listing.listingData ?? undefined,
  };

  let localId: number;
  let created = 0;
  let updated = 0;
  try {
    localId = ctx.db.transaction(() => {
      const existing = findChat(ctx.db, shop.id, chatId);
      if (existing) {
        updateChatFromSync(ctx.db, existing.id, fields);
        updated = 1;
        return existing.id;
      }
      created = 1;
      return insertChat(ctx.db, shop.id, chatId, fields);
    })();
  } catch (error) {
    log.error("Failed to store chat", { shopId: shop.id, chatId, error: describeError(error) });
    return err({ kind: "store", detail: `chat ${chatId}: ${describeError(error)}` });
  }

  log.debug(created ? "Chat created" : "Chat updated", { shopId: shop.id, chatId, localId, productUrl: listing.productUrl });

  let messages = 0;
  if (remote) {
    try {
      const chat = getChat(ctx.db, localId);
      if (chat) {
        messages = await reconcileMessages(ctx.db, chat, shop, remote, {
          timeoutMs: ctx.settings.messagesTimeoutMs,
          now: ctx.now,
        });
      }
    } catch (error) {
      log.warn("Message sync failed, chat kept", { shopId: shop.id, chatId, error: describeError(error) });
    }
  }

  return ok({ created, updated, messages });
}
