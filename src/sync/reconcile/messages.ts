import type { SqliteDatabase } from "@/sync/store/db";
import type { RawPayload, RemoteChatSource } from "@/sync/marketplace/types";
import { isRecord } from "@/sync/marketplace/types";
import type { Chat, MessageType, SyncableShop } from "@/sync/types";
import { insertMessageIfNew, listMessages, type NewMessage } from "@/sync/store/messages";
import { updateResponseTimer } from "@/sync/store/chats";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("message-reconciler");

export const SHOP_SENDER_NAME = "Shop";

export interface MessageSyncOptions {
  timeoutMs?: number;
  now?: () => Date;
}

function scalarText(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

/** Message text from any of the shapes the messenger API has used. */
export function extractMessageText(message: RawPayload): string {
  const text = scalarText(message.text);
  if (text) return text;

  const content = message.content;
  if (isRecord(content)) {
    const nested = scalarText(content.text) || scalarText(content.message);
    if (nested) return nested;
  } else if (scalarText(content)) {
    return scalarText(content);
  }

  const inner = message.message;
  if (isRecord(inner)) {
    return scalarText(inner.text) || scalarText(inner.content);
  }
  return scalarText(inner);
}

export function messageDirection(message: RawPayload, shopUserId: string): MessageType {
  if (typeof message.direction === "string") {
    return message.direction.toLowerCase() === "out" ? "outgoing" : "incoming";
  }
  if ("author_id" in message && message.author_id !== null && message.author_id !== undefined) {
    return String(message.author_id) === shopUserId ? "outgoing" : "incoming";
  }
  const author = isRecord(message.author) ? message.author : isRecord(message.from) ? message.from : null;
  if (author && author.id !== undefined && author.id !== null && String(author.id) !== "") {
    return String(author.id) === shopUserId ? "outgoing" : "incoming";
  }
  return "incoming";
}

function fromUnixSeconds(seconds: number): string | null {
  const date = new Date(seconds * 1000);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

/**
 * Normalize a message timestamp to ISO 8601 UTC. Numbers and numeric strings
 * are Unix seconds; ISO strings without an offset are read as UTC.
 */
export function normalizeTimestamp(raw: unknown, now: () => Date = () => new Date()): string {
  if (typeof raw === "number" && Number.isFinite(raw)) {
    return fromUnixSeconds(raw) ?? now().toISOString();
  }
  if (typeof raw === "string" && raw.trim() !== "") {
    const value = raw.trim();
    if (/^\d+(\.\d+)?$/.test(value)) {
      return fromUnixSeconds(Number(value)) ?? now().toISOString();
    }
    if (value.includes("T")) {
      const hasZone = /(Z|[+-]\d{2}:?\d{2})$/i.test(value);
      const parsed = new Date(hasZone ? value : `${value}Z`);
      if (!Number.isNaN(parsed.getTime())) return parsed.toISOString();
    }
  }
  return now().toISOString();
}

function remoteMessageId(message: RawPayload): string | null {
  const id = message.id;
  if (typeof id === "number" && Number.isFinite(id)) return String(id);
  if (typeof id === "string" && id.trim() !== "") return id.trim();
  return null;
}

/**
 * Minutes since the newest incoming message that arrived after the newest
 * outgoing one; 0 when the client has been answered.
 */
export function responseTimerMinutes(
  messages: Array<{ type: MessageType; timestamp: string }>,
  now: Date,
): number {
  let lastOutgoing = "";
  let lastIncoming = "";
  for (const message of messages) {
    if (message.type === "outgoing" && message.timestamp > lastOutgoing) lastOutgoing = message.timestamp;
    if (message.type === "incoming" && message.timestamp > lastIncoming) lastIncoming = message.timestamp;
  }
  if (!lastIncoming || lastIncoming <= lastOutgoing) return 0;

  const since = new Date(lastIncoming).getTime();
  if (Number.isNaN(since)) return 0;
  return Math.max(0, Math.floor((now.getTime() - since) / 60_000));
}

/**
 * Append the chat's remote messages that are not stored yet. Returns the
 * number of rows inserted. Remote and store errors propagate to the caller.
 */
export async function reconcileMessages(
  db: SqliteDatabase,
  chat: Chat,
  shop: SyncableShop,
  remote: RemoteChatSource,
  options: MessageSyncOptions = {},
): Promise<number> {
  const now = options.now ?? (() => new Date());
  const remoteMessages = await remote.listMessages(shop.userId, chat.remoteChatId, {
    timeoutMs: options.timeoutMs,
  });

  const batch: NewMessage[] = [];
  let skipped = 0;
  for (const message of remoteMessages) {
    const text = extractMessageText(message);
    if (!text.trim()) {
      skipped++;
      continue;
    }
    const type = messageDirection(message, shop.userId);
    batch.push({
      chatId: chat.id,
      remoteMessageId: remoteMessageId(message),
      text,
      type,
      senderName: type === "outgoing" ? SHOP_SENDER_NAME : chat.clientName,
      timestamp: normalizeTimestamp(message.created ?? message.created_at ?? message.timestamp, now),
    });
  }

  const inserted = db.transaction(() => {
    let count = 0;
    for (const message of batch) {
      if (insertMessageIfNew(db, message)) count++;
    }
    updateResponseTimer(db, chat.id, responseTimerMinutes(listMessages(db, chat.id), now()));
    return count;
  })();

  log.debug("Messages reconciled", {
    chatId: chat.id,
    received: remoteMessages.length,
    inserted,
    skipped,
  });
  return inserted;
}
