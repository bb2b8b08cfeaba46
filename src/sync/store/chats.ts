import type { SqliteDatabase } from "./db";
import { nowIso } from "./db";
import type { Chat, ChatPriority, ChatStatus } from "@/sync/types";

/**
 * Fields the sync pipeline owns on a chat row. `undefined` means "not known
 * from this payload" and leaves the stored value alone on update.
 */
export interface ChatSyncFields {
  lastMessage?: string;
  clientName?: string;
  customerId?: string | null;
  unreadCount?: number;
  productUrl?: string;
  listingData?: string;
}

const SYNC_COLUMNS: Record<keyof ChatSyncFields, string> = {
  lastMessage: "last_message",
  clientName: "client_name",
  customerId: "customer_id",
  unreadCount: "unread_count",
  productUrl: "product_url",
  listingData: "listing_data",
};

export const DEFAULT_CLIENT_NAME = "Client";

interface RawChatRow {
  id: number;
  shop_id: number;
  remote_chat_id: string;
  client_name: string;
  client_phone: string | null;
  customer_id: string | null;
  last_message: string;
  unread_count: number;
  status: string;
  priority: string;
  response_timer: number;
  assigned_manager_id: number | null;
  product_url: string | null;
  listing_data: string | null;
  created_at: string;
  updated_at: string;
}

export function findChat(db: SqliteDatabase, shopId: number, remoteChatId: string): Chat | undefined {
  const row = db
    .prepare("SELECT * FROM chats WHERE shop_id = ? AND remote_chat_id = ?")
    .get(shopId, remoteChatId) as RawChatRow | undefined;
  return row ? toChat(row) : undefined;
}

export function getChat(db: SqliteDatabase, id: number): Chat | undefined {
  const row = db.prepare("SELECT * FROM chats WHERE id = ?").get(id) as RawChatRow | undefined;
  return row ? toChat(row) : undefined;
}

export function listChatsForShop(db: SqliteDatabase, shopId: number): Chat[] {
  const rows = db
    .prepare("SELECT * FROM chats WHERE shop_id = ? ORDER BY id")
    .all(shopId) as RawChatRow[];
  return rows.map(toChat);
}

/** Insert a chat seen for the first time. Status and priority only ever get set here. */
export function insertChat(
  db: SqliteDatabase,
  shopId: number,
  remoteChatId: string,
  fields: ChatSyncFields,
): number {
  const now = nowIso();
  const info = db.prepare(`
    INSERT INTO chats (
      shop_id, remote_chat_id, client_name, customer_id, last_message, unread_count,
      status, priority, product_url, listing_data, created_at, updated_at
    )
    VALUES (?, ?, ?, ?, ?, ?, 'active', 'new', ?, ?, ?, ?)
  `).run(
    shopId,
    remoteChatId,
    fields.clientName ?? DEFAULT_CLIENT_NAME,
    fields.customerId ?? null,
    fields.lastMessage ?? "",
    fields.unreadCount ?? 0,
    fields.productUrl ?? null,
    fields.listingData ?? null,
    now,
    now,
  );
  return Number(info.lastInsertRowid);
}

/** Overwrite the sync-owned fields that are present and refresh `updated_at`. */
export function updateChatFromSync(db: SqliteDatabase, id: number, fields: ChatSyncFields): void {
  const assignments: string[] = [];
  const values: Array<string | number | null> = [];

  for (const key of Object.keys(SYNC_COLUMNS) as Array<keyof ChatSyncFields>) {
    const value = fields[key];
    if (value === undefined) continue;
    assignments.push(`${SYNC_COLUMNS[key]} = ?`);
    values.push(value);
  }

  assignments.push("updated_at = ?");
  values.push(nowIso());

  db.prepare(`UPDATE chats SET ${assignments.join(", ")} WHERE id = ?`).run(...values, id);
}

export function updateResponseTimer(db: SqliteDatabase, id: number, minutes: number): void {
  db.prepare("UPDATE chats SET response_timer = ? WHERE id = ?").run(minutes, id);
}

/** Operator action. The sync pipeline never calls this. */
export function setChatStatus(db: SqliteDatabase, id: number, status: ChatStatus): void {
  db.prepare("UPDATE chats SET status = ?, updated_at = ? WHERE id = ?").run(status, nowIso(), id);
}

function toChat(row: RawChatRow): Chat {
  return {
    id: row.id,
    shopId: row.shop_id,
    remoteChatId: row.remote_chat_id,
    clientName: row.client_name,
    clientPhone: row.client_phone,
    customerId: row.customer_id,
    lastMessage: row.last_message,
    unreadCount: row.unread_count,
    status: row.status as ChatStatus,
    priority: row.priority as ChatPriority,
    responseTimer: row.response_timer,
    assignedManagerId: row.assigned_manager_id,
    productUrl: row.product_url,
    listingData: row.listing_data,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
