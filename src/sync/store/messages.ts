import type { SqliteDatabase } from "./db";
import { nowIso } from "./db";
import type { Message, MessageType } from "@/sync/types";

export interface NewMessage {
  chatId: number;
  remoteMessageId: string | null;
  text: string;
  type: MessageType;
  senderName: string;
  timestamp: string;
}

interface RawMessageRow {
  id: number;
  chat_id: number;
  remote_message_id: string | null;
  message_text: string;
  message_type: string;
  sender_name: string;
  manager_id: number | null;
  is_read: number;
  timestamp: string;
  created_at: string;
}

/**
 * Insert a message unless it is already stored. Messages with a remote id are
 * matched on (chat, remote id); without one, on (chat, text, type, timestamp).
 * Returns true when a row was written.
 */
export function insertMessageIfNew(db: SqliteDatabase, message: NewMessage): boolean {
  if (message.remoteMessageId === null) {
    const existing = db.prepare(`
      SELECT id FROM messages
      WHERE chat_id = ? AND message_text = ? AND message_type = ? AND timestamp = ?
      LIMIT 1
    `).get(message.chatId, message.text, message.type, message.timestamp);
    if (existing) return false;
  }

  const info = db.prepare(`
    INSERT OR IGNORE INTO messages (chat_id, remote_message_id, message_text, message_type, sender_name, timestamp, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `).run(
    message.chatId,
    message.remoteMessageId,
    message.text,
    message.type,
    message.senderName,
    message.timestamp,
    nowIso(),
  );
  return info.changes > 0;
}

export function listMessages(db: SqliteDatabase, chatId: number): Message[] {
  const rows = db
    .prepare("SELECT * FROM messages WHERE chat_id = ? ORDER BY timestamp, id")
    .all(chatId) as RawMessageRow[];
  return rows.map(toMessage);
}

export function countMessages(db: SqliteDatabase, chatId: number): number {
  const row = db.prepare("SELECT COUNT(*) AS count FROM messages WHERE chat_id = ?").get(chatId) as { count: number };
  return row.count;
}

function toMessage(row: RawMessageRow): Message {
  return {
    id: row.id,
    chatId: row.chat_id,
    remoteMessageId: row.remote_message_id,
    text: row.message_text,
    type: row.message_type as MessageType,
    senderName: row.sender_name,
    managerId: row.manager_id,
    isRead: row.is_read === 1,
    timestamp: row.timestamp,
    createdAt: row.created_at,
  };
}
