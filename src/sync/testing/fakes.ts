import type { SqliteDatabase } from "@/sync/store/db";
import { openDatabase } from "@/sync/store/db";
import { createShop } from "@/sync/store/shops";
import type { CallOptions, ListChatsOptions, RawPayload, RemoteChatSource } from "@/sync/marketplace/types";
import type { SyncContext } from "@/sync/reconcile/context";
import { DEFAULT_SETTINGS } from "@/sync/reconcile/context";
import type { SyncableShop } from "@/sync/types";
import { isSyncable } from "@/sync/store/shops";

/** In-memory marketplace: chat lists, details and messages keyed by chat id. */
export class FakeRemote implements RemoteChatSource {
  chats: RawPayload[] = [];
  details = new Map<string, RawPayload>();
  messages = new Map<string, RawPayload[]>();
  listError: Error | null = null;
  detailError: Error | null = null;
  messagesError: Error | null = null;
  calls = { listChats: 0, getChatDetail: 0, listMessages: 0 };
  lastListOptions: ListChatsOptions | null = null;

  async listChats(_userId: string, options: ListChatsOptions): Promise<RawPayload[]> {
    this.calls.listChats++;
    this.lastListOptions = options;
    if (this.listError) throw this.listError;
    return this.chats;
  }

  async getChatDetail(_userId: string, chatId: string, _options?: CallOptions): Promise<RawPayload> {
    this.calls.getChatDetail++;
    if (this.detailError) throw this.detailError;
    return this.details.get(chatId) ?? {};
  }

  async listMessages(_userId: string, chatId: string, _options?: CallOptions): Promise<RawPayload[]> {
    this.calls.listMessages++;
    if (this.messagesError) throw this.messagesError;
    return this.messages.get(chatId) ?? [];
  }
}

export function seedShop(
  db: SqliteDatabase,
  overrides: { name?: string; shopUrl?: string; userId?: string } = {},
): SyncableShop {
  const shop = createShop(db, {
    name: overrides.name ?? "Acme",
    shopUrl: overrides.shopUrl,
    clientId: "test-client",
    clientSecret: "test-secret",
    userId: overrides.userId ?? "1000",
  });
  if (!isSyncable(shop)) throw new Error("seeded shop is not syncable");
  return shop;
}

/** A context over a fresh in-memory store. `remotes` maps shop ids to their fake marketplace. */
export function testContext(remotes = new Map<number, RemoteChatSource>()): SyncContext {
  return {
    db: openDatabase(":memory:"),
    settings: DEFAULT_SETTINGS,
    connect(shop) {
      const remote = remotes.get(shop.id);
      if (!remote) throw new Error(`no fake remote for shop ${shop.id}`);
      return remote;
    },
    now: () => new Date("2024-05-01T12:00:00Z"),
  };
}
