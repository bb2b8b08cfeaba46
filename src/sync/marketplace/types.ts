/** A JSON object as the marketplace returns it. Shapes vary between API revisions. */
export type RawPayload = Record<string, unknown>;

export interface ListChatsOptions {
  limit: number;
  offset: number;
  timeoutMs?: number;
}

export interface CallOptions {
  timeoutMs?: number;
}

/**
 * What the sync pipeline needs from the marketplace. `MarketplaceClient`
 * implements it over HTTP; tests hand in an in-memory fake.
 */
export interface RemoteChatSource {
  listChats(userId: string, options: ListChatsOptions): Promise<RawPayload[]>;
  getChatDetail(userId: string, chatId: string, options?: CallOptions): Promise<RawPayload>;
  listMessages(userId: string, chatId: string, options?: CallOptions): Promise<RawPayload[]>;
}

export interface TokenResponse {
  access_token: string;
  expires_in?: number;
}

export function isRecord(value: unknown): value is RawPayload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Pull the item array out of a list response: a bare array or one of the known envelope keys. */
export function unwrapList(response: unknown, keys: readonly string[]): RawPayload[] {
  let items: unknown = response;
  if (isRecord(response)) {
    const key = keys.find((k) => Array.isArray(response[k]));
    items = key ? response[key] : [];
  }
  return Array.isArray(items) ? items.filter(isRecord) : [];
}
