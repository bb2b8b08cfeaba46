import { marketplaceCredentialsSchema, type MarketplaceCredentials } from "@/sync/types/api";
import type { CallOptions, ListChatsOptions, RawPayload, RemoteChatSource, TokenResponse } from "./types";
import { isRecord, unwrapList } from "./types";
import { MarketplaceApiError, MarketplacePermissionError } from "./errors";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("marketplace-client");

const DEFAULT_BASE_URL = "https://api.avito.ru";
const DEFAULT_TIMEOUT_MS = 30_000;
const TOKEN_TIMEOUT_MS = 10_000;
const MAX_PAGE_SIZE = 100;
// Refresh the token this long before the marketplace says it expires.
const TOKEN_EXPIRY_MARGIN_MS = 5 * 60_000;

export interface MarketplaceClientOptions {
  baseUrl?: string;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

export class MarketplaceClient implements RemoteChatSource {
  private baseUrl: string;
  private credentials: MarketplaceCredentials;
  private fetchImpl: typeof fetch;
  private now: () => number;
  private accessToken: string | null = null;
  private tokenExpiresAt = 0;

  constructor(credentials: MarketplaceCredentials, options: MarketplaceClientOptions = {}) {
    this.credentials = marketplaceCredentialsSchema.parse(credentials);
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.now = options.now ?? Date.now;
  }

  /** Exchange client credentials for an access token, reusing a cached one until shortly before expiry. */
  private async authenticate(): Promise<string> {
    if (this.accessToken && this.now() < this.tokenExpiresAt - TOKEN_EXPIRY_MARGIN_MS) {
      return this.accessToken;
    }

    log.debug("Requesting marketplace access token");
    const response = await this.fetchImpl(new URL("/token", this.baseUrl).toString(), {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: new URLSearchParams({
        grant_type: "client_credentials",
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
      }).toString(),
      signal: AbortSignal.timeout(TOKEN_TIMEOUT_MS),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new MarketplaceApiError(`Marketplace auth failed: ${response.status} ${body.slice(0, 200)}`, response.status, "/token");
    }

    const data = (await response.json()) as TokenResponse;
    if (!data.access_token) {
      throw new MarketplaceApiError("Marketplace auth returned no access_token", response.status, "/token");
    }
    this.accessToken = data.access_token;
    this.tokenExpiresAt = this.now() + (data.expires_in ?? 3600) * 1000;
    return this.accessToken;
  }

  /** Authenticated GET. Re-authenticates and retries once on 401. */
  private async request(path: string, params?: Record<string, string>, timeoutMs = DEFAULT_TIMEOUT_MS): Promise<unknown> {
    const url = new URL(path, this.baseUrl);
    if (params) {
      Object.entries(params).forEach(([k, v]) => url.searchParams.set(k, v));
    }

    let response = await this.send(url, timeoutMs, path);
    if (response.status === 401) {
      log.warn("Marketplace token rejected, re-authenticating", { path });
      await response.body?.cancel();
      this.accessToken = null;
      response = await this.send(url, timeoutMs, path);
    }

    if (response.status === 403) {
      const message = await errorMessage(response, "Forbidden");
      throw new MarketplacePermissionError(`403 Forbidden: ${message}`, path);
    }
    if (!response.ok) {
      const message = await errorMessage(response, response.statusText);
      throw new MarketplaceApiError(`Marketplace API error: ${response.status} ${message}`, response.status, path);
    }

    const text = await response.text();
    return text ? (JSON.parse(text) as unknown) : {};
  }

  private async send(url: URL, timeoutMs: number, path: string): Promise<Response> {
    const token = await this.authenticate();
    log.debug("Marketplace API request", { path, params: Object.fromEntries(url.searchParams) });
    try {
      return await this.fetchImpl(url.toString(), {
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: "application/json",
        },
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        throw new MarketplaceApiError(`Marketplace request timed out after ${timeoutMs}ms`, 0, path);
      }
      throw error;
    }
  }

  // --- Chats ---

  async listChats(userId: string, options: ListChatsOptions): Promise<RawPayload[]> {
    const limit = Math.min(Math.max(options.limit, 1), MAX_PAGE_SIZE);
    const offset = Math.max(options.offset, 0);
    const response = await this.request(
      `/messenger/v2/accounts/${encodeURIComponent(userId)}/chats`,
      { limit: String(limit), offset: String(offset) },
      options.timeoutMs,
    );
    return unwrapList(response, ["chats", "items"]);
  }

  /** Chat detail from the v3 API, falling back to v2 when v3 does not know the chat. */
  async getChatDetail(userId: string, chatId: string, options?: CallOptions): Promise<RawPayload> {
    const user = encodeURIComponent(userId);
    const chat = encodeURIComponent(chatId);
    const endpoints = [
      `/messenger/v3/accounts/${user}/chats/${chat}`,
      `/messenger/v2/accounts/${user}/chats/${chat}`,
    ];

    let lastError: MarketplaceApiError | null = null;
    for (const endpoint of endpoints) {
      try {
        const response = await this.request(endpoint, undefined, options?.timeoutMs);
        return isRecord(response) ? response : {};
      } catch (error) {
        if (!(error instanceof MarketplaceApiError) || error.status !== 404) {
          throw error;
        }
        log.warn("Chat detail endpoint returned 404, trying next", { endpoint });
        lastError = error;
      }
    }
    throw lastError ?? new MarketplaceApiError(`Chat ${chatId} not found`, 404, endpoints[0]);
  }

  // --- Messages ---

  async listMessages(userId: string, chatId: string, options?: CallOptions): Promise<RawPayload[]> {
    const response = await this.request(
      `/messenger/v3/accounts/${encodeURIComponent(userId)}/chats/${encodeURIComponent(chatId)}/messages/`,
      { limit: String(MAX_PAGE_SIZE), offset: "0" },
      options?.timeoutMs,
    );
    return unwrapList(response, ["messages", "items", "data"]);
  }
}

async function errorMessage(response: Response, fallback: string): Promise<string> {
  const body = await response.text();
  if (!body) return fallback;
  try {
    const parsed = JSON.parse(body) as unknown;
    if (isRecord(parsed)) {
      const message = parsed.message ?? parsed.error;
      if (typeof message === "string" && message) return message;
    }
  } catch {
    // Non-JSON error body (an HTML error page); fall through to the raw text.
  }
  return body.slice(0, 200);
}
