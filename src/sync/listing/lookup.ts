import type { SyncContext } from "@/sync/reconcile/context";
import type { RawPayload } from "@/sync/marketplace/types";
import { isRecord } from "@/sync/marketplace/types";
import type { Chat } from "@/sync/types";
import { getChat, updateChatFromSync } from "@/sync/store/chats";
import { getShop, isSyncable } from "@/sync/store/shops";
import { resolveListingContext } from "./extractor";
import { extractItemIdFromUrl } from "./url";
import { createChildLogger, describeError } from "@/sync/logger";

const log = createChildLogger("chat-listing");

export interface ChatListingInfo {
  chat: Chat;
  productUrl: string | null;
  itemId: string | null;
  /** The stored descriptor, when it carries at least a title or a URL. */
  listing: RawPayload | null;
}

export interface ChatListingOptions {
  /** Ask the marketplace for the chat detail when no product URL is stored. Defaults to true. */
  fetchMissing?: boolean;
}

function savedListing(listingData: string | null, chatId: number): RawPayload | null {
  if (!listingData) return null;
  try {
    const parsed: unknown = JSON.parse(listingData);
    if (isRecord(parsed) && (parsed.title || parsed.url)) return parsed;
    log.debug("Stored listing data has neither title nor url", { chatId });
  } catch (error) {
    log.warn("Stored listing data is not valid JSON", { chatId, error: describeError(error) });
  }
  return null;
}

/**
 * Listing context of a stored chat: its product URL, the item id recovered
 * from that URL, and the saved descriptor. A chat without a product URL gets
 * one from the chat detail when its shop can be reached; a URL found that way
 * is written back.
 */
export async function getChatListingInfo(
  ctx: SyncContext,
  chatId: number,
  options: ChatListingOptions = {},
): Promise<ChatListingInfo | null> {
  let chat = getChat(ctx.db, chatId);
  if (!chat) return null;

  let productUrl = chat.productUrl?.trim() || null;

  if (!productUrl && (options.fetchMissing ?? true)) {
    const shop = getShop(ctx.db, chat.shopId);
    if (shop && isSyncable(shop)) {
      try {
        const found = await resolveListingContext(
          {},
          { siteUrl: ctx.settings.siteUrl, shopUrl: shop.shopUrl },
          {
            remote: ctx.connect(shop),
            userId: shop.userId,
            chatId: chat.remoteChatId,
            timeoutMs: ctx.settings.detailTimeoutMs,
          },
        );
        if (found.productUrl) {
          updateChatFromSync(ctx.db, chat.id, {
            productUrl: found.productUrl,
            listingData: chat.listingData ? undefined : found.listingData ?? undefined,
          });
          chat = getChat(ctx.db, chatId) ?? chat;
          productUrl = found.productUrl;
        }
      } catch (error) {
        log.warn("Could not look up product URL for chat", { chatId, error: describeError(error) });
      }
    }
  }

  return {
    chat,
    productUrl,
    itemId: extractItemIdFromUrl(productUrl),
    listing: savedListing(chat.listingData, chat.id),
  };
}
