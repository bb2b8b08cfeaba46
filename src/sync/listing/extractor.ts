import type { RawPayload, RemoteChatSource } from "@/sync/marketplace/types";
import {
  CONTEXT_STRATEGIES,
  DESCRIPTOR_STRATEGIES,
  locateDescriptor,
  type DescriptorStrategy,
  type ListingDescriptor,
} from "./strategies";
import { isAbsoluteUrl, isNumericId, normalizeProductUrl, productUrlFromId, type UrlTemplate } from "./url";
import { createChildLogger, describeError } from "@/sync/logger";

const log = createChildLogger("listing-extractor");

const URL_FIELDS = ["url", "link", "href", "value", "uri"] as const;
const FLAT_URL_ALIASES = ["item_url", "listing_url", "ad_url", "product_url"] as const;

export interface ListingContext {
  productUrl: string | null;
  /** The descriptor serialized verbatim, or null when none was found. */
  listingData: string | null;
}

export interface EscalationSource {
  remote: RemoteChatSource;
  userId: string;
  chatId: string;
  timeoutMs?: number;
}

function firstString(record: RawPayload, keys: readonly string[]): string | null {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.trim() !== "") return value;
  }
  return null;
}

function idOf(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value) && value !== 0) return String(value);
  if (typeof value === "string" && value.trim() !== "") return value.trim();
  return null;
}

function urlFromDescriptor(descriptor: ListingDescriptor, template: UrlTemplate): string | null {
  if (descriptor.kind === "text") {
    if (isAbsoluteUrl(descriptor.value)) return descriptor.value;
    if (isNumericId(descriptor.value)) return productUrlFromId(descriptor.value, template);
    if (descriptor.value.startsWith("/")) return normalizeProductUrl(descriptor.value, template);
    return null;
  }

  const direct = firstString(descriptor.value, URL_FIELDS);
  if (direct) return normalizeProductUrl(direct, template);

  const id = idOf(descriptor.value.id);
  return id ? productUrlFromId(id, template) : null;
}

/**
 * Pull the product URL and listing descriptor out of one chat payload.
 * Pure: no remote calls, no store access, never throws.
 */
export function extractListingContext(
  payload: RawPayload,
  template: UrlTemplate,
  strategies: readonly DescriptorStrategy[] = DESCRIPTOR_STRATEGIES,
): ListingContext {
  const descriptor = locateDescriptor(payload, strategies);

  let productUrl = descriptor ? urlFromDescriptor(descriptor, template) : null;
  const listingData = descriptor?.kind === "record" ? JSON.stringify(descriptor.value) : null;

  if (!productUrl) {
    const alias = firstString(payload, FLAT_URL_ALIASES);
    productUrl = alias ? normalizeProductUrl(alias, template) : null;
  }

  return { productUrl, listingData };
}

/**
 * Extract listing context, fetching the chat detail when the list payload
 * lacks the URL or the descriptor. On the detail only `context` and the flat
 * URL aliases are read. Detail values only fill gaps; a failed lookup leaves
 * whatever the list payload gave.
 */
export async function resolveListingContext(
  payload: RawPayload,
  template: UrlTemplate,
  escalation?: EscalationSource,
): Promise<ListingContext> {
  const found = extractListingContext(payload, template);
  if ((found.productUrl && found.listingData) || !escalation) {
    return found;
  }

  try {
    log.debug("Listing context incomplete, fetching chat detail", {
      chatId: escalation.chatId,
      hasUrl: found.productUrl !== null,
      hasListing: found.listingData !== null,
    });
    const detail = await escalation.remote.getChatDetail(escalation.userId, escalation.chatId, {
      timeoutMs: escalation.timeoutMs,
    });
    const fromDetail = extractListingContext(detail, template, CONTEXT_STRATEGIES);
    return {
      productUrl: found.productUrl ?? fromDetail.productUrl,
      listingData: found.listingData ?? fromDetail.listingData,
    };
  } catch (error) {
    log.warn("Chat detail lookup failed, keeping list payload context", {
      chatId: escalation.chatId,
      error: describeError(error),
    });
    return found;
  }
}
