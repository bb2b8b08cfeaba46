import type { RawPayload } from "@/sync/marketplace/types";
import { isRecord } from "@/sync/marketplace/types";

/**
 * Where a listing descriptor was found. The messenger API moved the item
 * context from `context.item` to `context.value` between revisions, and some
 * payloads carry it at the top level.
 */
export type DescriptorSource =
  | "context.value"
  | "context.item"
  | "context.listing"
  | "context.ad"
  | "item"
  | "listing"
  | "ad";

export type ListingDescriptor =
  | { kind: "record"; source: DescriptorSource; value: RawPayload }
  | { kind: "text"; source: DescriptorSource; value: string };

export interface DescriptorStrategy {
  source: DescriptorSource;
  applies(payload: RawPayload): boolean;
  locate(payload: RawPayload): unknown;
}

function fromContext(key: "value" | "item" | "listing" | "ad"): DescriptorStrategy {
  return {
    source: `context.${key}`,
    applies: (payload) => isRecord(payload.context),
    locate: (payload) => (isRecord(payload.context) ? payload.context[key] : undefined),
  };
}

function fromTopLevel(key: "item" | "listing" | "ad"): DescriptorStrategy {
  return {
    source: key,
    applies: (payload) => !isRecord(payload.context),
    locate: (payload) => payload[key],
  };
}

/** Tried in order; the first one that yields a usable descriptor wins. */
export const DESCRIPTOR_STRATEGIES: readonly DescriptorStrategy[] = [
  fromContext("value"),
  fromContext("item"),
  fromContext("listing"),
  fromContext("ad"),
  fromTopLevel("item"),
  fromTopLevel("listing"),
  fromTopLevel("ad"),
];

/** Only the `context` entries; used on chat detail payloads. */
export const CONTEXT_STRATEGIES: readonly DescriptorStrategy[] = DESCRIPTOR_STRATEGIES.filter((s) =>
  s.source.startsWith("context."),
);

export function toDescriptor(value: unknown, source: DescriptorSource): ListingDescriptor | null {
  // A bare number is an item id; 0 means no item.
  if (typeof value === "number" && Number.isFinite(value) && value !== 0) {
    return { kind: "text", source, value: String(value) };
  }
  if (isRecord(value) && Object.keys(value).length > 0) {
    return { kind: "record", source, value };
  }
  if (typeof value === "string" && value.trim() !== "") {
    return { kind: "text", source, value: value.trim() };
  }
  return null;
}

export function locateDescriptor(
  payload: RawPayload,
  strategies: readonly DescriptorStrategy[] = DESCRIPTOR_STRATEGIES,
): ListingDescriptor | null {
  for (const strategy of strategies) {
    if (!strategy.applies(payload)) continue;
    const descriptor = toDescriptor(strategy.locate(payload), strategy.source);
    if (descriptor) return descriptor;
  }
  return null;
}
