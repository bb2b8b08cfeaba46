import type { SyncFailure } from "@/sync/types";
import { describeError } from "@/sync/logger";

export class MarketplaceApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly endpoint: string,
  ) {
    super(message);
    this.name = "MarketplaceApiError";
  }
}

/** 403 from the marketplace: the account's plan does not include the endpoint. */
export class MarketplacePermissionError extends MarketplaceApiError {
  constructor(message: string, endpoint: string) {
    super(message, 403, endpoint);
    this.name = "MarketplacePermissionError";
  }
}

export const PERMISSION_HINT = "Permission denied: messenger access requires a Pro or Max plan";

export function isPermissionError(error: unknown): boolean {
  if (error instanceof MarketplacePermissionError) return true;
  const message = describeError(error);
  return message.includes("403") || message.toLowerCase().includes("permission denied");
}

export function classifyRemoteError(error: unknown): SyncFailure {
  if (isPermissionError(error)) {
    return { kind: "permission", detail: PERMISSION_HINT };
  }
  return { kind: "transient", detail: describeError(error) };
}
