export interface Shop {
  id: number;
  name: string;
  shopUrl: string | null;
  clientId: string | null;
  clientSecret: string | null;
  userId: string | null;
  isActive: boolean;
  createdAt: string;
}

/** A shop that passed the eligibility filter: active, with credentials and a remote user id. */
export interface SyncableShop extends Shop {
  clientId: string;
  clientSecret: string;
  userId: string;
}

export type ChatStatus = "active" | "completed" | "archived";
export type ChatPriority = "urgent" | "new" | "active" | "waiting" | "delivery";

export interface Chat {
  id: number;
  shopId: number;
  remoteChatId: string;
  clientName: string;
  clientPhone: string | null;
  customerId: string | null;
  lastMessage: string;
  unreadCount: number;
  status: ChatStatus;
  priority: ChatPriority;
  responseTimer: number;
  assignedManagerId: number | null;
  productUrl: string | null;
  listingData: string | null;
  createdAt: string;
  updatedAt: string;
}

export type MessageType = "incoming" | "outgoing";

export interface Message {
  id: number;
  chatId: number;
  remoteMessageId: string | null;
  text: string;
  type: MessageType;
  senderName: string;
  managerId: number | null;
  isRead: boolean;
  timestamp: string;
  createdAt: string;
}

export type ListingStatus = "new" | "in_work" | "sold" | "archived";

export interface Listing {
  id: number;
  listingId: string;
  title: string;
  price: number;
  url: string;
  imageUrl: string;
  location: string;
  description: string;
  category: string;
  status: ListingStatus;
  notes: string | null;
  assignedManagerId: number | null;
  createdAt: string;
  updatedAt: string;
}

// --- Sync results ---

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export type FailureKind = "permission" | "transient" | "store";

export interface SyncFailure {
  kind: FailureKind;
  detail: string;
}

export interface ChatSyncCounts {
  created: number;
  updated: number;
  messages: number;
}

export interface ShopSyncResult {
  shopId: number;
  shopName: string;
  success: boolean;
  chatsCreated: number;
  chatsUpdated: number;
  chatsFailed: number;
  messagesCreated: number;
  error: string | null;
  errorKind: FailureKind | null;
}

export type SyncMode = "loop" | "once" | "interactive";

export interface SyncRunSummary {
  runId: string;
  mode: SyncMode;
  startedAt: string;
  completedAt: string;
  shopsTotal: number;
  shopsSuccess: number;
  shopsFailed: number;
  chatsCreated: number;
  chatsUpdated: number;
  chatsFailed: number;
  messagesCreated: number;
  shops: ShopSyncResult[];
}
