import type { SqliteDatabase } from "./db";
import { nowIso } from "./db";
import type { Listing, ListingStatus } from "@/sync/types";
import { listingInputSchema, type ListingInput } from "@/sync/types/api";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("listings");

interface RawListingRow {
  id: number;
  listing_id: string;
  title: string;
  price: number;
  url: string;
  image_url: string;
  location: string;
  description: string;
  category: string;
  status: string;
  notes: string | null;
  assigned_manager_id: number | null;
  created_at: string;
  updated_at: string;
}

export interface ListingFilter {
  status?: ListingStatus;
  assignedManagerId?: number;
  limit?: number;
  offset?: number;
}

/** Save a search result. A listing id seen before returns the existing row id untouched. */
export function saveListing(db: SqliteDatabase, input: ListingInput): number {
  const listing = listingInputSchema.parse(input);

  const existing = db
    .prepare("SELECT id FROM listings WHERE listing_id = ?")
    .get(listing.listingId) as { id: number } | undefined;
  if (existing) {
    log.debug("Listing already saved", { listingId: listing.listingId, id: existing.id });
    return existing.id;
  }

  const now = nowIso();
  const info = db.prepare(`
    INSERT INTO listings (listing_id, title, price, url, image_url, location, description, category, status, created_at, updated_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, 'new', ?, ?)
  `).run(
    listing.listingId,
    listing.title,
    listing.price,
    listing.url,
    listing.imageUrl,
    listing.location,
    listing.description,
    listing.category,
    now,
    now,
  );
  return Number(info.lastInsertRowid);
}

export function getListing(db: SqliteDatabase, id: number): Listing | undefined {
  const row = db.prepare("SELECT * FROM listings WHERE id = ?").get(id) as RawListingRow | undefined;
  return row ? toListing(row) : undefined;
}

export function listListings(db: SqliteDatabase, filter: ListingFilter = {}): Listing[] {
  const where: string[] = [];
  const params: Array<string | number> = [];

  if (filter.status) {
    where.push("status = ?");
    params.push(filter.status);
  }
  if (filter.assignedManagerId !== undefined) {
    where.push("assigned_manager_id = ?");
    params.push(filter.assignedManagerId);
  }

  const clause = where.length ? `WHERE ${where.join(" AND ")}` : "";
  const rows = db
    .prepare(`SELECT * FROM listings ${clause} ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?`)
    .all(...params, filter.limit ?? 50, filter.offset ?? 0) as RawListingRow[];
  return rows.map(toListing);
}

export function updateListingStatus(
  db: SqliteDatabase,
  id: number,
  status: ListingStatus,
  notes?: string,
): boolean {
  const info = notes
    ? db.prepare("UPDATE listings SET status = ?, notes = ?, updated_at = ? WHERE id = ?").run(status, notes, nowIso(), id)
    : db.prepare("UPDATE listings SET status = ?, updated_at = ? WHERE id = ?").run(status, nowIso(), id);
  return info.changes > 0;
}

function toListing(row: RawListingRow): Listing {
  return {
    id: row.id,
    listingId: row.listing_id,
    title: row.title,
    price: row.price,
    url: row.url,
    imageUrl: row.image_url,
    location: row.location,
    description: row.description,
    category: row.category,
    status: row.status as ListingStatus,
    notes: row.notes,
    assignedManagerId: row.assigned_manager_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
