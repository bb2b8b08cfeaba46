import * as p from "@clack/prompts";
import { getChatListingInfo, runSyncPassFor, type SyncContext } from "@/sync";
import type { Shop, ShopSyncResult, SyncRunSummary } from "@/sync/types";
import { shopInputSchema } from "@/sync/types/api";
import { createShop, isSyncable, listShops } from "@/sync/store/shops";
import { latestRuns } from "@/sync/store/runs";

type MenuChoice = "sync" | "add" | "listing" | "runs" | "quit";

const MENU: { value: MenuChoice; label: string }[] = [
  { value: "sync", label: "Sync shops now" },
  { value: "add", label: "Add a shop" },
  { value: "listing", label: "Show a chat's listing" },
  { value: "runs", label: "Show recent sync runs" },
  { value: "quit", label: "Quit" },
];

function formatShopLine(result: ShopSyncResult): string {
  if (!result.success) return `${result.shopName}: failed (${result.error ?? "unknown error"})`;
  const parts: string[] = [];
  if (result.chatsCreated > 0) parts.push(`${result.chatsCreated} new chats`);
  if (result.chatsUpdated > 0) parts.push(`${result.chatsUpdated} updated`);
  if (result.messagesCreated > 0) parts.push(`${result.messagesCreated} new messages`);
  if (result.chatsFailed > 0) parts.push(`${result.chatsFailed} chats not stored`);
  return `${result.shopName}: ${parts.length > 0 ? parts.join(", ") : "no changes"}`;
}

function reportSummary(summary: SyncRunSummary): void {
  if (summary.shopsFailed > 0) {
    p.log.warn(`${summary.shopsSuccess} of ${summary.shopsTotal} shops synced, ${summary.shopsFailed} failed.`);
  } else {
    p.log.success(`${summary.shopsTotal} shops synced.`);
  }
  for (const shop of summary.shops) {
    p.log.message(`  ${formatShopLine(shop)}`);
  }
}

async function syncChosenShops(ctx: SyncContext, shops: Shop[]): Promise<void> {
  const eligible = shops.filter(isSyncable);
  if (eligible.length === 0) {
    p.log.warn("No active shop has credentials and a user ID yet.");
    return;
  }

  const selected = await p.multiselect({
    message: "Which shops should be synced?",
    options: eligible.map((shop) => ({ value: shop.id, label: shop.name, hint: shop.shopUrl ?? undefined })),
    initialValues: eligible.map((shop) => shop.id),
  });
  if (p.isCancel(selected)) return;

  const chosen = eligible.filter((shop) => selected.includes(shop.id));
  const spinner = p.spinner();
  spinner.start(`Syncing ${chosen.length} shop(s)...`);
  const summary = await runSyncPassFor(ctx, chosen, { mode: "interactive" });
  spinner.stop("Sync finished.");
  reportSummary(summary);
}

async function addShop(ctx: SyncContext): Promise<void> {
  const required = (v: string) => (v.trim() ? undefined : "Required");

  const name = await p.text({ message: "Shop name", validate: required });
  if (p.isCancel(name)) return;
  const shopUrl = await p.text({ message: "Public shop URL (optional)", placeholder: "https://www.avito.ru/brands/example" });
  if (p.isCancel(shopUrl)) return;
  const clientId = await p.text({ message: "API client ID", validate: required });
  if (p.isCancel(clientId)) return;
  const clientSecret = await p.password({ message: "API client secret", validate: required });
  if (p.isCancel(clientSecret)) return;
  const userId = await p.text({
    message: "Marketplace user ID",
    validate: (v) => (/^\d+$/.test(v.trim()) ? undefined : "Digits only"),
  });
  if (p.isCancel(userId)) return;

  const url = (shopUrl ?? "").trim();
  const parsed = shopInputSchema.safeParse({
    name,
    shopUrl: url ? url : undefined,
    clientId,
    clientSecret,
    userId,
  });
  if (!parsed.success) {
    p.log.error(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n"));
    return;
  }

  const shop = createShop(ctx.db, parsed.data);
  p.log.success(`Added shop "${shop.name}" (#${shop.id}).`);
}

async function showChatListing(ctx: SyncContext): Promise<void> {
  const answer = await p.text({
    message: "Local chat ID",
    validate: (v) => (/^\d+$/.test(v.trim()) ? undefined : "Digits only"),
  });
  if (p.isCancel(answer)) return;

  const info = await getChatListingInfo(ctx, Number(answer.trim()));
  if (!info) {
    p.log.warn(`No chat #${answer.trim()}.`);
    return;
  }
  p.log.info(`${info.chat.clientName}: ${info.productUrl ?? "no product URL"}`);
  if (info.itemId) p.log.message(`Item ID: ${info.itemId}`);
  if (info.listing) p.log.message(JSON.stringify(info.listing, null, 2));
}

function showRecentRuns(ctx: SyncContext): void {
  const runs = latestRuns(ctx.db, 5);
  if (runs.length === 0) {
    p.log.info("No sync runs recorded yet.");
    return;
  }
  for (const run of runs) {
    const created = run.counts.chatsCreated ?? 0;
    const updated = run.counts.chatsUpdated ?? 0;
    const failed = run.counts.shopsFailed ?? 0;
    p.log.message(`${run.startedAt} [${run.mode}] ${run.status}: ${created} created, ${updated} updated, ${failed} shops failed`);
  }
}

export async function runInteractiveSync(ctx: SyncContext): Promise<void> {
  p.intro("Marketplace chat sync");

  for (;;) {
    const shops = listShops(ctx.db);
    p.log.info(`${shops.length} shop(s) configured, ${shops.filter(isSyncable).length} ready to sync.`);

    const choice = await p.select({ message: "What would you like to do?", options: MENU });

    if (p.isCancel(choice) || choice === "quit") break;
    if (choice === "sync") await syncChosenShops(ctx, shops);
    if (choice === "add") await addShop(ctx);
    if (choice === "listing") await showChatListing(ctx);
    if (choice === "runs") showRecentRuns(ctx);
  }

  p.outro("Done!");
}
