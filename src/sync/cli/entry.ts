import { config } from "dotenv";
config({ path: ".env.local" });

import { runInteractiveSync } from "./interactive";
import { createSyncContext, runSyncPass, startSyncLoop } from "@/sync";
import { getEnv } from "@/sync/config/env";
import { closeDatabase, getDatabase } from "@/sync/store/db";
import { createChildLogger, describeError, logger } from "@/sync/logger";

const log = createChildLogger("cli");

const args = process.argv.slice(2);
const once = args.includes("--once");
const loop = args.includes("--loop") || (!once && !process.stdin.isTTY);

async function main() {
  const env = getEnv();
  logger.level = env.SYNC_LOG_LEVEL;
  const db = getDatabase(env.SYNC_DB_PATH);
  const ctx = createSyncContext(db, env);

  if (once) {
    // Headless one-shot: a single pass, summary on stdout
    const summary = await runSyncPass(ctx, { mode: "once" });
    console.log(JSON.stringify(summary, null, 2));
  } else if (loop) {
    const controller = new AbortController();
    const stop = () => {
      log.info("Stop requested, finishing current pass");
      controller.abort();
    };
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);

    await startSyncLoop(ctx, {
      intervalMs: env.SYNC_INTERVAL_SECONDS * 1000,
      signal: controller.signal,
    });
  } else {
    await runInteractiveSync(ctx);
  }

  closeDatabase();
}

main().catch((err: unknown) => {
  console.error("Sync failed:", describeError(err));
  closeDatabase();
  process.exit(1);
});
