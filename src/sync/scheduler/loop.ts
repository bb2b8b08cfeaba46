import { setTimeout as sleep } from "timers/promises";
import type { SyncContext } from "@/sync/reconcile/context";
import { syncAllShops } from "@/sync/reconcile/shops";
import type { SyncRunSummary } from "@/sync/types";
import { createChildLogger, describeError } from "@/sync/logger";

const log = createChildLogger("scheduler");

export interface LoopOptions {
  intervalMs: number;
  signal?: AbortSignal;
  /** Stop after this many passes. Unbounded when omitted. */
  maxPasses?: number;
  onPass?: (summary: SyncRunSummary) => void;
  runPass?: (ctx: SyncContext) => Promise<SyncRunSummary>;
}

/**
 * Run sync passes back to back with `intervalMs` of idle time between them.
 * A pass always finishes before the wait starts, so passes never overlap.
 * Resolves with the number of passes run once the signal aborts.
 */
export async function runSyncLoop(ctx: SyncContext, options: LoopOptions): Promise<number> {
  const runPass = options.runPass ?? ((c: SyncContext) => syncAllShops(c, { mode: "loop" }));
  let passes = 0;

  log.info("Sync loop started", { intervalSeconds: Math.round(options.intervalMs / 1000) });

  while (!options.signal?.aborted) {
    try {
      const summary = await runPass(ctx);
      options.onPass?.(summary);
    } catch (error) {
      log.error("Sync pass crashed", { error: describeError(error) });
    }
    passes++;

    if (options.maxPasses !== undefined && passes >= options.maxPasses) break;

    log.info("Next sync scheduled", { inSeconds: Math.round(options.intervalMs / 1000) });
    try {
      await sleep(options.intervalMs, undefined, { signal: options.signal });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") break;
      throw error;
    }
  }

  log.info("Sync loop stopped", { passes });
  return passes;
}
