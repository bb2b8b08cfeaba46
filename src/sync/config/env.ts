import { z } from "zod";

const envSchema = z.object({
  SYNC_DB_PATH: z.string().min(1).default("./crm_sync.db"),

  SYNC_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error"])
    .default("info"),

  MARKETPLACE_API_URL: z.string().url().default("https://api.avito.ru"),
  MARKETPLACE_SITE_URL: z.string().url().default("https://www.avito.ru"),

  SYNC_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
  SYNC_CHAT_PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(100),

  // Per-call remote timeouts. Listing is the slow one; detail lookups stay short.
  SYNC_LIST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SYNC_DETAIL_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  SYNC_MESSAGES_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export type SyncEnv = z.infer<typeof envSchema>;

let _env: SyncEnv | null = null;

export function parseEnv(source: NodeJS.ProcessEnv): SyncEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const invalid = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(
      `Sync environment validation failed:\n${invalid}\n\nCopy .env.example to .env.local and fix the values.`
    );
  }
  return result.data;
}

export function getEnv(): SyncEnv {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
