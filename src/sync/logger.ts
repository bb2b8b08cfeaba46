import winston from "winston";

const isProduction = process.env.NODE_ENV === "production";

const consoleLine = winston.format.printf(({ timestamp, level, message, context, stack, ...rest }) => {
  const ctx = context ? `[${context}]` : "";
  const extra = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : "";
  const trace = typeof stack === "string" ? `\n${stack}` : "";
  return `${timestamp} ${level} ${ctx} ${message}${extra}${trace}`;
});

export const logger = winston.createLogger({
  level: process.env.SYNC_LOG_LEVEL || "info",
  // Silent under the test runner.
  silent: process.env.NODE_ENV === "test",
  format: isProduction
    ? winston.format.combine(
        winston.format.errors({ stack: true }),
        winston.format.timestamp(),
        winston.format.json()
      )
    : winston.format.combine(
        winston.format.errors({ stack: true }),
        winston.format.timestamp({ format: "HH:mm:ss" }),
        winston.format.colorize(),
        consoleLine
      ),
  transports: [new winston.transports.Console()],
});

export type SyncLogger = winston.Logger;

/** Child logger tagged with the module it logs for, e.g. `[chat-reconciler]`. */
export function createChildLogger(context: string): SyncLogger {
  return logger.child({ context });
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
