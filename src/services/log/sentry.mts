import * as Sentry from "@sentry/node";
import type { Env } from "../../config.mjs";

/**
 * Initialises the Sentry SDK when a DSN is configured. Returns whether Sentry is active.
 */
export function initSentry(env: Pick<Env, "MODE" | "SENTRY_DSN">): boolean {
  if (env.SENTRY_DSN === undefined) {
    return false;
  }

  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.MODE,
    sendDefaultPii: false,
    tracesSampleRate: env.MODE === "production" ? 0.1 : 1.0,
  });

  return true;
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  await Sentry.flush(timeoutMs);
}
