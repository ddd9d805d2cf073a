import * as Sentry from "@sentry/node";

let enabled = false;

/**
 * Initialize Sentry error tracking
 * Should be called before any other code runs
 */
export function initSentry(dsn = process.env.SENTRY_DSN): boolean {
  if (!dsn) {
    console.warn("⚠️ SENTRY_DSN not set - error tracking disabled");
    return false;
  }

  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV || "development",
    release: "golden-ticket-engine@1.0.0",
    tracesSampleRate: process.env.NODE_ENV === "production" ? 0.1 : 1.0,

    beforeSend(event) {
      if (event.request?.headers) {
        delete event.request.headers["authorization"];
      }
      if (event.extra && "authToken" in event.extra) {
        event.extra.authToken = "[REDACTED]";
      }
      return event;
    },

    // Expected user-facing conditions
    ignoreErrors: ["AuthRequiredError"],
  });

  enabled = true;
  console.log("✅ Sentry error tracking initialized");
  return true;
}

/**
 * Capture an exception with additional context
 */
export function captureError(
  error: unknown,
  context?: {
    tags?: Record<string, string>;
    extra?: Record<string, unknown>;
    userId?: number;
  },
): void {
  if (!enabled) return;

  if (context?.userId !== undefined) {
    Sentry.setUser({ id: String(context.userId) });
  }

  Sentry.captureException(error, {
    tags: context?.tags,
    extra: context?.extra,
  });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!enabled) return;
  await Sentry.close(timeoutMs);
}
