import * as Sentry from "@sentry/node";

let sentryEnabled = false;

/**
 * Initialize Sentry when a DSN is configured. Without one every helper
 * below is a no-op.
 */
export function initSentry(dsn: string | null) {
  if (!dsn) return;

  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV ?? "development",
    tracesSampleRate: 0,
  });
  sentryEnabled = true;
}

/**
 * Add a breadcrumb for tracking the run.
 * Useful for debugging what led up to an error.
 */
export function addBreadcrumb(
  category: string,
  message: string,
  data?: Record<string, unknown>
) {
  if (!sentryEnabled) return;

  Sentry.addBreadcrumb({
    category,
    message,
    data,
    level: "info",
  });
}

export function captureError(error: unknown, extra?: Record<string, unknown>) {
  if (!sentryEnabled) return;
  Sentry.captureException(error, { extra });
}

/**
 * Wait for queued events to be sent before the process exits
 */
export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!sentryEnabled) return;
  await Sentry.flush(timeoutMs);
}
