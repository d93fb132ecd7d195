import * as Sentry from "@sentry/node";

let enabled = false;

export function initSentry(dsn?: string) {
  if (!dsn || enabled) return;
  Sentry.init({ dsn, tracesSampleRate: 0.1 });
  enabled = true;
}

export function reportError(err: unknown, context: { requestId?: string; path?: string } = {}) {
  if (!enabled) return;
  Sentry.withScope((scope) => {
    if (context.requestId) scope.setTag("request_id", context.requestId);
    if (context.path) scope.setTag("path", context.path);
    Sentry.captureException(err);
  });
}
