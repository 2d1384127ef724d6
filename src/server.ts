/**
 * HTTP Surface
 *
 * Status, health and metrics for the hosting platform, plus the Telegram
 * webhook endpoint when the relay runs in push mode.
 */

import { Hono, type Context } from "hono";
import { errorMessage } from "./errors";
import { log, logError } from "./logger";
import { renderMetrics, type RequestStats } from "./metrics";
import { SERVICE_NAME } from "./texts";
import { WEBHOOK_PATH, type TelegramTransport } from "./transport";

export type WebhookHandler = (c: Context) => Promise<Response>;

export interface ServerOptions {
  transport: Pick<TelegramTransport, "shuttingDown" | "mode">;
  stats: RequestStats;
  sessionCount: () => number;
  /** Present only in push mode. */
  webhook?: WebhookHandler;
}

export function createServer({ transport, stats, sessionCount, webhook }: ServerOptions): Hono {
  const app = new Hono();

  // Counts every request; errors are counted once the handler has failed.
  app.use("*", async (c, next) => {
    stats.recordRequest();
    await next();
    if (c.error) stats.recordError();
  });

  app.onError((err, c) => {
    logError("http_error", `${c.req.method} ${c.req.path} failed`, err);
    return c.json({ error: "Internal Server Error" }, 500);
  });

  app.get("/", (c) =>
    c.json({
      status: transport.shuttingDown ? "shutting_down" : "running",
      service: SERVICE_NAME,
      mode: transport.mode,
    }),
  );

  // HEAD is answered by the GET handler with the body stripped.
  app.get("/health", (c) => {
    if (transport.shuttingDown) return c.text("Shutting down", 503);
    return c.text("OK", 200);
  });

  app.get("/metrics", (c) => {
    const body = renderMetrics(stats.snapshot(sessionCount()));
    return c.text(body, 200, { "Content-Type": "text/plain; charset=utf-8" });
  });

  if (webhook) {
    app.post(WEBHOOK_PATH, async (c) => {
      if (transport.shuttingDown) {
        return c.json({ error: "Shutting down" }, 503);
      }

      try {
        return await webhook(c);
      } catch (err) {
        stats.recordError();
        logError("webhook_error", "Failed to process webhook update", err);
        return c.json({ error: errorMessage(err) }, 500);
      }
    });

    log("webhook_route", `Accepting updates on POST ${WEBHOOK_PATH}`, { level: "debug" });
  }

  return app;
}
