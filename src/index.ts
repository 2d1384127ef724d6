/**
 * Telegram Completion Relay
 *
 * Relays Telegram chats to a hosted chat-completion model and serves
 * status, health and metrics over HTTP.
 *
 * Run: npm start
 */

import "dotenv/config";
import { serve } from "@hono/node-server";
import { Bot } from "grammy";
import { createWebhookHandler, registerRelayHandlers, WEBHOOK_SEND_MARGIN_MS } from "./bot";
import { CompletionGateway } from "./completion";
import { loadConfig, loadSystemPrompt } from "./config";
import { AppError } from "./errors";
import { HistoryStore } from "./history";
import { log, logError } from "./logger";
import { RequestStats } from "./metrics";
import { MessageRelay } from "./relay";
import { createServer } from "./server";
import { TelegramTransport } from "./transport";

async function main(): Promise<void> {
  const config = loadConfig();
  const systemPrompt = await loadSystemPrompt(config.systemPromptFile);

  const bot = new Bot(config.botToken);
  const history = new HistoryStore({ limit: config.historyLimit });
  const relay = new MessageRelay({
    history,
    gateway: new CompletionGateway(config.completion),
    sender: bot.api,
    systemPrompt,
    chunkDelayMs: config.chunkDelayMs,
  });
  registerRelayHandlers(bot, relay);

  const transport = new TelegramTransport({
    bot,
    webhookUrl: config.webhookUrl,
    webhookSecret: config.webhookSecret,
  });

  const app = createServer({
    transport,
    stats: new RequestStats(),
    sessionCount: () => history.sessionCount(),
    webhook:
      transport.mode === "push"
        ? createWebhookHandler(bot, {
            secretToken: config.webhookSecret,
            timeoutMs: config.completion.timeoutMs + WEBHOOK_SEND_MARGIN_MS,
          })
        : undefined,
  });

  const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (info) => {
    log("server_listening", `HTTP server on ${config.host}:${info.port}`);
  });

  // Both signals funnel into the transport's single-shot stop().
  const shutdown = async (signal: NodeJS.Signals) => {
    if (transport.shuttingDown) return;
    log("shutdown_signal", `Received ${signal}, shutting down`);

    await transport.stop();
    server.close((err) => {
      if (err) logError("server_close_error", "HTTP server did not close cleanly", err);
      log("relay_stopped", "Relay stopped");
      process.exit(0);
    });
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logError("shutdown_error", "Shutdown failed", err);
        process.exit(1);
      });
    });
  }

  log("relay_starting", "Telegram completion relay starting", {
    metadata: {
      mode: transport.mode,
      model: config.completion.model,
      historyLimit: config.historyLimit,
      webhook: transport.webhookEndpoint,
    },
  });

  await transport.start();
}

main().catch((err: unknown) => {
  logError("startup_error", err instanceof AppError ? err.message : "Relay failed to start", err);
  process.exit(1);
});
