/**
 * Routes Telegram updates into the relay: /start, /reset and plain text.
 * Everything else (media, edits, callbacks) is ignored.
 */

import { webhookCallback, type Bot, type BotError } from "grammy";
import { logError } from "./logger";
import type { MessageRelay } from "./relay";
import type { WebhookHandler } from "./server";

/** Slack on top of the completion timeout for typing and paced chunk sends. */
export const WEBHOOK_SEND_MARGIN_MS = 30_000;

export type RelayHandlers = Pick<MessageRelay, "handle" | "handleReset" | "handleStart">;

function logUpdateError(err: BotError): void {
  logError("bot_error", `Update ${err.ctx.update.update_id} failed`, err.error);
}

export function registerRelayHandlers(bot: Bot, relay: RelayHandlers): Bot {
  // The boundary also covers webhook delivery, where bot.catch is not consulted.
  const routes = bot.errorBoundary(logUpdateError);

  routes.command("start", async (ctx) => {
    await relay.handleStart(ctx.chat.id);
  });

  routes.command("reset", async (ctx) => {
    await relay.handleReset(ctx.chat.id);
  });

  routes.on("message:text", async (ctx) => {
    await relay.handle(ctx.chat.id, ctx.message.text);
  });

  // Keeps one failing update from stopping long polling.
  bot.catch(logUpdateError);

  return bot;
}

export interface WebhookHandlerOptions {
  secretToken?: string;
  /** How long to hold the request open before answering Telegram anyway. */
  timeoutMs: number;
}

/**
 * Answers Telegram with 200 once `timeoutMs` passes even if the update is
 * still being handled; a 500 there would make Telegram redeliver it.
 */
export function createWebhookHandler(bot: Bot, { secretToken, timeoutMs }: WebhookHandlerOptions): WebhookHandler {
  return webhookCallback(bot, "hono", {
    secretToken,
    timeoutMilliseconds: timeoutMs,
    onTimeout: "return",
  });
}
