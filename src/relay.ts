/**
 * Message Relay
 *
 * Turns one inbound chat message into a completion request and sends the
 * reply back, keeping the chat's history in step. Per-chat ordering comes
 * from the transport: updates for one chat are delivered one at a time.
 */

import { setTimeout as sleep } from "timers/promises";
import { splitMessage, TELEGRAM_MESSAGE_LIMIT } from "./chunks";
import type { CompletionGateway } from "./completion";
import type { ChatId, HistoryStore } from "./history";
import { log, logError } from "./logger";
import { RESET_TEXT, WELCOME_TEXT } from "./texts";

/** The subset of the Telegram Bot API the relay sends through. */
export interface ChatSender {
  sendMessage(chatId: ChatId, text: string): Promise<unknown>;
  sendChatAction(chatId: ChatId, action: "typing"): Promise<unknown>;
}

export interface MessageRelayOptions {
  history: HistoryStore;
  gateway: Pick<CompletionGateway, "complete">;
  sender: ChatSender;
  systemPrompt: string;
  /** Pause between consecutive chunks of one reply; 0 disables it. */
  chunkDelayMs?: number;
  chunkSize?: number;
  sleep?: (ms: number) => Promise<unknown>;
}

export class MessageRelay {
  private readonly chunkDelayMs: number;
  private readonly chunkSize: number;
  private readonly sleep: (ms: number) => Promise<unknown>;

  constructor(private readonly options: MessageRelayOptions) {
    this.chunkDelayMs = options.chunkDelayMs ?? 500;
    this.chunkSize = options.chunkSize ?? TELEGRAM_MESSAGE_LIMIT;
    this.sleep = options.sleep ?? sleep;
  }

  async handle(chatId: ChatId, userText: string | undefined): Promise<void> {
    if (!userText || !userText.trim()) return;

    const { history, gateway, systemPrompt } = this.options;

    log("message_received", `Message from ${chatId}`, {
      metadata: { chatId, length: userText.length },
    });

    history.append(chatId, "user", userText);
    await this.sendTyping(chatId);

    const reply = await gateway.complete(systemPrompt, history.get(chatId));
    // Only model output is stored; the user turn stays either way.
    if (!reply.fallback) {
      history.append(chatId, "assistant", reply.text);
    }

    await this.sendReply(chatId, reply.text);
  }

  async handleReset(chatId: ChatId): Promise<void> {
    this.options.history.clear(chatId);
    log("history_reset", `Chat ${chatId} history cleared`);
    await this.options.sender.sendMessage(chatId, RESET_TEXT);
  }

  async handleStart(chatId: ChatId): Promise<void> {
    this.options.history.clear(chatId);
    log("session_started", `Chat ${chatId} started`);
    await this.options.sender.sendMessage(chatId, WELCOME_TEXT);
  }

  private async sendTyping(chatId: ChatId): Promise<void> {
    try {
      await this.options.sender.sendChatAction(chatId, "typing");
    } catch (err) {
      logError("typing_error", `Could not send typing action to ${chatId}`, err);
    }
  }

  private async sendReply(chatId: ChatId, reply: string): Promise<void> {
    const chunks = splitMessage(reply, this.chunkSize);

    for (const [index, chunk] of chunks.entries()) {
      if (index > 0 && this.chunkDelayMs > 0) {
        await this.sleep(this.chunkDelayMs);
      }
      await this.options.sender.sendMessage(chatId, chunk);
    }

    if (chunks.length > 1) {
      log("reply_split", `Reply to ${chatId} sent in ${chunks.length} parts`, {
        metadata: { chatId, length: reply.length },
      });
    }
  }
}
