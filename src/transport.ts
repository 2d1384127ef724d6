/**
 * Telegram Transport
 *
 * Owns how updates reach the bot: a registered webhook (push) when a public
 * URL is configured, otherwise supervised long polling (pull). Exactly one
 * mode is active; starting either one clears the other on Telegram's side.
 *
 *   STOPPED -> STARTING -> RUNNING -> STOPPING -> STOPPED
 *
 * Shutdown is single-shot and is carried to the poll loop as an AbortSignal.
 */

import type { PollingOptions } from "grammy";
import { AppError, ErrorCode } from "./errors";
import { log, logError } from "./logger";
import { DEFAULT_BACKOFF_MS, superviseLoop } from "./supervisor";

export type TransportState = "STOPPED" | "STARTING" | "RUNNING" | "STOPPING";
export type DeliveryMode = "push" | "pull";

export const WEBHOOK_PATH = "/webhook";

/** The parts of a grammy Bot the transport drives. */
export interface TransportBot {
  start(options?: PollingOptions): Promise<void>;
  stop(): Promise<void>;
  api: {
    setWebhook(url: string, other?: { drop_pending_updates?: boolean; secret_token?: string }): Promise<true>;
    deleteWebhook(other?: { drop_pending_updates?: boolean }): Promise<true>;
  };
}

export interface TelegramTransportOptions {
  bot: TransportBot;
  webhookUrl?: string;
  webhookSecret?: string;
  /** Wait before restarting a failed poll loop. */
  backoffMs?: number;
}

export class TelegramTransport {
  readonly mode: DeliveryMode;
  private currentState: TransportState = "STOPPED";
  private readonly controller = new AbortController();
  private pollTask: Promise<void> | null = null;

  constructor(private readonly options: TelegramTransportOptions) {
    this.mode = options.webhookUrl ? "push" : "pull";
  }

  get state(): TransportState {
    return this.currentState;
  }

  /** Cancellation token shared with every long-running task. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get shuttingDown(): boolean {
    return this.controller.signal.aborted;
  }

  get webhookEndpoint(): string | undefined {
    const base = this.options.webhookUrl;
    return base ? `${base.replace(/\/+$/, "")}${WEBHOOK_PATH}` : undefined;
  }

  async start(): Promise<void> {
    if (this.currentState !== "STOPPED" || this.shuttingDown) {
      throw new AppError(
        ErrorCode.TransportState,
        `Cannot start transport in state ${this.currentState}${this.shuttingDown ? " after shutdown" : ""}`,
      );
    }

    this.currentState = "STARTING";
    log("transport_starting", `Starting in ${this.mode} mode`);

    try {
      if (this.mode === "push") {
        await this.startPush();
      } else {
        await this.startPull();
      }
    } catch (err) {
      if (this.currentState === "STARTING") this.currentState = "STOPPED";
      throw err;
    }

    // stop() may have run while the API calls above were in flight.
    if (this.currentState === "STARTING") {
      this.currentState = "RUNNING";
      log("transport_running", `Receiving updates via ${this.mode === "push" ? "webhook" : "long polling"}`);
    }
  }

  async stop(): Promise<void> {
    if (this.shuttingDown) return;

    this.currentState = "STOPPING";
    log("transport_stopping", "Shutdown requested, no longer accepting updates");
    this.controller.abort();

    if (this.pollTask) {
      await this.pollTask;
      this.pollTask = null;
    }

    this.currentState = "STOPPED";
    log("transport_stopped", "Transport stopped");
  }

  private async startPush(): Promise<void> {
    const endpoint = this.webhookEndpoint;
    if (!endpoint) {
      throw new AppError(ErrorCode.ConfigMissing, "Webhook mode requires WEBHOOK_URL");
    }

    await this.options.bot.api.setWebhook(endpoint, {
      drop_pending_updates: true,
      secret_token: this.options.webhookSecret,
    });
    log("webhook_set", `Webhook registered: ${endpoint}`);
  }

  private async startPull(): Promise<void> {
    await this.options.bot.api.deleteWebhook({ drop_pending_updates: false });
    if (this.shuttingDown) return;

    this.pollTask = superviseLoop("polling", (signal) => this.poll(signal), {
      signal: this.controller.signal,
      backoffMs: this.options.backoffMs ?? DEFAULT_BACKOFF_MS,
    });
  }

  private async poll(signal: AbortSignal): Promise<void> {
    const { bot } = this.options;
    const halt = () => {
      void bot.stop().catch((err: unknown) => {
        logError("polling_stop_error", "Failed to stop long polling", err);
      });
    };

    signal.addEventListener("abort", halt, { once: true });
    try {
      await bot.start({
        onStart: (botInfo) => {
          log("polling_started", `Polling as @${botInfo.username}`);
          // Abort can land while grammy is still initialising.
          if (signal.aborted) halt();
        },
      });
    } finally {
      signal.removeEventListener("abort", halt);
    }
  }
}
