/**
 * Structured Logger
 *
 * Writes JSON to console and fire-and-forget to the Supabase logs table.
 * Matches schema: level, event, message, metadata, session_id, duration_ms
 */

import { AppError } from "./errors";
import { getSupabase } from "./supabase";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogOptions {
  level?: LogLevel;
  metadata?: Record<string, unknown>;
  sessionId?: string;
  durationMs?: number;
}

export function log(event: string, message: string, opts: LogOptions = {}): void {
  const level = opts.level || "info";
  const entry: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    event,
    message,
  };

  if (opts.metadata) entry.metadata = opts.metadata;
  if (opts.sessionId) entry.session_id = opts.sessionId;
  if (opts.durationMs !== undefined) entry.duration_ms = opts.durationMs;

  // Console output
  if (level === "error") {
    console.error(JSON.stringify(entry));
  } else if (level === "warn") {
    console.warn(JSON.stringify(entry));
  } else {
    console.log(JSON.stringify(entry));
  }

  const sb = getSupabase();
  if (sb) {
    void sb
      .from("logs")
      .insert({
        level,
        event,
        message,
        metadata: opts.metadata || {},
        session_id: opts.sessionId,
        duration_ms: opts.durationMs,
      })
      .then(
        ({ error }) => {
          if (error) console.error(`log sink insert failed: ${error.message}`);
        },
        (err: unknown) => {
          console.error(`log sink unreachable: ${String(err)}`);
        },
      );
  }
}

export function logError(event: string, message: string, error?: unknown): void {
  let metadata: Record<string, unknown> | undefined;
  if (error instanceof AppError) {
    metadata = { code: error.code, error: error.message, stack: error.stack };
  } else if (error instanceof Error) {
    metadata = { error: error.message, stack: error.stack };
  } else if (error) {
    metadata = { error: String(error) };
  }

  log(event, message, { level: "error", metadata });
}
