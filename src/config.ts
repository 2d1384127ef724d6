/**
 * Configuration
 *
 * Reads the relay settings from the environment. Missing credentials are
 * fatal; everything else has a default.
 */

import { readFile } from "fs/promises";
import { dirname, isAbsolute, join } from "path";
import { fileURLToPath } from "url";
import { AppError, ErrorCode } from "./errors";
import { isPlaceholder } from "./supabase";

export const PROJECT_ROOT = dirname(dirname(fileURLToPath(import.meta.url)));

export interface CompletionConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

export interface RelayConfig {
  botToken: string;
  completion: CompletionConfig;
  /** Public base URL; its presence selects webhook (push) delivery. */
  webhookUrl?: string;
  webhookSecret?: string;
  host: string;
  port: number;
  historyLimit: number;
  chunkDelayMs: number;
  systemPromptFile: string;
}

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return isPlaceholder(value) ? undefined : value;
}

function required(env: Env, name: string): string {
  const value = optional(env, name);
  if (!value) {
    throw new AppError(ErrorCode.ConfigMissing, `${name} is not set`);
  }
  return value;
}

function integer(env: Env, name: string, fallback: number, min: number): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new AppError(
      ErrorCode.ConfigInvalid,
      `${name} must be an integer >= ${min}, got "${raw}"`,
    );
  }
  return value;
}

export function loadConfig(env: Env = process.env): RelayConfig {
  const promptFile = optional(env, "SYSTEM_PROMPT_FILE") || "config/system-prompt.md";

  return {
    botToken: required(env, "TELEGRAM_BOT_TOKEN"),
    completion: {
      apiKey: required(env, "GROQ_API_KEY"),
      baseUrl: (optional(env, "COMPLETION_BASE_URL") || "https://api.groq.com/openai/v1").replace(/\/+$/, ""),
      model: optional(env, "COMPLETION_MODEL") || "llama-3.3-70b-versatile",
      timeoutMs: integer(env, "COMPLETION_TIMEOUT_MS", 60_000, 1),
    },
    webhookUrl: optional(env, "WEBHOOK_URL"),
    webhookSecret: optional(env, "TELEGRAM_WEBHOOK_SECRET"),
    host: optional(env, "HOST") || "0.0.0.0",
    port: integer(env, "PORT", 8080, 0),
    historyLimit: integer(env, "HISTORY_LIMIT", 20, 1),
    chunkDelayMs: integer(env, "CHUNK_DELAY_MS", 500, 0),
    systemPromptFile: isAbsolute(promptFile) ? promptFile : join(PROJECT_ROOT, promptFile),
  };
}

export async function loadSystemPrompt(path: string): Promise<string> {
  try {
    const prompt = (await readFile(path, "utf-8")).trim();
    if (!prompt) {
      throw new AppError(ErrorCode.ConfigInvalid, `System prompt file is empty: ${path}`);
    }
    return prompt;
  } catch (err) {
    if (err instanceof AppError) throw err;
    throw new AppError(ErrorCode.ConfigMissing, `Cannot read system prompt file: ${path}`, {
      cause: err,
    });
  }
}
