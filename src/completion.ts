/**
 * Completion Gateway
 *
 * Calls an OpenAI-compatible chat-completions endpoint (Groq by default)
 * with the system instruction prepended to the chat history.
 *
 * Never throws: any failure is logged and replaced with FALLBACK_TEXT so
 * the user always gets an answer. The reply says which of the two it is.
 */

import { AppError, ErrorCode } from "./errors";
import type { Turn } from "./history";
import { log, logError } from "./logger";
import { FALLBACK_TEXT } from "./texts";
import type { CompletionConfig } from "./config";

export const COMPLETION_TEMPERATURE = 0.7;
export const COMPLETION_MAX_TOKENS = 4096;

interface ChatCompletionResponse {
  choices?: Array<{ message?: { content?: string | null } }>;
  error?: { message?: string };
}

export interface CompletionReply {
  text: string;
  /** True when `text` is the fallback rather than model output. */
  fallback: boolean;
}

export interface CompletionGatewayOptions extends CompletionConfig {
  fetch?: typeof fetch;
  fallbackText?: string;
}

export class CompletionGateway {
  private readonly fetchImpl: typeof fetch;
  private readonly fallbackText: string;

  constructor(private readonly options: CompletionGatewayOptions) {
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.fallbackText = options.fallbackText ?? FALLBACK_TEXT;
  }

  async complete(systemPrompt: string, turns: readonly Turn[]): Promise<CompletionReply> {
    const messages: Turn[] = [{ role: "system", content: systemPrompt }, ...turns];

    try {
      return { text: await this.request(messages), fallback: false };
    } catch (err) {
      logError("completion_error", "Completion API call failed", err);
      return { text: this.fallbackText, fallback: true };
    }
  }

  private async request(messages: Turn[]): Promise<string> {
    const { apiKey, baseUrl, model, timeoutMs } = this.options;
    const startTime = Date.now();

    const response = await this.fetchImpl(`${baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        model,
        messages,
        temperature: COMPLETION_TEMPERATURE,
        max_tokens: COMPLETION_MAX_TOKENS,
      }),
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!response.ok) {
      const body = await response.text().catch((err: unknown) => `<unreadable body: ${String(err)}>`);
      throw new AppError(
        ErrorCode.CompletionFailed,
        `Completion API ${response.status}: ${body.substring(0, 200)}`,
      );
    }

    const data = (await response.json()) as ChatCompletionResponse;

    if (data.error) {
      throw new AppError(ErrorCode.CompletionFailed, `Completion API error: ${data.error.message}`);
    }

    const text = data.choices?.[0]?.message?.content;
    if (!text) {
      throw new AppError(ErrorCode.CompletionFailed, "Completion API returned empty response");
    }

    log("completion_response", `${text.length} chars`, {
      durationMs: Date.now() - startTime,
      metadata: { model, turns: messages.length - 1 },
    });

    return text;
  }
}
