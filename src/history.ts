/**
 * In-memory conversation history, one bounded session per chat.
 *
 * Sessions live for the lifetime of the process. The system instruction is
 * never stored here; the completion gateway prepends it per call.
 */

import { AppError, ErrorCode } from "./errors";

export type ChatId = number | string;

export type TurnRole = "system" | "user" | "assistant";

export interface Turn {
  readonly role: TurnRole;
  readonly content: string;
}

export const DEFAULT_HISTORY_LIMIT = 20;

export class HistoryStore {
  private readonly sessions = new Map<ChatId, Turn[]>();
  readonly limit: number;

  constructor(options: { limit?: number } = {}) {
    const limit = options.limit ?? DEFAULT_HISTORY_LIMIT;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new AppError(ErrorCode.ConfigInvalid, `History limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  get(chatId: ChatId): readonly Turn[] {
    let session = this.sessions.get(chatId);
    if (!session) {
      session = [];
      this.sessions.set(chatId, session);
    }
    return session;
  }

  append(chatId: ChatId, role: TurnRole, content: string): void {
    const session = [...this.get(chatId), Object.freeze({ role, content })];
    // Oldest turns go first once the window is full.
    this.sessions.set(chatId, session.length > this.limit ? session.slice(-this.limit) : session);
  }

  clear(chatId: ChatId): void {
    this.sessions.set(chatId, []);
  }

  sessionCount(): number {
    return this.sessions.size;
  }
}
