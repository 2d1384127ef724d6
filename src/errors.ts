/**
 * Application Errors
 *
 * A single error class carrying a stable code, so log lines and HTTP
 * responses can be classified without string matching.
 */

export const ErrorCode = {
  ConfigMissing: "CONFIG_MISSING",
  ConfigInvalid: "CONFIG_INVALID",
  CompletionFailed: "COMPLETION_FAILED",
  WebhookFailed: "WEBHOOK_FAILED",
  TransportState: "TRANSPORT_STATE",
  UnhandledException: "UNHANDLED_EXCEPTION",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export class AppError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AppError";
    this.code = code;
  }
}

export function errorCodeOf(error: unknown): ErrorCode {
  return error instanceof AppError ? error.code : ErrorCode.UnhandledException;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return String(error);
}
