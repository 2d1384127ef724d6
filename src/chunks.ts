// Telegram rejects messages longer than 4096 characters.
export const TELEGRAM_MESSAGE_LIMIT = 4096;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Split text into consecutive chunks of at most `size` UTF-16 units.
 * Joining the chunks gives back the input exactly; a chunk is cut one unit
 * short rather than separate a surrogate pair.
 */
export function splitMessage(text: string, size = TELEGRAM_MESSAGE_LIMIT): string[] {
  if (!Number.isInteger(size) || size < 2) {
    throw new RangeError(`Chunk size must be an integer >= 2, got ${size}`);
  }

  const chunks: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + size, text.length);
    if (end < text.length && isHighSurrogate(text.charCodeAt(end - 1))) end--;
    chunks.push(text.slice(start, end));
    start = end;
  }
  return chunks;
}
