import { TextDecoder } from 'node:util';
import type { Logger } from '../observability/types';

const NEWLINE = 0x0a;

function createValidator(): TextDecoder {
  return new TextDecoder('utf-8', { fatal: true });
}

// Length of a multi-byte character cut off at the end of `bytes`, or 0
function incompleteTail(bytes: Uint8Array): number {
  const stop = Math.max(0, bytes.length - 4);
  for (let i = bytes.length - 1; i >= stop; i--) {
    const byte = bytes[i] ?? 0;
    if ((byte & 0xc0) === 0x80) continue;

    const expected = byte >= 0xf0 ? 4 : byte >= 0xe0 ? 3 : byte >= 0xc0 ? 2 : 1;
    const available = bytes.length - i;
    return available < expected ? available : 0;
  }
  return 0;
}

/**
 * Splits a serial byte stream into newline-delimited text messages.
 *
 * Bytes after the last `\n` stay buffered until a later chunk completes the
 * line. Each message has its delimiter and surrounding whitespace removed
 * (so `\r\n` line endings come out clean); blank lines produce nothing.
 *
 * Chunks are checked as UTF-8 on arrival, as one continuous stream, so a
 * character split across reads is fine. A chunk with invalid bytes is
 * dropped whole and logged before it reaches the buffer.
 *
 * There is no upper bound on the buffered partial line.
 */
export class LineFramer {
  private buffer: Buffer = Buffer.alloc(0);
  private validator = createValidator();

  constructor(private logger?: Logger) {}

  push(chunk: Uint8Array): string[] {
    if (chunk.length === 0) return [];
    if (!this.accept(chunk)) {
      this.logger?.warn('Discarding chunk that is not valid UTF-8', { bytes: chunk.length });
      return [];
    }

    this.buffer = this.buffer.length === 0
      ? Buffer.from(chunk)
      : Buffer.concat([this.buffer, chunk]);

    const messages: string[] = [];
    let start = 0;
    let end = this.buffer.indexOf(NEWLINE, start);

    while (end !== -1) {
      const text = this.buffer.toString('utf-8', start, end).trim();
      if (text !== '') messages.push(text);
      start = end + 1;
      end = this.buffer.indexOf(NEWLINE, start);
    }

    if (start > 0) {
      this.buffer = Buffer.from(this.buffer.subarray(start));
    }
    return messages;
  }

  /** Bytes held back waiting for a delimiter. */
  get pending(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.validator = createValidator();
  }

  private accept(chunk: Uint8Array): boolean {
    if (this.validates(chunk)) return true;

    // The chunk may be fine on its own and only fail to continue a
    // character left unfinished by the previous one
    const tail = incompleteTail(this.buffer);
    if (tail === 0) return false;

    this.logger?.warn('Discarding unfinished UTF-8 character', { bytes: tail });
    this.buffer = Buffer.from(this.buffer.subarray(0, this.buffer.length - tail));
    return this.validates(chunk);
  }

  // Feeds the stream validator; on failure it starts over from a clean state
  private validates(chunk: Uint8Array): boolean {
    try {
      this.validator.decode(chunk, { stream: true });
      return true;
    } catch {
      this.validator = createValidator();
      return false;
    }
  }
}
