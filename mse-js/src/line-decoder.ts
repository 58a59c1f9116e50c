/**
 * MSE Line Decoder — turns a byte stream into UTF-8 text lines.
 *
 *   - Optional UTF-8 byte order mark at the very start is dropped
 *   - `\n`, `\r\n` and a lone `\r` each end one line
 *   - Invalid UTF-8 raises a DecodeError
 */

import { DecodeError } from './errors.js';
import type { InputStream } from './input.js';

const BOM = [0xef, 0xbb, 0xbf];
const LF = 0x0a;
const CR = 0x0d;

/** Most lines fit; longer ones grow the buffer by doubling. */
const INITIAL_BUFFER_SIZE = 1024;

/**
 * Drop a UTF-8 byte order mark from the start of a stream.
 *
 * @returns `true` if a mark was found. Otherwise every byte looked at is
 *   pushed back.
 */
export function eatUtf8Bom(input: InputStream): boolean {
  const seen: number[] = [];
  for (const expected of BOM) {
    const c = input.getc();
    if (c === -1) break;
    seen.push(c);
    if (c !== expected) break;
  }
  if (seen.length === BOM.length && seen.every((b, i) => b === BOM[i])) return true;
  for (let i = seen.length - 1; i >= 0; i--) {
    input.ungetc(seen[i]);
  }
  return false;
}

/** Reads lines from one stream, reusing a single byte buffer. */
export class LineDecoder {
  private buffer = new Uint8Array(INITIAL_BUFFER_SIZE);
  private size = 0;
  private readonly utf8 = new TextDecoder('utf-8', { fatal: true });

  constructor(readonly input: InputStream) {}

  /** Whether the stream has been read to its end. */
  eof(): boolean {
    return this.input.eof();
  }

  /**
   * Read the next line, without its terminator.
   *
   * @param untilEof - Read everything left instead of stopping at a line break.
   * @returns The line, or `null` if the stream was already exhausted.
   * @throws {DecodeError} If the bytes are not valid UTF-8.
   */
  readLine(untilEof = false): string | null {
    this.size = 0;
    let terminated = false;
    while (true) {
      let c = this.input.getc();
      if (c === -1) break;
      if (!untilEof) {
        if (c === LF) {
          terminated = true;
          break;
        }
        if (c === CR) {
          c = this.input.getc();
          if (c !== LF && c !== -1) {
            this.input.ungetc(c); // \r but not \r\n
          }
          terminated = true;
          break;
        }
      }
      this.push(c);
    }
    if (this.size === 0 && !terminated) return null;
    return this.decode();
  }

  private push(byte: number): void {
    if (this.size === this.buffer.length) {
      const grown = new Uint8Array(this.buffer.length * 2);
      grown.set(this.buffer);
      this.buffer = grown;
    }
    this.buffer[this.size++] = byte;
  }

  private decode(): string {
    if (this.size === 0) return '';
    try {
      return this.utf8.decode(this.buffer.subarray(0, this.size));
    } catch (err) {
      if (err instanceof TypeError) {
        throw new DecodeError();
      }
      throw err;
    }
  }
}
