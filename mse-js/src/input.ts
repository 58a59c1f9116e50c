/**
 * MSE Input — byte streams the reader pulls from.
 */

import { readFileSync } from 'node:fs';

/** A forward-only byte source with end detection and pushback. */
export interface InputStream {
  /** Next byte, or -1 once the stream is exhausted. */
  getc(): number;
  /** Push a byte back; the next `getc()` returns it. */
  ungetc(byte: number): void;
  /** Whether a read has run past the end of the stream. */
  eof(): boolean;
}

/** An {@link InputStream} over bytes already in memory. */
export class ByteInput implements InputStream {
  private pos = 0;
  private pushedBack: number[] = [];
  private hitEnd = false;

  constructor(private readonly bytes: Uint8Array) {}

  /** Read a whole file into a stream. */
  static fromFile(path: string): ByteInput {
    return new ByteInput(readFileSync(path));
  }

  getc(): number {
    const pushed = this.pushedBack.pop();
    if (pushed !== undefined) return pushed;
    if (this.pos >= this.bytes.length) {
      this.hitEnd = true;
      return -1;
    }
    return this.bytes[this.pos++];
  }

  ungetc(byte: number): void {
    this.hitEnd = false;
    this.pushedBack.push(byte);
  }

  eof(): boolean {
    return this.hitEnd && this.pushedBack.length === 0;
  }
}
