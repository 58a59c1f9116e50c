/**
 * MSE Writer — writes documents the Reader reads back.
 *
 *   - `mse_version` preamble first
 *   - `key: value` per line, nested blocks one tab deeper
 *   - Values that are empty, span lines or start with whitespace become
 *     text blocks on the following lines
 */

import { verbatimFileNames } from './decoders.js';
import { assertContract } from './errors.js';
import { canonicalName } from './names.js';
import { APP_VERSION, VERSION_KEY } from './types.js';
import type { FileNameCodec, ValueKind, ValueTypes, WriterOptions } from './types.js';
import { Version } from './version.js';

type Encoder<K extends ValueKind> = (value: ValueTypes[K], fileNames: FileNameCodec) => string;

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Format a date as local `YYYY-MM-DD HH:MM:SS`. */
export function formatDateTime(date: Date): string {
  return (
    `${String(date.getFullYear()).padStart(4, '0')}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function formatBool(b: boolean): string {
  return b ? 'true' : 'false';
}

function formatNumber(n: number): string {
  assertContract(Number.isFinite(n), `Cannot write ${n} as a number`);
  return String(n);
}

function formatInteger(n: number): string {
  assertContract(Number.isSafeInteger(n), `Cannot write ${n} as an integer`);
  return String(n);
}

// Only whole seconds in years 0-9999 survive the date format.
function formatDate(date: Date): string {
  const time = date.getTime();
  assertContract(Number.isFinite(time), 'Cannot write an invalid date');
  assertContract(date.getMilliseconds() === 0, `Cannot write ${date.toISOString()}: sub-second part`);
  const year = date.getFullYear();
  assertContract(year >= 0 && year <= 9999, `Cannot write year ${year}`);
  return formatDateTime(date);
}

const ENCODERS: { [K in ValueKind]: Encoder<K> } = {
  text: (value) => value,
  int: formatInteger,
  uint(value) {
    assertContract(value >= 0, `Cannot write ${value} as a non-negative integer`);
    return formatInteger(value);
  },
  double: formatNumber,
  bool: formatBool,
  tribool: (value) => (value === null ? '' : formatBool(value)),
  date: formatDate,
  vector: (value) => `(${formatNumber(value.x)},${formatNumber(value.y)})`,
  filename: (value, fileNames) => fileNames.toWriteString(value),
  version: (value) => value.toString(),
};

/**
 * Build a document in memory.
 *
 * @example
 * ```ts
 * import { Writer } from 'mse-reader';
 *
 * const text = new Writer()
 *   .handleField('title', 'text', 'My set')
 *   .enterBlock('style')
 *   .handleField('border', 'int', 2)
 *   .exitBlock()
 *   .toString();
 * ```
 */
export class Writer {
  private out = '';
  private depth = 0;
  private readonly fileNames: FileNameCodec;

  constructor(options: WriterOptions = {}) {
    this.fileNames = options.fileNames ?? verbatimFileNames;
    const version = Version.from(options.appVersion ?? APP_VERSION);
    this.writeValue(VERSION_KEY, version.toString());
  }

  /** Open block `name`; following fields go inside it. */
  enterBlock(name: string): this {
    this.out += `${'\t'.repeat(this.depth)}${canonicalName(name)}:\n`;
    this.depth += 1;
    return this;
  }

  exitBlock(): this {
    assertContract(this.depth > 0, 'exitBlock() called without an open block');
    this.depth -= 1;
    return this;
  }

  /**
   * Write key `name` with a value of the given kind. An indeterminate tribool is left out.
   *
   * @throws {InternalError} For a value that would not read back the same: a
   *   non-finite number, a fractional integer, a date with milliseconds.
   */
  handleField<K extends ValueKind>(name: string, kind: K, value: ValueTypes[K]): this {
    if (value === null) return this;
    const encode: Encoder<K> = ENCODERS[kind];
    this.writeValue(name, encode(value, this.fileNames));
    return this;
  }

  toString(): string {
    return this.out;
  }

  /** The document as UTF-8 bytes. */
  toBytes(): Uint8Array {
    return new TextEncoder().encode(this.out);
  }

  private writeValue(name: string, text: string): void {
    const indent = '\t'.repeat(this.depth);
    const key = canonicalName(name);
    const normalized = text.replace(/\r\n?/g, '\n');
    if (normalized !== '' && !normalized.includes('\n') && !/^\s/.test(normalized)) {
      this.out += `${indent}${key}: ${normalized}\n`;
      return;
    }
    this.out += `${indent}${key}:\n`;
    if (normalized === '') return;
    for (const line of normalized.split('\n')) {
      this.out += `${indent}\t${line}\n`;
    }
  }
}
