/**
 * MSE Value Decoders — raw value text to typed values.
 *
 * Scalars with a sane default (numbers, booleans, versions) only warn and
 * keep the current value. Dates and vectors have no safe default, so a bad
 * one is a ParseError.
 */

import { ParseError } from './errors.js';
import type { FileNameCodec, LocalFileName, ValueKind, ValueTypes } from './types.js';
import { Version } from './version.js';

/** What a decoder may use besides the raw text. */
export interface DecodeContext {
  /** Record a warning against the value's line. */
  warning(message: string): void;
  fileNames: FileNameCodec;
}

export type Decoder<K extends ValueKind> = (
  raw: string,
  current: ValueTypes[K],
  ctx: DecodeContext,
) => ValueTypes[K];

export type DecoderTable = { [K in ValueKind]: Decoder<K> };

const INTEGER = /^[+-]?\d+$/;
const FLOAT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const FLOAT_SRC = '[+-]?(?:\\d+\\.?\\d*|\\.\\d+)(?:[eE][+-]?\\d+)?';
const VECTOR = new RegExp(`^\\(\\s*(${FLOAT_SRC})\\s*,\\s*(${FLOAT_SRC})\\s*\\)\\s*$`);
const DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2}))?)?$/;

const TRUE_VALUES = new Set(['true', '1', 'yes']);
const FALSE_VALUES = new Set(['false', '0', 'no']);

/** File names are kept exactly as written. */
export const verbatimFileNames: FileNameCodec = {
  fromReadString: (raw) => ({ path: raw }),
  toWriteString: (name: LocalFileName) => name.path,
};

function parseInteger(raw: string): number | undefined {
  if (!INTEGER.test(raw)) return undefined;
  const n = Number(raw);
  return Number.isSafeInteger(n) ? n : undefined;
}

function parseBool(raw: string): boolean | undefined {
  if (TRUE_VALUES.has(raw)) return true;
  if (FALSE_VALUES.has(raw)) return false;
  return undefined;
}

function decodeBool(raw: string, current: boolean, ctx: DecodeContext): boolean {
  const b = parseBool(raw);
  if (b === undefined) {
    ctx.warning(`Expected boolean ('true' or 'false') instead of '${raw}'`);
    return current;
  }
  return b;
}

/**
 * Parse a local date and time written as `YYYY-MM-DD HH:MM:SS`.
 * The seconds, or the whole time, may be left out.
 */
export function parseDateTime(raw: string): Date | undefined {
  const m = DATE_TIME.exec(raw);
  if (!m) return undefined;
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const [hour, minute, second] = [Number(m[4] ?? 0), Number(m[5] ?? 0), Number(m[6] ?? 0)];
  const date = new Date(2000, 0, 1, hour, minute, second);
  // the constructor maps years 0-99 to 1900-1999
  date.setFullYear(year, month - 1, day);
  // Date rolls 2024-02-30 over into March; reject instead
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day ||
    date.getHours() !== hour ||
    date.getMinutes() !== minute ||
    date.getSeconds() !== second
  ) {
    return undefined;
  }
  return date;
}

export const DECODERS: DecoderTable = {
  text: (raw) => raw,

  int(raw, current, ctx) {
    const n = parseInteger(raw);
    if (n === undefined) {
      ctx.warning(`Expected integer instead of '${raw}'`);
      return current;
    }
    return n;
  },

  uint(raw, current, ctx) {
    const n = parseInteger(raw);
    if (n === undefined) {
      ctx.warning(`Expected non-negative integer instead of '${raw}'`);
      return current;
    }
    if (n < 0) {
      ctx.warning(`Expected non-negative integer instead of ${n}`);
    }
    // -1 should not come out as a huge number
    return Math.abs(n);
  },

  double(raw, current, ctx) {
    if (!FLOAT.test(raw)) {
      ctx.warning(`Expected floating point number instead of '${raw}'`);
      return current;
    }
    return Number(raw);
  },

  bool: decodeBool,

  tribool(raw, current, ctx) {
    const b = parseBool(raw);
    if (b === undefined) {
      ctx.warning(`Expected boolean ('true' or 'false') instead of '${raw}'`);
      return current;
    }
    return b;
  },

  date(raw) {
    const date = parseDateTime(raw);
    if (!date) {
      throw new ParseError('Expected a date and time');
    }
    return date;
  },

  vector(raw) {
    const m = VECTOR.exec(raw);
    if (!m) {
      throw new ParseError('Expected (x,y)');
    }
    return { x: Number(m[1]), y: Number(m[2]) };
  },

  filename: (raw, _current, ctx) => ctx.fileNames.fromReadString(raw),

  version(raw, current, ctx) {
    const v = Version.parse(raw);
    if (!v) {
      ctx.warning(`Expected version number instead of '${raw}'`);
      return current;
    }
    return v;
  },
};

/** Decode `raw` as a value of the given kind. */
export function decodeValue<K extends ValueKind>(
  kind: K,
  raw: string,
  current: ValueTypes[K],
  ctx: DecodeContext,
): ValueTypes[K] {
  const decode: Decoder<K> = DECODERS[kind];
  return decode(raw, current, ctx);
}
