/**
 * MSE Types — TypeScript definitions for the MSE structured-text format.
 */

import type { Version } from './version.js';

/** Position of the reader relative to the current key. */
export type ParseState =
  /** No key consumed yet in this iteration. */
  | 'outside'
  /** On a block's own key line, not yet descended into it. */
  | 'entered'
  /** The current key/value has been consumed. */
  | 'handled'
  /** The next value read replays the previous one. */
  | 'unhandled';

/** A 2D vector, written as `(x,y)`. */
export interface Vector2D {
  x: number;
  y: number;
}

/** Tri-state boolean; `null` is "indeterminate". */
export type Tribool = boolean | null;

/** A file name relative to the package a document lives in. */
export interface LocalFileName {
  /** Path inside the package, `/`-separated. */
  readonly path: string;
}

/** Converts file name references to and from their textual form. */
export interface FileNameCodec {
  fromReadString(raw: string): LocalFileName;
  toWriteString(name: LocalFileName): string;
}

/** Value types the reader can decode, keyed by kind. */
export interface ValueTypes {
  text: string;
  int: number;
  uint: number;
  double: number;
  bool: boolean;
  tribool: Tribool;
  date: Date;
  vector: Vector2D;
  filename: LocalFileName;
  version: Version;
}

/** Name of a decodable value type. */
export type ValueKind = keyof ValueTypes;

/** Severity of a queued message. */
export type MessageSeverity = 'info' | 'warning' | 'error';

/** A message queued for the user. */
export interface Message {
  severity: MessageSeverity;
  text: string;
}

/** Receives messages that must reach the user without aborting a read. */
export interface MessageSink {
  queueMessage(severity: MessageSeverity, text: string): void;
}

/** A warning recorded while reading, tied to a line. */
export interface ReaderWarning {
  /** 1-based line number. */
  line: number;
  message: string;
}

/** Options for constructing a Reader. */
export interface ReaderOptions {
  /** File name used in diagnostics (default: `"<input>"`). */
  filename?: string;
  /** Lenient mode: suppress anomaly warnings and skip unknown keys silently. */
  ignoreInvalid?: boolean;
  /** Version of the running application (default: {@link APP_VERSION}). */
  appVersion?: Version | string;
  /** Where "file is newer" notices and flushed warnings go (default: console). */
  messages?: MessageSink;
  /** Decoder for `filename` values (default: path taken verbatim). */
  fileNames?: FileNameCodec;
}

/** Options for constructing a Writer. */
export interface WriterOptions {
  /** Version written to the `mse_version` preamble (default: {@link APP_VERSION}). */
  appVersion?: Version | string;
  /** Encoder for `filename` values (default: path written verbatim). */
  fileNames?: FileNameCodec;
}

/** Key of the version block every document starts with. */
export const VERSION_KEY = 'mse_version';

/** Version of this implementation of the format. */
export const APP_VERSION = '2.0.0';
