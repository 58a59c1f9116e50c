/**
 * mse-reader
 *
 * Reader and writer for MSE structured text: a tab-indented key/value
 * format with multi-line text blocks.
 *
 * @example
 * ```ts
 * import { Reader } from 'mse-reader';
 *
 * const reader = new Reader('mse_version: 2.0.0\ncount: 3\n');
 * const count = reader.handleField('count', 'int', 0);
 * reader.showWarnings();
 * ```
 *
 * @packageDocumentation
 */

// Types
export type {
  FileNameCodec,
  LocalFileName,
  Message,
  MessageSeverity,
  MessageSink,
  ParseState,
  ReaderOptions,
  ReaderWarning,
  Tribool,
  ValueKind,
  ValueTypes,
  Vector2D,
  WriterOptions,
} from './types.js';

export { APP_VERSION, VERSION_KEY } from './types.js';

// Errors
export { DecodeError, InternalError, ParseError } from './errors.js';

// Versions and names
export { NO_VERSION, Version } from './version.js';
export { canonicalName } from './names.js';

// Input
export { ByteInput } from './input.js';
export type { InputStream } from './input.js';
export { LineDecoder, eatUtf8Bom } from './line-decoder.js';
export { classifyLine, isBlankLine } from './line-classifier.js';
export type { ClassifiedLine, LineAnomaly, LineAnomalyKind } from './line-classifier.js';

// Reading
export { Reader } from './reader.js';
export { DECODERS, decodeValue, parseDateTime, verbatimFileNames } from './decoders.js';
export type { DecodeContext, Decoder, DecoderTable } from './decoders.js';
export { EnumReader } from './enum-reader.js';
export type { WarningTarget } from './enum-reader.js';

// Messages
export { MessageQueue, consoleMessages } from './messages.js';

// Writing
export { Writer, formatDateTime } from './writer.js';

// Outline
export { readOutline, formatOutline, outlineToJSON } from './outline.js';
export type { OutlineNode } from './outline.js';
