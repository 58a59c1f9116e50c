/**
 * MSE Reader — schema-driven reader for MSE structured text.
 *
 * Documents nest by leading tabs:
 *
 *   mse_version: 2.0.0
 *   title: My set
 *   style:
 *   	border: 2
 *   notes:
 *   	A text block spans
 *   	several lines.
 *
 * The caller knows the schema and walks it with enterBlock / handle /
 * exitBlock. Keys the caller never asks for are skipped when their block is
 * exited. Recoverable problems become warnings (see showWarnings); only
 * encoding errors and corrupt dates or vectors throw a ParseError.
 *
 * @example
 * ```ts
 * import { Reader } from 'mse-reader';
 *
 * const reader = Reader.fromFile('set.mse');
 * let title = '';
 * let border = 1;
 * reader.handleGreedy((r) => {
 *   title = r.handleField('title', 'text', title);
 *   r.handleBlock('style', () => {
 *     border = r.handleField('border', 'int', border);
 *   });
 * });
 * reader.showWarnings();
 * ```
 */

import { decodeValue, verbatimFileNames } from './decoders.js';
import type { DecodeContext } from './decoders.js';
import { EnumReader } from './enum-reader.js';
import { DecodeError, ParseError, assertContract } from './errors.js';
import { ByteInput } from './input.js';
import type { InputStream } from './input.js';
import { classifyLine, isBlankLine } from './line-classifier.js';
import { LineDecoder, eatUtf8Bom } from './line-decoder.js';
import { consoleMessages } from './messages.js';
import { canonicalName } from './names.js';
import { APP_VERSION, VERSION_KEY } from './types.js';
import type {
  MessageSink,
  ParseState,
  ReaderOptions,
  ReaderWarning,
  ValueKind,
  ValueTypes,
} from './types.js';
import { NO_VERSION, Version } from './version.js';

export class Reader {
  /** Name of the file being read, for diagnostics. */
  readonly filename: string;
  /** Lenient mode. */
  readonly ignoreInvalid: boolean;

  private readonly appVersion: Version;
  private readonly messages: MessageSink;
  private readonly lines: LineDecoder;
  private readonly decodeContext: DecodeContext;

  private line = '';
  /** Whether `line` was actually read, as opposed to the end of the stream. */
  private lineRead = false;
  private currentIndent = 0;
  private currentKey = '';
  private currentValue = '';
  private expected = 0;
  private parseState: ParseState = 'outside';
  private lineNo = 0;
  private previousLineNo = 0;
  private previousValue = '';
  private warningLog: ReaderWarning[] = [];
  private fileVersion: Version = NO_VERSION;

  /**
   * Open a document and consume its `mse_version` preamble.
   *
   * @param input - The stream to read; bytes and strings are wrapped.
   * @throws {ParseError} If the first lines are not valid UTF-8.
   */
  constructor(input: InputStream | Uint8Array | string, options: ReaderOptions = {}) {
    this.filename = options.filename ?? '<input>';
    this.ignoreInvalid = options.ignoreInvalid ?? false;
    this.appVersion = Version.from(options.appVersion ?? APP_VERSION);
    this.messages = options.messages ?? consoleMessages;
    this.decodeContext = {
      warning: (message) => this.warning(message),
      fileNames: options.fileNames ?? verbatimFileNames,
    };

    const stream =
      typeof input === 'string'
        ? new ByteInput(new TextEncoder().encode(input))
        : input instanceof Uint8Array
          ? new ByteInput(input)
          : input;
    this.lines = new LineDecoder(stream);
    eatUtf8Bom(stream);
    this.moveNext();
    this.handleAppVersion();
  }

  /** Open a file on disk; its path becomes the diagnostics name. */
  static fromFile(path: string, options: ReaderOptions = {}): Reader {
    return new Reader(ByteInput.fromFile(path), { filename: path, ...options });
  }

  // ------------------------------------------------------------------
  // Position
  // ------------------------------------------------------------------

  /** Canonical key of the current line; empty at the end of the input. */
  get key(): string {
    return this.currentKey;
  }

  /** Inline value of the current line. */
  get value(): string {
    return this.currentValue;
  }

  /** Indentation of the current line; -1 at the end of the input. */
  get indent(): number {
    return this.currentIndent;
  }

  /** Number of blocks currently open. */
  get expectedIndent(): number {
    return this.expected;
  }

  get state(): ParseState {
    return this.parseState;
  }

  get lineNumber(): number {
    return this.lineNo;
  }

  /** Version named by the file's `mse_version` block (0.0.0 without one). */
  get fileAppVersion(): Version {
    return this.fileVersion;
  }

  // ------------------------------------------------------------------
  // Blocks
  // ------------------------------------------------------------------

  /**
   * Enter whatever block starts at the current line.
   *
   * @returns `false`, consuming nothing more, if the line is not part of the
   *   current block.
   */
  enterAnyBlock(): boolean {
    if (this.parseState === 'entered') this.moveNext(); // on the parent's key, move inside it
    if (this.currentIndent !== this.expected) return false;
    this.parseState = 'entered';
    this.expected += 1;
    return true;
  }

  /** Enter the block at the current line if its key is `name`. */
  enterBlock(name: string): boolean {
    if (this.parseState === 'entered') this.moveNext();
    if (this.currentIndent !== this.expected) return false;
    if (this.currentKey !== canonicalName(name)) return false;
    this.parseState = 'entered';
    this.expected += 1;
    return true;
  }

  /**
   * Leave the innermost block, skipping whatever the caller did not read.
   *
   * In strict mode, keys left over directly inside a block the caller
   * descended into are reported as unexpected.
   */
  exitBlock(): void {
    assertContract(this.expected > 0, 'exitBlock() called without an open block');
    assertContract(this.parseState !== 'unhandled', 'exitBlock() called with an unhandled value');
    this.expected -= 1;
    this.previousValue = '';
    const descended = this.parseState !== 'entered';
    if (!descended) this.moveNext(); // leave this key
    while (this.currentIndent > this.expected) {
      if (descended && !this.ignoreInvalid && this.currentIndent === this.expected + 1) {
        this.warning(`Unexpected key: '${this.currentKey}'`, 0, false);
      }
      this.moveNext();
    }
    this.parseState = 'handled';
  }

  /** Skip the current key, and everything under it, as not understood. */
  unknownKey(): void {
    if (this.ignoreInvalid) {
      this.skipKey();
      return;
    }
    if (this.currentIndent >= this.expected) {
      this.warning(`Unexpected key: '${this.currentKey}'`, 0, false);
      this.skipKey();
    }
    // else: could be a nameless value, which doesn't exit a block to move past its own key
  }

  // ------------------------------------------------------------------
  // Values
  // ------------------------------------------------------------------

  /**
   * Read the raw value of the current key: the inline value, or the text
   * block indented under it.
   */
  getValue(): string {
    assertContract(this.parseState !== 'handled', 'value handled twice');
    if (this.parseState === 'unhandled') {
      this.parseState = 'handled';
      return this.previousValue;
    }
    if (this.currentValue !== '') {
      this.previousValue = this.currentValue;
      this.moveNext();
      return this.previousValue;
    }
    return this.readTextBlock();
  }

  /**
   * Decode the current value.
   *
   * @returns The decoded value, or `current` when a recoverable decode fails.
   * @throws {ParseError} For a corrupt date or vector.
   */
  handle<K extends ValueKind>(kind: K, current: ValueTypes[K]): ValueTypes[K] {
    const raw = this.getValue();
    return this.onValueLine(() => decodeValue(kind, raw, current, this.decodeContext));
  }

  /** Decode a string enumeration; unknown names warn, or throw with `'error'`. */
  handleEnum<T extends string>(names: readonly T[], current: T, onUnknown: 'warn' | 'error' = 'warn'): T {
    const er = new EnumReader<T>(this.getValue());
    for (const name of names) {
      er.handle(name, name);
    }
    if (onUnknown === 'error') {
      this.onValueLine(() => er.errorIfNotDone());
    } else {
      er.warnIfNotDone(this);
    }
    return er.value ?? current;
  }

  /** Decode the value of key `name`, if the current line has that key. */
  handleField<K extends ValueKind>(name: string, kind: K, current: ValueTypes[K]): ValueTypes[K] {
    if (!this.enterBlock(name)) return current;
    const value = this.handle(kind, current);
    this.exitBlock();
    return value;
  }

  /** Run `body` inside block `name`, if the current line has that key. */
  handleBlock(name: string, body: () => void): boolean {
    if (!this.enterBlock(name)) return false;
    body();
    this.exitBlock();
    return true;
  }

  /**
   * Read every key of the current block. `reflect` is called once per key
   * and handles the ones it knows; the rest go to unknownKey().
   */
  handleGreedy(reflect: (reader: Reader) => void): void {
    if (this.parseState === 'entered') this.moveNext();
    do {
      this.parseState = 'outside';
      reflect(this);
      if (this.state !== 'handled' && this.currentIndent >= this.expected) this.unknownKey();
    } while (this.currentIndent >= this.expected);
    this.parseState = 'handled';
  }

  /** Skip key `name` in files older than `endVersion`, which still wrote it. */
  handleIgnore(endVersion: Version | string, name: string): void {
    if (this.fileVersion.isOlderThan(Version.from(endVersion))) {
      if (this.enterBlock(name)) this.exitBlock();
    }
  }

  /** Make the next getValue() return the value just read again. */
  unhandle(): void {
    assertContract(this.parseState === 'handled', 'unhandle() called before a value was handled');
    this.parseState = 'unhandled';
  }

  // ------------------------------------------------------------------
  // Diagnostics
  // ------------------------------------------------------------------

  /**
   * Record a warning.
   *
   * @param lineDelta - Added to the line number.
   * @param onPreviousLine - Report against the line before the last advance,
   *   which is where a value just handled came from.
   */
  warning(message: string, lineDelta = 0, onPreviousLine = true): void {
    const line = (onPreviousLine ? this.previousLineNo : this.lineNo) + lineDelta;
    this.warningLog.push({ line, message });
  }

  /** Warnings recorded since the last showWarnings(). */
  get warnings(): readonly ReaderWarning[] {
    return [...this.warningLog];
  }

  /** Queue all recorded warnings as one message, then forget them. */
  showWarnings(): void {
    if (this.warningLog.length === 0) return;
    const details = this.warningLog.map((w) => `\nOn line ${w.line}: \t${w.message}`).join('');
    this.messages.queueMessage('warning', `Warnings while reading file:\n${this.filename}\n${details}`);
    this.warningLog = [];
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private handleAppVersion(): void {
    if (!this.enterBlock(VERSION_KEY)) return;
    this.fileVersion = this.handle('version', this.fileVersion);
    if (this.fileVersion.isNewerThan(this.appVersion)) {
      this.messages.queueMessage(
        'warning',
        `${this.filename}: made with a newer version of the application (${this.fileVersion}); ` +
          'some of its contents may not be read.',
      );
    }
    this.exitBlock();
  }

  private readTextBlock(): string {
    let text = '';
    let pendingNewlines = 0;
    this.readLine(true);
    this.previousLineNo = this.lineNo;
    while (this.currentIndent >= this.expected && this.lineRead) {
      text += '\n'.repeat(pendingNewlines);
      pendingNewlines = 0;
      text += this.line.substring(this.expected); // strip expected indent
      do {
        this.readLine(true);
        pendingNewlines++;
        // blank lines that are not indented enough may still be inside the block
      } while (isBlankLine(this.line) && this.currentIndent < this.expected && this.lineRead);
    }
    // moveNext(), but the line after the block has been read already
    this.parseState = 'handled';
    this.skipBlankLines();
    if (this.currentIndent >= this.expected) {
      this.warning(
        'Blank line or comment in text block, that is insufficiently indented.\n' +
          "\t\tEither indent the comment/blank line, or add a 'key:' after it.\n" +
          '\t\tThis could cause more error messages.\n',
        -1,
        false,
      );
    }
    this.previousValue = text;
    return text;
  }

  /** Run a decode step; a ParseError without a line gets the line of the value just read. */
  private onValueLine<T>(decode: () => T): T {
    try {
      return decode();
    } catch (err) {
      if (err instanceof ParseError && err.line === undefined) {
        const line = this.previousLineNo;
        throw new ParseError(`${err.message} on line ${line}`, line);
      }
      throw err;
    }
  }

  private skipKey(): void {
    do {
      this.moveNext();
    } while (this.currentIndent > this.expected);
  }

  private moveNext(): void {
    this.previousLineNo = this.lineNo;
    this.parseState = 'handled';
    this.currentKey = '';
    this.currentIndent = -1; // a missing line never has the expected indentation
    this.skipBlankLines();
  }

  private skipBlankLines(): void {
    while (this.currentKey === '' && !this.lines.eof()) {
      this.readLine();
    }
    if (this.currentKey === '') {
      this.currentIndent = -1; // end of the input
    }
  }

  private readLine(inText = false): void {
    this.lineNo += 1;
    let text: string | null;
    try {
      text = this.lines.readLine();
    } catch (err) {
      if (err instanceof DecodeError) {
        throw new ParseError(`${err.message} on line ${this.lineNo}`, this.lineNo);
      }
      throw err;
    }
    this.lineRead = text !== null;
    this.line = text ?? '';
    const classified = classifyLine(this.line, inText, this.ignoreInvalid);
    this.currentIndent = classified.indent;
    this.currentKey = classified.key;
    this.currentValue = classified.value;
    if (!this.ignoreInvalid) {
      for (const anomaly of classified.anomalies) {
        this.warning(anomaly.message, 0, false);
      }
    }
  }
}
