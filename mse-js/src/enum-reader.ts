/**
 * MSE Enum Reader — matches a value against the names of an enumeration.
 *
 * @example
 * ```ts
 * type Align = 'start' | 'end';
 *
 * const er = new EnumReader<Align>(reader.getValue());
 * er.handle('left', 'start');
 * er.handle('right', 'end');
 * er.warnIfNotDone(reader);
 * align = er.value ?? align;
 * ```
 */

import { InternalError, ParseError } from './errors.js';

/** Anything warnings can be reported to. */
export interface WarningTarget {
  warning(message: string): void;
}

export class EnumReader<T> {
  private first: string | undefined;
  private matched = false;
  private result: T | undefined;

  /** @param read - The text being decoded. */
  constructor(readonly read: string) {}

  /** Offer one candidate; the first whose name equals the text wins. */
  handle(name: string, value: T): void {
    if (this.first === undefined) this.first = name;
    if (!this.matched && this.read === name) {
      this.matched = true;
      this.result = value;
    }
  }

  /** Whether any candidate matched. */
  get done(): boolean {
    return this.matched;
  }

  /** The matched value, if any. */
  get value(): T | undefined {
    return this.result;
  }

  notDoneErrorMessage(): string {
    if (this.first === undefined) {
      throw new InternalError('No first value in EnumReader');
    }
    return `Unrecognized value '${this.read}', expected for instance '${this.first}'`;
  }

  /** For enums with a usable default. */
  warnIfNotDone(target: WarningTarget): void {
    if (!this.matched) {
      target.warning(this.notDoneErrorMessage());
    }
  }

  /** For enums without one. */
  errorIfNotDone(): void {
    if (!this.matched) {
      throw new ParseError(this.notDoneErrorMessage());
    }
  }
}
