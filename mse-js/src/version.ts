/**
 * MSE Version — `major.minor.build` application versions.
 */

const VERSION_PATTERN = /^(\d+)(?:\.(\d+))?(?:\.(\d+))?$/;

export class Version {
  constructor(
    readonly major: number,
    readonly minor = 0,
    readonly build = 0,
  ) {}

  /**
   * Parse `major[.minor[.build]]`; missing parts are 0.
   *
   * @returns The version, or `undefined` if the text is not a version.
   */
  static parse(text: string): Version | undefined {
    const match = VERSION_PATTERN.exec(text.trim());
    if (!match) return undefined;
    return new Version(Number(match[1]), Number(match[2] ?? 0), Number(match[3] ?? 0));
  }

  /** Coerce an option value; throws on a malformed string. */
  static from(value: Version | string): Version {
    if (value instanceof Version) return value;
    const parsed = Version.parse(value);
    if (!parsed) {
      throw new Error(`Invalid version: '${value}'`);
    }
    return parsed;
  }

  /** Negative, zero or positive as this version is older, equal or newer. */
  compare(other: Version): number {
    return this.major - other.major || this.minor - other.minor || this.build - other.build;
  }

  isNewerThan(other: Version): boolean {
    return this.compare(other) > 0;
  }

  isOlderThan(other: Version): boolean {
    return this.compare(other) < 0;
  }

  toString(): string {
    return `${this.major}.${this.minor}.${this.build}`;
  }
}

/** Version of a file without an `mse_version` block. */
export const NO_VERSION = new Version(0);
