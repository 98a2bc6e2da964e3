import { FormatError } from "./errors.js";

// Tags look like "<prefix>-1.2.3"; the prefix is anything without digits.
const VERSION_PATTERN = /^\D*(\d+)\.(\d+)\.(\d+)$/;

export type VersionComponentIndex = 0 | 1 | 2;

/**
 * Immutable major.minor.patch triple.
 *
 * Ordering is total (major, then minor, then patch) and is what decides the
 * "nearest" tag among candidates reachable from a commit.
 */
export class SemanticVersion {
  static readonly MAJOR_INDEX = 0 as const;
  static readonly MINOR_INDEX = 1 as const;
  static readonly PATCH_INDEX = 2 as const;

  private constructor(
    public readonly major: number,
    public readonly minor: number,
    public readonly patch: number,
  ) {}

  static parse(text: string): SemanticVersion {
    const match = VERSION_PATTERN.exec(text.trim());
    if (!match) {
      throw new FormatError(`Malformed semantic version "${text}"`);
    }

    return new SemanticVersion(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  static tryParse(text: string): SemanticVersion | null {
    try {
      return SemanticVersion.parse(text);
    } catch (err) {
      if (err instanceof FormatError) return null;
      throw err;
    }
  }

  static fromComponents(major: number, minor: number, patch: number): SemanticVersion {
    for (const value of [major, minor, patch]) {
      if (!Number.isInteger(value) || value < 0) {
        throw new FormatError(
          `Version components must be non-negative integers (got ${major}.${minor}.${patch})`,
        );
      }
    }
    return new SemanticVersion(major, minor, patch);
  }

  static compare(a: SemanticVersion, b: SemanticVersion): number {
    return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
  }

  compareTo(other: SemanticVersion): number {
    return SemanticVersion.compare(this, other);
  }

  equals(other: SemanticVersion): boolean {
    return this.compareTo(other) === 0;
  }

  next(index: VersionComponentIndex): SemanticVersion {
    switch (index) {
      case SemanticVersion.MAJOR_INDEX:
        return new SemanticVersion(this.major + 1, 0, 0);
      case SemanticVersion.MINOR_INDEX:
        return new SemanticVersion(this.major, this.minor + 1, 0);
      case SemanticVersion.PATCH_INDEX:
        return new SemanticVersion(this.major, this.minor, this.patch + 1);
    }
  }

  toVersion(): string {
    return `${this.major}.${this.minor}.${this.patch}`;
  }

  toTag(prefix: string): string {
    return `${prefix}-${this.toVersion()}`;
  }

  toString(): string {
    return this.toVersion();
  }
}
