import { InvalidArgumentError } from './errors.js';
import { compileGlob } from '../utils/glob-match.js';

/**
 * One `Host` token. A leading `!` marks the pattern as negated and is not
 * part of the glob.
 */
export class HostPattern {
  private readonly regex: RegExp;

  private constructor(
    readonly glob: string,
    readonly negated: boolean,
  ) {
    this.regex = compileGlob(glob);
  }

  static parse(token: string): HostPattern {
    return token.startsWith('!') ? new HostPattern(token.slice(1), true) : new HostPattern(token, false);
  }

  matches(hostname: string): boolean {
    return this.regex.test(hostname);
  }

  toString(): string {
    return this.negated ? `!${this.glob}` : this.glob;
  }
}

/**
 * The pattern list of a single `Host` line.
 *
 * A hostname matches when at least one positive pattern matches and no
 * negated pattern does. A matching negated pattern vetoes the whole list
 * wherever it appears.
 */
export class HostList implements Iterable<HostPattern> {
  readonly patterns: readonly HostPattern[];

  constructor(patterns: Iterable<string | HostPattern> = []) {
    this.patterns = Array.from(patterns, pattern =>
      typeof pattern === 'string' ? HostPattern.parse(pattern) : pattern,
    );
  }

  static wildcard(): HostList {
    return new HostList(['*']);
  }

  get size(): number {
    return this.patterns.length;
  }

  /**
   * @throws InvalidArgumentError when `hostname` is empty
   */
  matches(hostname: string): boolean {
    if (!hostname) {
      throw new InvalidArgumentError('hostname cannot be empty');
    }

    let anyPositive = false;
    let anyNegative = false;
    for (const pattern of this.patterns) {
      if (!pattern.matches(hostname)) continue;
      if (pattern.negated) {
        anyNegative = true;
      } else {
        anyPositive = true;
      }
    }

    return anyNegative ? false : anyPositive;
  }

  equals(other: HostList): boolean {
    return (
      other.patterns.length === this.patterns.length &&
      this.patterns.every((pattern, index) => other.patterns[index]?.toString() === pattern.toString())
    );
  }

  [Symbol.iterator](): Iterator<HostPattern> {
    return this.patterns[Symbol.iterator]();
  }

  toString(): string {
    return this.patterns.map(String).join(' ');
  }
}
