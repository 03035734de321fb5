import { InvalidKeywordError, KeyNotFoundError } from './errors.js';
import { canonicalKeyword, isBlockKeyword } from './keyword-table.js';

export type KeywordEntries = Iterable<readonly [string, string]>;

/**
 * Ordered keyword -> value mapping with case-insensitive keys.
 *
 * Every key is normalized to its canonical spelling on the way in, so
 * `set('user', ...)` and `get('USER')` address the same entry and iteration
 * yields `User`. `set` overwrites; callers that want first-value-wins go
 * through `mergeMissing`.
 */
export class KeywordSet implements Iterable<[string, string]> {
  private readonly values = new Map<string, string>();

  constructor(entries?: KeywordEntries) {
    for (const [key, value] of entries ?? []) {
      this.set(key, value);
    }
  }

  static fromObject(record: Readonly<Record<string, string>>): KeywordSet {
    return new KeywordSet(Object.entries(record));
  }

  /**
   * Canonical keyword for `name`.
   * @throws InvalidKeywordError for unknown names and for Host/Match.
   */
  static normalize(name: string): string {
    if (isBlockKeyword(name)) {
      throw new InvalidKeywordError(name, `${name} cannot be used as a keyword value`);
    }
    const canonical = canonicalKeyword(name);
    if (!canonical) {
      throw new InvalidKeywordError(name);
    }
    return canonical;
  }

  get size(): number {
    return this.values.size;
  }

  has(name: string): boolean {
    return this.values.has(KeywordSet.normalize(name));
  }

  /**
   * @throws KeyNotFoundError when the keyword is not set
   */
  get(name: string): string {
    const key = KeywordSet.normalize(name);
    const value = this.values.get(key);
    if (value === undefined) {
      throw new KeyNotFoundError(key);
    }
    return value;
  }

  find(name: string): string | undefined {
    return this.values.get(KeywordSet.normalize(name));
  }

  set(name: string, value: string): this {
    this.values.set(KeywordSet.normalize(name), value);
    return this;
  }

  delete(name: string): boolean {
    return this.values.delete(KeywordSet.normalize(name));
  }

  /**
   * Copy entries of `other` whose keyword is not already present.
   * Existing values are never overwritten.
   */
  mergeMissing(other: KeywordSet): this {
    for (const [key, value] of other) {
      if (!this.values.has(key)) {
        this.values.set(key, value);
      }
    }
    return this;
  }

  keys(): IterableIterator<string> {
    return this.values.keys();
  }

  entries(): IterableIterator<[string, string]> {
    return this.values.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.values.entries();
  }

  toObject(): Record<string, string> {
    return Object.fromEntries(this.values);
  }

  equals(other: KeywordSet): boolean {
    if (other.size !== this.size) {
      return false;
    }
    const theirs = Array.from(other);
    return Array.from(this).every(([key, value], index) => {
      const entry = theirs[index];
      return entry !== undefined && entry[0] === key && entry[1] === value;
    });
  }
}
