import { InvalidArgumentError } from './errors.js';
import { HostList } from './host-pattern.js';
import { KeywordSet } from './keyword-set.js';

/**
 * A `Host` line together with the keywords declared under it.
 */
export class HostBlock {
  constructor(
    readonly hosts: HostList,
    readonly keywords: KeywordSet,
  ) {}

  matches(hostname: string): boolean {
    return this.hosts.matches(hostname);
  }

  equals(other: HostBlock): boolean {
    return this.hosts.equals(other.hosts) && this.keywords.equals(other.keywords);
  }
}

/**
 * Ordered list of host blocks. Block order is precedence order: for a given
 * hostname the earliest matching block supplies each keyword.
 */
export class SshConfig implements Iterable<HostBlock> {
  private readonly entries: HostBlock[] = [];

  constructor(blocks: Iterable<HostBlock> = []) {
    for (const block of blocks) {
      this.append(block);
    }
  }

  get blocks(): readonly HostBlock[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  append(block: HostBlock): this {
    this.entries.push(block);
    return this;
  }

  /**
   * Add keywords for a host list. When a block with the same pattern list
   * already exists its values are kept and only missing keywords are filled
   * in; otherwise a new block is appended.
   */
  add(hosts: HostList, keywords: KeywordSet): HostBlock {
    const existing = this.entries.find(block => block.hosts.equals(hosts));
    if (existing) {
      existing.keywords.mergeMissing(keywords);
      return existing;
    }
    const block = new HostBlock(hosts, keywords);
    this.entries.push(block);
    return block;
  }

  /**
   * @throws InvalidArgumentError when `hostname` is empty
   */
  getMatchingHosts(hostname: string): HostBlock[] {
    if (!hostname) {
      throw new InvalidArgumentError('hostname cannot be empty');
    }
    return this.entries.filter(block => block.matches(hostname));
  }

  getConfigForHost(hostname: string): KeywordSet {
    return this.getMatchingHosts(hostname).reduce(
      (merged, block) => merged.mergeMissing(block.keywords),
      new KeywordSet(),
    );
  }

  equals(other: SshConfig): boolean {
    return (
      other.size === this.size && this.entries.every((block, index) => {
        const theirs = other.blocks[index];
        return theirs !== undefined && block.equals(theirs);
      })
    );
  }

  [Symbol.iterator](): Iterator<HostBlock> {
    return this.entries[Symbol.iterator]();
  }
}
