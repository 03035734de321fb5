import { InvalidKeywordError, ParserError } from './errors.js';
import { HostList } from './host-pattern.js';
import { KeywordSet } from './keyword-set.js';
import { HostBlock, SshConfig } from './ssh-config.js';
import { noopLogger, type ILoggingService } from '../services/service-interfaces.js';

export interface SshConfigParserDeps {
  loggingService?: ILoggingService;
}

const LINE_BREAK = /\r\n|\r|\n/;
const KEYWORD_LINE = /^(\S+)\s+(\S[\s\S]*)$/;

const stripComment = (line: string): string => {
  const hashIndex = line.indexOf('#');
  return hashIndex === -1 ? line : line.slice(0, hashIndex);
};

/**
 * Single-pass, line-oriented ssh_config parser.
 *
 * Keywords that appear before the first `Host` line belong to an implicit
 * `Host *` block. Within a block the first occurrence of a keyword wins and
 * later ones are ignored. Any error aborts the whole parse.
 *
 * A parser instance is single-use per `parse` call; state is reset on entry.
 */
export class SshConfigParser {
  private readonly logger: ILoggingService;

  private config = new SshConfig();
  private currentHosts = HostList.wildcard();
  private currentKeywords = new KeywordSet();
  private isFirstBlock = true;
  private sawHostLine = false;
  private lineNumber = 0;

  constructor(deps: SshConfigParserDeps = {}) {
    this.logger = deps.loggingService ?? noopLogger;
  }

  parse(text: string): SshConfig {
    this.reset();

    for (const rawLine of text.split(LINE_BREAK)) {
      this.lineNumber += 1;
      const line = stripComment(rawLine);
      const trimmed = line.trim();
      if (!trimmed) {
        continue;
      }

      const [first = ''] = trimmed.split(/\s+/, 1);
      const directive = first.toLowerCase();

      if (directive === 'host') {
        this.parseHost(trimmed);
      } else if (directive === 'match') {
        throw new ParserError(
          `Match keyword is not supported at line ${this.lineNumber}: ${trimmed}`,
          this.lineNumber,
        );
      } else {
        this.parseKeyword(line);
      }
    }

    this.closeBlock();

    const config = this.config;
    this.logger.debug('Parsed SSH config', {
      blocks: config.size,
      lines: this.lineNumber,
    });
    return config;
  }

  private reset(): void {
    this.config = new SshConfig();
    this.currentHosts = HostList.wildcard();
    this.currentKeywords = new KeywordSet();
    this.isFirstBlock = true;
    this.sawHostLine = false;
    this.lineNumber = 0;
  }

  private parseHost(trimmed: string): void {
    this.closeBlock();

    const tokens = trimmed.split(/\s+/).slice(1);
    if (tokens.length === 0) {
      throw new ParserError(`Empty Host keyword at line ${this.lineNumber}`, this.lineNumber);
    }

    this.currentHosts = new HostList(tokens);
    this.sawHostLine = true;
  }

  private parseKeyword(line: string): void {
    const match = KEYWORD_LINE.exec(line.trimStart());
    const keyword = match?.[1];
    const value = match?.[2];
    if (keyword === undefined || value === undefined) {
      throw new ParserError(`Invalid syntax at line ${this.lineNumber}: ${line.trim()}`, this.lineNumber);
    }

    let entry: KeywordSet;
    try {
      entry = new KeywordSet([[keyword, value]]);
    } catch (error) {
      if (error instanceof InvalidKeywordError) {
        throw new ParserError(`Invalid keyword at line ${this.lineNumber}: ${keyword}`, this.lineNumber);
      }
      throw error;
    }

    if (this.currentKeywords.has(keyword)) {
      this.logger.debug('Ignoring repeated keyword', { keyword, line: this.lineNumber });
    }
    this.currentKeywords.mergeMissing(entry);
  }

  private closeBlock(): void {
    const isFirstBlock = this.isFirstBlock;
    this.isFirstBlock = false;

    if (isFirstBlock && !this.sawHostLine && this.currentKeywords.size === 0) {
      return;
    }

    this.config.append(new HostBlock(this.currentHosts, this.currentKeywords));
    this.currentKeywords = new KeywordSet();
  }
}

export function parseSshConfig(text: string, deps?: SshConfigParserDeps): SshConfig {
  return new SshConfigParser(deps).parse(text);
}
