export type SshConfigErrorCode =
  | 'INVALID_KEYWORD'
  | 'KEY_NOT_FOUND'
  | 'INVALID_ARGUMENT'
  | 'PARSER_ERROR';

/**
 * Base class for every error raised by the config engine.
 */
export class SshConfigError extends Error {
  readonly code: SshConfigErrorCode;

  constructor(code: SshConfigErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * A keyword that is not in the keyword table, or a block keyword
 * (`Host`, `Match`) used where a data keyword is expected.
 */
export class InvalidKeywordError extends SshConfigError {
  constructor(readonly keyword: string, message = `Invalid keyword: ${keyword}`) {
    super('INVALID_KEYWORD', message);
  }
}

export class KeyNotFoundError extends SshConfigError {
  constructor(readonly keyword: string) {
    super('KEY_NOT_FOUND', `Keyword not set: ${keyword}`);
  }
}

export class InvalidArgumentError extends SshConfigError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

/**
 * Fatal parse failure. `line` is 1-based.
 */
export class ParserError extends SshConfigError {
  constructor(message: string, readonly line: number) {
    super('PARSER_ERROR', message);
  }
}
