/** Token types produced by the lexer. */
export type TokenType =
  | 'EOF'
  | 'KEYWORD'
  | 'SEMICOLON'
  | 'BLOCK_START'
  | 'BLOCK_END'
  | 'COMMENT'
  | 'VARIABLE'
  | 'QUOTED_STRING';

/** Characters that open and close a quoted string. */
export type QuoteChar = '"' | "'" | '`';

/** A single lexer token with position information for error reporting. */
export interface Token {
  /** The token classification. */
  readonly type: TokenType;
  /**
   * The token text. For quoted strings this is the decoded contents without
   * the delimiters; for comments it includes the leading `#`.
   */
  readonly value: string;
  /** 1-based line number where the token starts. */
  readonly line: number;
  /** 1-based column number where the token starts. */
  readonly column: number;
  /** Delimiter of a `QUOTED_STRING` token. */
  readonly quote?: QuoteChar;
}

/**
 * One directive parameter.
 *
 * `quote` is kept from the source so rendering can restore the original
 * delimiter. `comment` marks a `#` comment that appeared inside the
 * parameter list.
 */
export interface Parameter {
  readonly value: string;
  readonly quote?: QuoteChar;
  readonly comment?: true;
}

/** Token types that may appear as a directive parameter. */
export function isParameterEligible(type: TokenType): boolean {
  return type !== 'BLOCK_START' && type !== 'BLOCK_END' && type !== 'SEMICOLON' && type !== 'EOF';
}

/** Build the {@link Parameter} a token contributes to a directive. */
export function tokenToParameter(token: Token): Parameter {
  if (token.type === 'QUOTED_STRING' && token.quote !== undefined) {
    return { value: token.value, quote: token.quote };
  }
  if (token.type === 'COMMENT') {
    return { value: token.value, comment: true };
  }
  return { value: token.value };
}

/** Wrap plain strings as unquoted parameters. */
export function toParameters(values: readonly string[]): Parameter[] {
  return values.map((value) => ({ value }));
}
