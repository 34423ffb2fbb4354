import { BraceconfErrorCode, createDebugLogger } from '@braceconf/types';
import type { QuoteChar, Token, TokenType } from './types';
import { LexicalError } from './errors';

const dbg = createDebugLogger('braceconf:lexer');

/** Options accepted by the {@link Lexer} constructor. */
export interface LexerOptions {
  /** Source path, attached to errors for diagnostics. */
  filePath?: string;
}

/**
 * Character-by-character tokenizer with a single character of lookahead.
 * Tracks 1-based line and column numbers for every token it emits.
 *
 * Whitespace is skipped, `;` `{` `}` are single-character tokens, `#`
 * starts a comment running to end of line, `$` starts a variable, a quote
 * starts a quoted string and anything else starts a bare keyword.
 */
export class Lexer {
  readonly filePath: string | undefined;
  private readonly source: string;
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(source: string, options?: LexerOptions) {
    this.source = source;
    this.filePath = options?.filePath;
  }

  /**
   * Return the next token. Once the input is exhausted every call returns
   * an `EOF` token.
   *
   * @throws {LexicalError} When a quoted string is not terminated.
   */
  scan(): Token {
    this.skipWhitespace();

    const ch = this.peek();
    let token: Token;
    switch (ch) {
      case '':
        token = this.makeToken('EOF', '', this.line, this.column);
        break;
      case ';':
        token = this.single('SEMICOLON');
        break;
      case '{':
        token = this.single('BLOCK_START');
        break;
      case '}':
        token = this.single('BLOCK_END');
        break;
      case '#':
        token = this.scanComment();
        break;
      case '$':
        token = this.scanWord('VARIABLE');
        break;
      default:
        token = isQuote(ch) ? this.scanQuotedString(ch) : this.scanWord('KEYWORD');
    }

    if (dbg.enabled) {
      dbg.log(token.type, JSON.stringify(token.value), `${token.line}:${token.column}`);
    }
    return token;
  }

  /** Scan every remaining token, including the trailing `EOF`. */
  all(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const token = this.scan();
      tokens.push(token);
      if (token.type === 'EOF') {
        return tokens;
      }
    }
  }

  // ── Character access ──────────────────────────────────────────────────────

  /** The next character as a whole code point, so columns count characters. */
  private peek(): string {
    const code = this.source.codePointAt(this.pos);
    return code === undefined ? '' : String.fromCodePoint(code);
  }

  private read(): string {
    const ch = this.peek();
    if (ch === '') {
      return ch;
    }
    this.pos += ch.length;
    if (ch === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return ch;
  }

  private skipWhitespace(): void {
    while (isSpace(this.peek())) {
      this.read();
    }
  }

  // ── Token scanners ────────────────────────────────────────────────────────

  private makeToken(type: TokenType, value: string, line: number, column: number, quote?: QuoteChar): Token {
    return quote === undefined ? { type, value, line, column } : { type, value, line, column, quote };
  }

  private single(type: TokenType): Token {
    const { line, column } = this;
    return this.makeToken(type, this.read(), line, column);
  }

  private scanComment(): Token {
    const { line, column } = this;
    let text = this.read();
    while (this.peek() !== '' && !isEndOfLine(this.peek())) {
      text += this.read();
    }
    return this.makeToken('COMMENT', text, line, column);
  }

  private scanWord(type: 'KEYWORD' | 'VARIABLE'): Token {
    const { line, column } = this;
    let text = this.read();
    while (this.peek() !== '' && !isWordTerminator(this.peek())) {
      text += this.read();
    }
    return this.makeToken(type, text, line, column);
  }

  /**
   * Scan a string delimited by `delimiter`. The escapes `\n`, `\r`, `\t`,
   * `\\` and `\<delimiter>` are decoded; a backslash before any other
   * character is kept as is.
   */
  private scanQuotedString(delimiter: QuoteChar): Token {
    const { line, column } = this;
    this.read();
    let text = '';

    for (;;) {
      const ch = this.read();

      if (ch === '') {
        throw new LexicalError(
          BraceconfErrorCode.UNTERMINATED_STRING,
          'unterminated string, unexpected end of input while scanning a quoted string',
          { line, column, filePath: this.filePath },
          { hint: `add the closing ${delimiter}` },
        );
      }

      if (ch === '\\') {
        const escaped = decodeEscape(this.peek(), delimiter);
        if (escaped !== undefined) {
          this.read();
          text += escaped;
          continue;
        }
      }

      if (ch === delimiter) {
        break;
      }
      text += ch;
    }

    return this.makeToken('QUOTED_STRING', text, line, column, delimiter);
  }
}

/**
 * Tokenize `source` in one go.
 *
 * @returns Every token in order, ending with `EOF`.
 * @throws {LexicalError} When a quoted string is not terminated.
 */
export function tokenize(source: string, options?: LexerOptions): Token[] {
  return new Lexer(source, options).all();
}

function decodeEscape(ch: string, delimiter: QuoteChar): string | undefined {
  switch (ch) {
    case 'n':
      return '\n';
    case 'r':
      return '\r';
    case 't':
      return '\t';
    case '\\':
      return '\\';
    case delimiter:
      return delimiter;
    default:
      return undefined;
  }
}

function isQuote(ch: string): ch is QuoteChar {
  return ch === '"' || ch === "'" || ch === '`';
}

function isEndOfLine(ch: string): boolean {
  return ch === '\r' || ch === '\n';
}

function isSpace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || isEndOfLine(ch);
}

function isWordTerminator(ch: string): boolean {
  return isSpace(ch) || ch === '{' || ch === ';';
}
