import { BraceconfErrorCode, createDebugLogger, err, ok } from '@braceconf/types';
import type { Result } from '@braceconf/types';
import type { Token } from './types';
import { isParameterEligible, tokenToParameter } from './types';
import { Lexer } from './lexer';
import { Block, Comment, Config, Directive } from './model';
import type { DirectiveNode } from './model';
import { createRegistry } from './registry';
import type { DirectiveWrapperFn, Registry, RegistryOverrides, StatementCursor, WrapContext } from './registry';
import { ConfSyntaxError, ParseError } from './errors';

const dbg = createDebugLogger('braceconf:parser');

/** Options accepted by {@link Parser} and the `parse*` helpers. */
export interface ParserOptions extends RegistryOverrides {
  /** Source path, recorded on the resulting {@link Config} and on errors. */
  filePath?: string;
  /**
   * Reject tokens that cannot start a statement (a variable, a quoted
   * string, a stray `;` or `{`) instead of skipping them.
   */
  strict?: boolean;
}

/**
 * Recursive descent parser with a two-token window.
 *
 * Grammar:
 *   document  = { statement | COMMENT }* EOF
 *   block     = { statement | COMMENT }*
 *   statement = KEYWORD { parameter }* ( SEMICOLON | BLOCK_START block BLOCK_END )
 *   parameter = KEYWORD | VARIABLE | QUOTED_STRING | COMMENT
 *
 * After a name and its parameters the following token alone decides
 * between a simple directive (`;`), a block directive (`{`) and a syntax
 * error. Parsing stops at the first error.
 *
 * A parser owns its lexer and parses one document.
 */
export class Parser implements StatementCursor {
  private readonly lexer: Lexer;
  private readonly registry: Registry;
  private readonly strict: boolean;
  private readonly filePath: string | undefined;
  /** Names of the block directives enclosing the current position. */
  private readonly enclosing: string[] = [];
  private current: Token;
  private following: Token;

  /**
   * @throws {LexicalError} When the first two tokens cannot be scanned.
   */
  constructor(lexer: Lexer, options?: ParserOptions) {
    this.lexer = lexer;
    this.registry = createRegistry(options);
    this.strict = options?.strict ?? false;
    this.filePath = options?.filePath ?? lexer.filePath;
    this.current = lexer.scan();
    this.following = lexer.scan();
  }

  get currentToken(): Token {
    return this.current;
  }

  get followingToken(): Token {
    return this.following;
  }

  advance(): void {
    this.current = this.following;
    this.following = this.lexer.scan();
  }

  /**
   * Parse the whole document.
   *
   * @throws {ParseError} On the first lexical, syntax or semantic error.
   */
  parse(): Config {
    const stop = dbg.time('parse');
    try {
      const block = this.parseBlock();
      if (this.current.type === 'BLOCK_END') {
        throw this.syntaxError(
          BraceconfErrorCode.UNEXPECTED_BLOCK_END,
          'unexpected `}` with no open block',
          this.current,
        );
      }
      return new Config(block, this.filePath);
    } catch (e) {
      if (e instanceof ParseError && this.filePath !== undefined) {
        e.attachFilePath(this.filePath);
      }
      throw e;
    } finally {
      stop();
    }
  }

  /**
   * Parse statements until `}` or end of input. The terminating token is
   * left under the cursor for the caller.
   */
  parseBlock(): Block {
    const block = new Block();

    for (;;) {
      const tok = this.current;
      if (tok.type === 'EOF' || tok.type === 'BLOCK_END') {
        return block;
      }

      if (tok.type === 'KEYWORD') {
        block.append(this.parseStatement());
      } else if (tok.type === 'COMMENT') {
        block.append(new Comment(tok.value.slice(1).trim(), { line: tok.line, column: tok.column }));
      } else if (this.strict) {
        throw this.syntaxError(
          BraceconfErrorCode.EXPECTED_DIRECTIVE,
          `expected a directive name, got \`${tok.type}\` (\`${tok.value}\`)`,
          tok,
        );
      } else {
        dbg.warn('skipping', tok.type, `${tok.line}:${tok.column}`);
      }

      this.advance();
    }
  }

  parseBlockBody(owner: string): Block {
    const open = this.current;
    if (open.type !== 'BLOCK_START') {
      throw this.unexpected(open);
    }
    this.advance();

    this.enclosing.push(owner);
    const block = this.parseBlock();
    this.enclosing.pop();

    if (this.current.type !== 'BLOCK_END') {
      throw this.syntaxError(
        BraceconfErrorCode.UNCLOSED_BLOCK,
        `unexpected end of input, block \`${owner}\` is not closed`,
        open,
        'add the missing `}`',
      );
    }
    return block;
  }

  private parseStatement(): DirectiveNode {
    const nameTok = this.current;
    const name = nameTok.value;

    const statementParser = this.registry.statementParsers.get(name);
    if (statementParser !== undefined) {
      return statementParser(this);
    }

    const directive = new Directive(name, [], undefined, { line: nameTok.line, column: nameTok.column });
    const context: WrapContext = { parent: this.enclosing[this.enclosing.length - 1] };

    this.advance();
    while (isParameterEligible(this.current.type)) {
      directive.parameters.push(tokenToParameter(this.current));
      this.advance();
    }

    if (this.current.type === 'SEMICOLON') {
      return this.wrap(this.registry.directiveWrappers.get(name), directive, context);
    }

    if (this.current.type === 'BLOCK_START') {
      directive.block = this.parseBlockBody(name);
      return this.wrap(this.registry.blockWrappers.get(name), directive, context);
    }

    throw this.unexpected(this.current);
  }

  private wrap(wrapper: DirectiveWrapperFn | undefined, directive: Directive, context: WrapContext): DirectiveNode {
    if (wrapper === undefined) {
      return directive;
    }
    const node = wrapper(directive, context);
    if (node !== directive) {
      dbg.log('wrapped', directive.name, 'as', node.kind);
    }
    return node;
  }

  private unexpected(tok: Token): ConfSyntaxError {
    return this.syntaxError(
      BraceconfErrorCode.UNEXPECTED_TOKEN,
      `unexpected token \`${tok.type}\` (\`${tok.value}\`)`,
      tok,
    );
  }

  private syntaxError(code: BraceconfErrorCode, reason: string, tok: Token, hint?: string): ConfSyntaxError {
    return new ConfSyntaxError(
      code,
      reason,
      { line: tok.line, column: tok.column, filePath: this.filePath },
      hint !== undefined ? { hint } : undefined,
    );
  }
}

/**
 * Parse configuration text into a {@link Config}.
 *
 * @throws {ParseError} On the first lexical, syntax or semantic error.
 *
 * @example
 * ```typescript
 * const config = parse('http { upstream api { server 10.0.0.1:80; } }');
 * config.findUpstreams()[0]?.servers.length; // 1
 * ```
 */
export function parse(source: string, options?: ParserOptions): Config {
  const lexer = new Lexer(source, { filePath: options?.filePath });
  return new Parser(lexer, options).parse();
}

/**
 * Like {@link parse}, but reports parse failures as an error result.
 * Anything other than a {@link ParseError} is rethrown.
 */
export function tryParse(source: string, options?: ParserOptions): Result<Config, ParseError> {
  try {
    return ok(parse(source, options));
  } catch (e) {
    if (e instanceof ParseError) {
      return err(e);
    }
    throw e;
  }
}
