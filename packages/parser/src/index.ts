/**
 * @braceconf/parser -- parse, query, edit and render server configuration
 * written in the directive/block syntax of reverse proxies and web servers.
 *
 * Provides the whole pipeline: lexing, parsing into a typed document tree,
 * upstream queries and edits, and rendering under a formatting style.
 *
 * @packageDocumentation
 */

export type { TokenType, Token, QuoteChar, Parameter } from './types';
export { isParameterEligible, toParameters } from './types';

export { Lexer, tokenize } from './lexer';
export type { LexerOptions } from './lexer';

export { Parser, parse, tryParse } from './parser';
export type { ParserOptions } from './parser';

export { createRegistry } from './registry';
export type {
  Registry,
  RegistryOverrides,
  DirectiveWrapperFn,
  StatementParser,
  StatementCursor,
  WrapContext,
} from './registry';

export {
  Block,
  Comment,
  Config,
  Directive,
  Http,
  Include,
  Location,
  Server,
  Upstream,
  UpstreamServer,
  isDirectiveNode,
} from './model';
export type { Node, NodeKind, DirectiveNode, DirectiveLike, NodePosition, UpstreamServerInit } from './model';

export {
  dumpBlock,
  dumpConfig,
  dumpNode,
  formatParameter,
  encodeQuoted,
  needsQuoting,
  createStyle,
  resolveStyle,
  isStyleName,
  styles,
  IndentedStyle,
  TabStyle,
  NoIndentStyle,
  CompactStyle,
} from './dump';
export type { Style, StyleName } from './dump';

export { parseFile, parseFileSync } from './file';

export { ParseError, LexicalError, ConfSyntaxError, SemanticError, ConfigFileError } from './errors';
export type { SourcePosition } from './errors';
