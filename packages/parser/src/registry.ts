import type { Token } from './types';
import type { Block, DirectiveNode } from './model';
import { Directive, Http, Include, Location, Server, Upstream, UpstreamServer } from './model';

/** Where a statement sits in the document. */
export interface WrapContext {
  /** Name of the directive whose block contains the statement; absent at top level. */
  readonly parent?: string;
}

/**
 * Converts a freshly parsed generic directive into its typed form. A
 * wrapper may return the directive unchanged and may throw a
 * `SemanticError` to reject its shape.
 */
export type DirectiveWrapperFn = (directive: Directive, context: WrapContext) => DirectiveNode;

/** Cursor handed to a {@link StatementParser}. */
export interface StatementCursor {
  /** The token under the cursor. */
  readonly currentToken: Token;
  /** The token after it. */
  readonly followingToken: Token;
  /** Move one token forward. */
  advance(): void;
  /**
   * With the cursor on `{`, parse the statements up to the matching `}`
   * and leave the cursor on it.
   */
  parseBlockBody(owner: string): Block;
}

/**
 * Takes over parsing of one statement, starting with the cursor on its
 * name. It must leave the cursor on the terminating `;` or `}`.
 */
export type StatementParser = (cursor: StatementCursor) => DirectiveNode;

/** Name-keyed dispatch tables consulted by the parser. */
export interface Registry {
  /** Applied to `name params... { ... }` statements. */
  readonly blockWrappers: ReadonlyMap<string, DirectiveWrapperFn>;
  /** Applied to `name params...;` statements. */
  readonly directiveWrappers: ReadonlyMap<string, DirectiveWrapperFn>;
  /** Consulted before generic parsing. */
  readonly statementParsers: ReadonlyMap<string, StatementParser>;
}

/** Extra registry entries; each table is merged over the defaults. */
export interface RegistryOverrides {
  blockWrappers?: Record<string, DirectiveWrapperFn>;
  directiveWrappers?: Record<string, DirectiveWrapperFn>;
  statementParsers?: Record<string, StatementParser>;
}

const defaultBlockWrappers: ReadonlyMap<string, DirectiveWrapperFn> = new Map<string, DirectiveWrapperFn>([
  ['http', (directive) => new Http(directive)],
  ['server', (directive) => new Server(directive)],
  ['location', (directive) => new Location(directive)],
  ['upstream', (directive) => new Upstream(directive)],
  // Rejected by the wrapper.
  ['include', (directive) => new Include(directive)],
]);

const defaultDirectiveWrappers: ReadonlyMap<string, DirectiveWrapperFn> = new Map<string, DirectiveWrapperFn>([
  // `server` only denotes a pool member inside an upstream block.
  ['server', (directive, context) => (context.parent === 'upstream' ? UpstreamServer.fromDirective(directive) : directive)],
  ['include', (directive) => new Include(directive)],
]);

function merge<T>(defaults: ReadonlyMap<string, T>, extra: Record<string, T> | undefined): ReadonlyMap<string, T> {
  if (extra === undefined) {
    return defaults;
  }
  return new Map([...defaults, ...Object.entries(extra)]);
}

/**
 * Build the dispatch tables for one parser.
 *
 * @example
 * ```typescript
 * const registry = createRegistry({
 *   blockWrappers: { events: (directive) => directive },
 * });
 * ```
 */
export function createRegistry(overrides?: RegistryOverrides): Registry {
  return {
    blockWrappers: merge(defaultBlockWrappers, overrides?.blockWrappers),
    directiveWrappers: merge(defaultDirectiveWrappers, overrides?.directiveWrappers),
    statementParsers: merge(new Map<string, StatementParser>(), overrides?.statementParsers),
  };
}
