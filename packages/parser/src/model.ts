import { BraceconfErrorCode } from '@braceconf/types';
import type { Parameter } from './types';
import { toParameters } from './types';
import { SemanticError } from './errors';

/**
 * Document model.
 *
 * A {@link Config} owns a root {@link Block}; a block owns an ordered list
 * of nodes; a directive owns its optional nested block. Typed nodes
 * (`Http`, `Server`, `Upstream`, `Location`, `Include`) hold a reference to
 * the generic {@link Directive} they refine and compute every typed field
 * from it on demand, so the typed view and the rendered text cannot drift.
 */

/** Discriminant of every node that can appear in a block. */
export type NodeKind =
  | 'directive'
  | 'http'
  | 'server'
  | 'upstream'
  | 'upstream-server'
  | 'location'
  | 'include'
  | 'comment';

/** What the renderer needs from any statement. */
export interface DirectiveLike {
  readonly kind: Exclude<NodeKind, 'comment'>;
  readonly name: string;
  readonly block?: Block;
  /** 1-based source line of the directive name, when parsed. */
  readonly line?: number;
  /** 1-based source column of the directive name, when parsed. */
  readonly column?: number;
  /** The generic parameter list this node renders with. */
  getParameters(): readonly Parameter[];
}

/** Source position of a parsed node. */
export interface NodePosition {
  line?: number;
  column?: number;
}

// ─── Generic nodes ──────────────────────────────────────────────────────────────

/** The universal statement: a name, ordered parameters, optional block. */
export class Directive implements DirectiveLike {
  readonly kind = 'directive' as const;
  name: string;
  parameters: Parameter[];
  block?: Block;
  readonly line?: number;
  readonly column?: number;

  constructor(name: string, parameters: Parameter[] = [], block?: Block, position?: NodePosition) {
    this.name = name;
    this.parameters = parameters;
    this.block = block;
    this.line = position?.line;
    this.column = position?.column;
  }

  /** Create a directive from plain string parameters. */
  static of(name: string, args: readonly string[] = [], block?: Block): Directive {
    return new Directive(name, toParameters(args), block);
  }

  /** Parameter values without quoting information. */
  get args(): string[] {
    return this.parameters.map((p) => p.value);
  }

  getParameters(): readonly Parameter[] {
    return this.parameters;
  }
}

/** A `# text` line between statements. */
export class Comment {
  readonly kind = 'comment' as const;
  /** Comment text without the leading `#` and surrounding whitespace. */
  text: string;
  readonly line?: number;
  readonly column?: number;

  constructor(text: string, position?: NodePosition) {
    this.text = text;
    this.line = position?.line;
    this.column = position?.column;
  }
}

/** Any node a block can hold. */
export type Node = Directive | Http | Server | Upstream | UpstreamServer | Location | Include | Comment;

/** Any node other than a comment. */
export type DirectiveNode = Exclude<Node, Comment>;

/** Narrow a node to the statement variants. */
export function isDirectiveNode(node: Node): node is DirectiveNode {
  return node.kind !== 'comment';
}

/** An ordered, brace-delimited sequence of nodes. */
export class Block {
  readonly directives: Node[];

  constructor(directives: Node[] = []) {
    this.directives = directives;
  }

  /** Append a node after the existing ones. */
  append(node: Node): void {
    this.directives.push(node);
  }

  /**
   * Every statement at any depth, parents before their children, in
   * source order.
   */
  walk(): DirectiveNode[] {
    const out: DirectiveNode[] = [];
    collect(this, out);
    return out;
  }

  /** Every statement named `name` at any depth, in source order. */
  findDirectives(name: string): DirectiveNode[] {
    return this.walk().filter((node) => node.name === name);
  }

  /** Every upstream at any depth, in source order. */
  findUpstreams(): Upstream[] {
    return this.walk().filter((node): node is Upstream => node.kind === 'upstream');
  }
}

function collect(block: Block, out: DirectiveNode[]): void {
  for (const node of block.directives) {
    if (!isDirectiveNode(node)) continue;
    out.push(node);
    if (node.block !== undefined) {
      collect(node.block, out);
    }
  }
}

/** Root of a parsed document. */
export class Config {
  /** Path the document was read from, if any. */
  filePath?: string;
  readonly block: Block;

  constructor(block: Block = new Block(), filePath?: string) {
    this.block = block;
    this.filePath = filePath;
  }

  /** Every upstream in the document, in source order, at any depth. */
  findUpstreams(): Upstream[] {
    return this.block.findUpstreams();
  }

  /** Every statement named `name`, in source order, at any depth. */
  findDirectives(name: string): DirectiveNode[] {
    return this.block.findDirectives(name);
  }
}

// ─── Typed wrappers ─────────────────────────────────────────────────────────────

/** Shared plumbing for typed refinements of a generic directive. */
abstract class DirectiveWrapper {
  /** The generic directive this node refines. */
  readonly directive: Directive;

  constructor(directive: Directive) {
    this.directive = directive;
  }

  get name(): string {
    return this.directive.name;
  }

  get parameters(): Parameter[] {
    return this.directive.parameters;
  }

  get args(): string[] {
    return this.directive.args;
  }

  get line(): number | undefined {
    return this.directive.line;
  }

  get column(): number | undefined {
    return this.directive.column;
  }

  getParameters(): readonly Parameter[] {
    return this.directive.parameters;
  }
}

/** A typed node that always has a nested block. */
abstract class BlockWrapper extends DirectiveWrapper {
  get block(): Block {
    if (this.directive.block === undefined) {
      this.directive.block = new Block();
    }
    return this.directive.block;
  }

  /** Direct children of a given kind. */
  protected children<K extends NodeKind>(kind: K): Extract<Node, { kind: K }>[] {
    return this.block.directives.filter((node): node is Extract<Node, { kind: K }> => node.kind === kind);
  }
}

/** An `http { ... }` context. */
export class Http extends BlockWrapper implements DirectiveLike {
  readonly kind = 'http' as const;

  /** Virtual servers declared directly in this context. */
  get servers(): Server[] {
    return this.children('server');
  }
}

/** A `server { ... }` virtual host. */
export class Server extends BlockWrapper implements DirectiveLike {
  readonly kind = 'server' as const;

  /** Locations declared directly in this server. */
  get locations(): Location[] {
    return this.children('location');
  }
}

/** A `location [modifier] match { ... }` block. */
export class Location extends BlockWrapper implements DirectiveLike {
  readonly kind = 'location' as const;

  /**
   * @throws {SemanticError} With zero parameters or more than two.
   */
  constructor(directive: Directive) {
    super(directive);
    const count = directive.parameters.length;
    const position = { line: directive.line, column: directive.column };
    if (count === 0) {
      throw new SemanticError(
        BraceconfErrorCode.LOCATION_MISSING_MATCH,
        'location requires a match pattern',
        position,
        { hint: 'write `location /path { ... }` or `location ~ regex { ... }`' },
      );
    }
    if (count > 2) {
      throw new SemanticError(
        BraceconfErrorCode.LOCATION_TOO_MANY_PARAMS,
        `location takes at most a modifier and a match pattern, got ${count} parameters`,
        position,
      );
    }
  }

  /** Match modifier such as `=`, `~` or `^~`; empty when absent. */
  get modifier(): string {
    const args = this.args;
    return args.length === 2 ? args[0] ?? '' : '';
  }

  /** The path or pattern being matched. */
  get match(): string {
    const args = this.args;
    return args[args.length - 1] ?? '';
  }
}

/** An `include path;` reference to another fragment. */
export class Include extends DirectiveWrapper implements DirectiveLike {
  readonly kind = 'include' as const;
  readonly block?: undefined;

  /**
   * @throws {SemanticError} Unless there is exactly one parameter and no block.
   */
  constructor(directive: Directive) {
    super(directive);
    const position = { line: directive.line, column: directive.column };
    if (directive.block !== undefined) {
      throw new SemanticError(
        BraceconfErrorCode.INCLUDE_WITH_BLOCK,
        'include can not have a block, or the semicolon after the include path is missing',
        position,
      );
    }
    if (directive.parameters.length === 0) {
      throw new SemanticError(BraceconfErrorCode.INCLUDE_MISSING_PATH, 'include requires a path', position);
    }
    if (directive.parameters.length > 1) {
      throw new SemanticError(
        BraceconfErrorCode.INCLUDE_TOO_MANY_PARAMS,
        `include takes exactly one path, got ${directive.parameters.length} parameters`,
        position,
        { hint: 'a missing semicolon can merge two directives into one' },
      );
    }
  }

  /** The referenced path. No file inclusion is performed. */
  get path(): string {
    return this.args[0] ?? '';
  }
}

/** Initial values for a programmatically created {@link UpstreamServer}. */
export interface UpstreamServerInit {
  address: string;
  /** `key=value` options, rendered in insertion order. */
  parameters?: Record<string, string> | Map<string, string>;
  /** Bare options such as `backup` or `down`, rendered in insertion order. */
  flags?: Iterable<string>;
}

/**
 * One backend entry of an upstream pool: `server address [k=v]... [flag]...;`
 *
 * The address, options and flags are read from the wrapped `server`
 * directive on every access; comment parameters are skipped. Edits go
 * through the mutators, which rewrite single parameters in place, so
 * order, duplicates, quotes and comments survive rendering.
 */
export class UpstreamServer implements DirectiveLike {
  readonly kind = 'upstream-server' as const;
  readonly block?: undefined;
  /** The generic `server` directive this entry reads and writes. */
  readonly directive: Directive;

  /**
   * Wrap a parsed `server` directive, or build a new one from `init` with
   * the address first, then the options, then the flags.
   *
   * @throws {SemanticError} When a wrapped directive has no address.
   */
  constructor(source: Directive | UpstreamServerInit) {
    if (source instanceof Directive) {
      if (addressIndex(source.parameters) === -1) {
        throw new SemanticError(
          BraceconfErrorCode.UPSTREAM_SERVER_MISSING_ADDRESS,
          'upstream server requires an address',
          { line: source.line, column: source.column },
        );
      }
      this.directive = source;
      return;
    }

    const options = source.parameters ?? {};
    const entries = options instanceof Map ? [...options] : Object.entries(options);
    this.directive = Directive.of('server', [
      source.address,
      ...entries.map(([key, value]) => `${key}=${value}`),
      ...(source.flags ?? []),
    ]);
  }

  /**
   * Read an upstream member from its generic form: the first parameter is
   * the address, parameters containing `=` are key/value options and the
   * rest are flags.
   *
   * @throws {SemanticError} When the directive has no address.
   */
  static fromDirective(directive: Directive): UpstreamServer {
    return new UpstreamServer(directive);
  }

  get name(): string {
    return this.directive.name;
  }

  get line(): number | undefined {
    return this.directive.line;
  }

  get column(): number | undefined {
    return this.directive.column;
  }

  getParameters(): readonly Parameter[] {
    return this.directive.parameters;
  }

  get address(): string {
    return this.directive.parameters[addressIndex(this.directive.parameters)]?.value ?? '';
  }

  set address(value: string) {
    const params = this.directive.parameters;
    const index = addressIndex(params);
    const current = params[index];
    if (current === undefined) {
      params.unshift({ value });
    } else {
      params[index] = { ...current, value };
    }
  }

  /** `key=value` options; for a repeated key the last entry wins. */
  get parameters(): ReadonlyMap<string, string> {
    const out = new Map<string, string>();
    for (const index of this.optionIndexes()) {
      const option = splitOption(this.valueAt(index));
      if (option !== undefined) {
        out.set(option[0], option[1]);
      }
    }
    return out;
  }

  /** Bare options in first-seen order. */
  get flags(): ReadonlySet<string> {
    const out = new Set<string>();
    for (const index of this.optionIndexes()) {
      const value = this.valueAt(index);
      if (splitOption(value) === undefined) {
        out.add(value);
      }
    }
    return out;
  }

  /** Replace the value of the last `key=` entry, or append one. */
  setParameter(key: string, value: string): void {
    const params = this.directive.parameters;
    const index = this.optionIndexes()
      .filter((i) => splitOption(this.valueAt(i))?.[0] === key)
      .pop();
    const current = index === undefined ? undefined : params[index];
    if (index === undefined || current === undefined) {
      params.push({ value: `${key}=${value}` });
    } else {
      params[index] = { ...current, value: `${key}=${value}` };
    }
  }

  /**
   * Remove every `key=` entry.
   *
   * @returns Whether anything was removed.
   */
  removeParameter(key: string): boolean {
    return this.removeWhere((value) => splitOption(value)?.[0] === key);
  }

  /** Append a flag unless it is already present. */
  addFlag(flag: string): void {
    if (!this.flags.has(flag)) {
      this.directive.parameters.push({ value: flag });
    }
  }

  /**
   * Remove every occurrence of a flag.
   *
   * @returns Whether anything was removed.
   */
  removeFlag(flag: string): boolean {
    return this.removeWhere((value) => value === flag);
  }

  private valueAt(index: number): string {
    return this.directive.parameters[index]?.value ?? '';
  }

  /** Positions of the non-comment parameters after the address. */
  private optionIndexes(): number[] {
    const params = this.directive.parameters;
    const out: number[] = [];
    for (let i = addressIndex(params) + 1; i > 0 && i < params.length; i++) {
      if (params[i]?.comment !== true) {
        out.push(i);
      }
    }
    return out;
  }

  private removeWhere(match: (value: string) => boolean): boolean {
    const params = this.directive.parameters;
    const doomed = new Set(this.optionIndexes().filter((i) => match(this.valueAt(i))));
    if (doomed.size === 0) {
      return false;
    }
    this.directive.parameters = params.filter((_, i) => !doomed.has(i));
    return true;
  }
}

function addressIndex(params: readonly Parameter[]): number {
  return params.findIndex((p) => p.comment !== true);
}

/** Split `key=value` at the first `=`; `undefined` for a flag. */
function splitOption(value: string): [string, string] | undefined {
  const eq = value.indexOf('=');
  return eq === -1 ? undefined : [value.slice(0, eq), value.slice(eq + 1)];
}

/** A named pool of backend servers: `upstream name { server ...; }` */
export class Upstream extends BlockWrapper implements DirectiveLike {
  readonly kind = 'upstream' as const;

  /**
   * Wrap an upstream directive. Generic `server` statements already in its
   * block are upgraded in place to {@link UpstreamServer} nodes.
   */
  constructor(directive: Directive) {
    super(directive);
    const nodes = this.block.directives;
    for (let i = 0; i < nodes.length; i++) {
      const node = nodes[i];
      if (node !== undefined && node.kind === 'directive' && node.name === 'server' && node.block === undefined) {
        nodes[i] = new UpstreamServer(node);
      }
    }
  }

  /** The pool name, i.e. the first parameter. */
  get upstreamName(): string {
    return this.args[0] ?? '';
  }

  /** Member servers in block order. Computed from the block on every call. */
  get servers(): UpstreamServer[] {
    return this.children('upstream-server');
  }

  /** Append a member server; it renders after the existing entries. */
  addServer(server: UpstreamServer): void {
    this.block.append(server);
  }

  /**
   * Remove the first member with the given address.
   *
   * @returns Whether a server was removed.
   */
  removeServer(address: string): boolean {
    const nodes = this.block.directives;
    const index = nodes.findIndex((node) => node.kind === 'upstream-server' && node.address === address);
    if (index === -1) {
      return false;
    }
    nodes.splice(index, 1);
    return true;
  }
}
