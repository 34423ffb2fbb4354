import { describe, it, expect } from 'vitest';
import { Parser, parse, tryParse } from './parser';
import { Lexer } from './lexer';
import { Comment, Directive, Http, Include, Location, Server, Upstream, UpstreamServer } from './model';
import { ConfSyntaxError, ParseError, SemanticError } from './errors';

function parseError(source: string, options?: Parameters<typeof parse>[1]): ParseError {
  try {
    parse(source, options);
  } catch (e) {
    if (e instanceof ParseError) {
      return e;
    }
    throw e;
  }
  throw new Error('expected a parse error');
}

// ===========================================================================
// Token window
// ===========================================================================
describe('Parser token window', () => {
  it('starts with the first two tokens loaded', () => {
    const parser = new Parser(new Lexer('\n\tserver { # simple reverse-proxy\n\t}\n'));
    expect(parser.currentToken.type).toBe('KEYWORD');
    expect(parser.currentToken.value).toBe('server');
    expect(parser.followingToken.type).toBe('BLOCK_START');
  });

  it('shifts the window on advance', () => {
    const parser = new Parser(new Lexer('a b;'));
    parser.advance();
    expect(parser.currentToken.value).toBe('b');
    expect(parser.followingToken.type).toBe('SEMICOLON');
  });
});

// ===========================================================================
// Shapes
// ===========================================================================
describe('parse', () => {
  it('returns an empty document for empty input', () => {
    expect(parse('').block.directives).toEqual([]);
    expect(parse('  \n\t\n').block.directives).toEqual([]);
  });

  it('parses simple directives in order', () => {
    const nodes = parse('user nginx;\nworker_processes 4;').block.directives;
    expect(nodes).toHaveLength(2);
    const [first, second] = nodes;
    expect(first).toBeInstanceOf(Directive);
    expect(first?.kind === 'directive' && first.args).toEqual(['nginx']);
    expect(second?.kind === 'directive' && second.name).toBe('worker_processes');
  });

  it('records the position of each directive name', () => {
    const [, node] = parse('a;\n  b 1;').block.directives;
    expect(node?.line).toBe(2);
    expect(node?.column).toBe(3);
  });

  it('parses a directive without parameters', () => {
    const [node] = parse('ip_hash;').block.directives;
    expect(node?.kind === 'directive' && node.parameters).toEqual([]);
  });

  it('parses unknown block directives generically', () => {
    const [node] = parse('events { worker_connections 1024; }').block.directives;
    expect(node).toBeInstanceOf(Directive);
    expect(node?.kind === 'directive' && node.block?.directives).toHaveLength(1);
  });

  it('parses an empty block', () => {
    const [node] = parse('events {}').block.directives;
    expect(node?.kind === 'directive' && node.block?.directives).toEqual([]);
  });

  it('keeps quoting information on parameters', () => {
    const [node] = parse(`add_header X-A "a b" 'c';`).block.directives;
    expect(node?.kind === 'directive' && node.parameters).toEqual([
      { value: 'X-A' },
      { value: 'a b', quote: '"' },
      { value: 'c', quote: "'" },
    ]);
  });

  it('accepts variables as parameters', () => {
    const [node] = parse('proxy_set_header Host $host;').block.directives;
    expect(node?.kind === 'directive' && node.args).toEqual(['Host', '$host']);
  });

  it('turns standalone comments into comment nodes', () => {
    const nodes = parse('# top\nuser nginx; # trailing\n').block.directives;
    expect(nodes.map((n) => n.kind)).toEqual(['comment', 'directive', 'comment']);
    expect(nodes[0]).toBeInstanceOf(Comment);
    expect(nodes[0]?.kind === 'comment' && nodes[0].text).toBe('top');
    expect(nodes[2]?.kind === 'comment' && nodes[2].text).toBe('trailing');
  });

  it('keeps a comment inside a parameter list as a marked parameter', () => {
    const [node] = parse('listen 80 # note\n;').block.directives;
    expect(node?.kind === 'directive' && node.parameters).toEqual([
      { value: '80' },
      { value: '# note', comment: true },
    ]);
  });

  it('records the file path on the document', () => {
    expect(parse('a;', { filePath: 'x.conf' }).filePath).toBe('x.conf');
    expect(parse('a;').filePath).toBeUndefined();
  });
});

// ===========================================================================
// Typed wrappers
// ===========================================================================
describe('parse typed wrappers', () => {
  const source = [
    'http {',
    '    upstream backend {',
    '        server 10.0.0.1:80 weight=5 max_fails=3;',
    '        server 10.0.0.2:80 backup;',
    '    }',
    '    server {',
    '        listen 80;',
    '        include mime.types;',
    '        location / { proxy_pass http://backend; }',
    '        location ~ /(.*)php/{ }',
    '    }',
    '}',
  ].join('\n');

  it('wraps http, server, upstream and location blocks', () => {
    const [http] = parse(source).block.directives;
    expect(http).toBeInstanceOf(Http);
    if (!(http instanceof Http)) return;

    const [upstream, server] = http.block.directives;
    expect(upstream).toBeInstanceOf(Upstream);
    expect(server).toBeInstanceOf(Server);
    if (!(server instanceof Server)) return;
    expect(server.locations).toHaveLength(2);
    expect(server.locations.every((l) => l instanceof Location)).toBe(true);
  });

  it('reads upstream members into address, options and flags', () => {
    const [upstream] = parse(source).findUpstreams();
    expect(upstream?.upstreamName).toBe('backend');
    const [first, second] = upstream?.servers ?? [];
    expect(first).toBeInstanceOf(UpstreamServer);
    expect(first?.address).toBe('10.0.0.1:80');
    expect([...(first?.parameters ?? [])]).toEqual([
      ['weight', '5'],
      ['max_fails', '3'],
    ]);
    expect([...(first?.flags ?? [])]).toEqual([]);
    expect([...(second?.flags ?? [])]).toEqual(['backup']);
  });

  it('reads location modifier and match', () => {
    const [plain, regex] = parse(source).findDirectives('location');
    expect(plain instanceof Location && [plain.modifier, plain.match]).toEqual(['', '/']);
    expect(regex instanceof Location && [regex.modifier, regex.match]).toEqual(['~', '/(.*)php/']);
  });

  it('wraps include', () => {
    const [include] = parse(source).findDirectives('include');
    expect(include).toBeInstanceOf(Include);
    expect(include instanceof Include && include.path).toBe('mime.types');
  });

  it('wraps `server;` as a pool member only inside an upstream', () => {
    const config = parse('server a;\nhttp { server b; upstream u { server c; } }');
    const kinds = config.findDirectives('server').map((n) => n.kind);
    expect(kinds).toEqual(['directive', 'directive', 'upstream-server']);
  });

  it('wraps `server { }` as a virtual host wherever it appears', () => {
    const [node] = parse('server { listen 80; }').block.directives;
    expect(node).toBeInstanceOf(Server);
  });
});

// ===========================================================================
// Semantic errors
// ===========================================================================
describe('parse semantic errors', () => {
  it('rejects include without a path', () => {
    const error = parseError('include;');
    expect(error).toBeInstanceOf(SemanticError);
    expect(error.code).toBe('BRACECONF_E300');
    expect(error.message).toBe('include requires a path at line 1, column 1');
  });

  it('rejects include with more than one path', () => {
    const error = parseError('\n\tserver { \n\tinclude /but/no/semicolon before block;\n}');
    expect(error).toBeInstanceOf(SemanticError);
    expect(error.code).toBe('BRACECONF_E301');
    expect(error.line).toBe(3);
    expect(error.column).toBe(2);
  });

  it('rejects include with a block', () => {
    expect(parseError('include a { }').code).toBe('BRACECONF_E302');
  });

  it('rejects location without a match', () => {
    const error = parseError('location {}');
    expect(error.code).toBe('BRACECONF_E303');
    expect(error.message).toBe('location requires a match pattern at line 1, column 1');
  });

  it('rejects location with too many parameters', () => {
    expect(parseError('location one two three four {}').code).toBe('BRACECONF_E304');
  });

  it('rejects an upstream member without an address', () => {
    expect(parseError('upstream u { server; }').code).toBe('BRACECONF_E305');
  });

  it('prefixes semantic errors with the file path', () => {
    expect(parseError('include;', { filePath: 'x.conf' }).message).toBe(
      'x.conf: include requires a path at line 1, column 1',
    );
  });
});

// ===========================================================================
// Syntax errors
// ===========================================================================
describe('parse syntax errors', () => {
  it('rejects a directive cut off by end of input', () => {
    const error = parseError('listen 80');
    expect(error).toBeInstanceOf(ConfSyntaxError);
    expect(error.code).toBe('BRACECONF_E200');
    expect(error.message).toBe('unexpected token `EOF` (``) at line 1, column 10');
  });

  it('rejects a `}` in place of `;`', () => {
    const error = parseError('a b }');
    expect(error.code).toBe('BRACECONF_E200');
    expect(error.message).toBe('unexpected token `BLOCK_END` (`}`) at line 1, column 5');
  });

  it('reports an unclosed block at its opening brace', () => {
    const error = parseError('http {\n  server {\n');
    expect(error.code).toBe('BRACECONF_E201');
    expect(error.message).toBe('unexpected end of input, block `server` is not closed at line 2, column 10');
    expect(error.hint).toBe('add the missing `}`');
  });

  it('rejects a stray `}` at top level', () => {
    const error = parseError('a;\n}');
    expect(error.code).toBe('BRACECONF_E202');
    expect(error.line).toBe(2);
    expect(error.column).toBe(1);
  });

  it('propagates lexical errors', () => {
    expect(parseError('return 200 "oops;').code).toBe('BRACECONF_E100');
  });

  it('prefixes syntax errors with the file path', () => {
    expect(parseError('a', { filePath: 'x.conf' }).message).toBe(
      'x.conf: unexpected token `EOF` (``) at line 1, column 2',
    );
  });
});

// ===========================================================================
// Strict mode
// ===========================================================================
describe('parse strict mode', () => {
  it('skips tokens that cannot start a statement by default', () => {
    const names = parse('"quoted" name value;;\n$v other;').block.directives.map((n) =>
      n.kind === 'comment' ? '#' : n.name,
    );
    expect(names).toEqual(['name', 'other']);
  });

  it('rejects them in strict mode', () => {
    const error = parseError('"quoted" name value;', { strict: true });
    expect(error).toBeInstanceOf(ConfSyntaxError);
    expect(error.code).toBe('BRACECONF_E203');
    expect(error.message).toBe('expected a directive name, got `QUOTED_STRING` (`quoted`) at line 1, column 1');
  });

  it('rejects a doubled semicolon in strict mode', () => {
    const error = parseError('a;;', { strict: true });
    expect(error.code).toBe('BRACECONF_E203');
    expect(error.column).toBe(3);
  });

  it('still accepts comments in strict mode', () => {
    expect(parse('# c\na; # d', { strict: true }).block.directives).toHaveLength(3);
  });
});

// ===========================================================================
// Registry extension
// ===========================================================================
describe('parse registry overrides', () => {
  it('lets a block wrapper override a default', () => {
    const [node] = parse('http { }', { blockWrappers: { http: (d) => d } }).block.directives;
    expect(node).toBeInstanceOf(Directive);
  });

  it('passes the enclosing directive name to wrappers', () => {
    const seen: Array<string | undefined> = [];
    parse('listen 1;\nhttp { server { listen 2; } }', {
      directiveWrappers: {
        listen: (d, context) => {
          seen.push(context.parent);
          return d;
        },
      },
    });
    expect(seen).toEqual([undefined, 'server']);
  });

  it('hands statement parsing to a registered statement parser', () => {
    const config = parse('raw a { b } c;\nnext 1;', {
      statementParsers: {
        raw: (cursor) => {
          const directive = new Directive(cursor.currentToken.value);
          cursor.advance();
          const words: string[] = [];
          while (cursor.currentToken.type !== 'SEMICOLON') {
            words.push(cursor.currentToken.value);
            cursor.advance();
          }
          directive.parameters.push({ value: words.join(' ') });
          return directive;
        },
      },
    });
    const [raw, next] = config.block.directives;
    expect(raw?.kind === 'directive' && raw.args).toEqual(['a { b } c']);
    expect(next?.kind === 'directive' && next.name).toBe('next');
  });

  it('lets a statement parser reuse block parsing', () => {
    const config = parse('map $a $b { x 1; }', {
      statementParsers: {
        map: (cursor) => {
          const directive = new Directive('map');
          cursor.advance();
          while (cursor.currentToken.type !== 'BLOCK_START') {
            directive.parameters.push({ value: cursor.currentToken.value });
            cursor.advance();
          }
          directive.block = cursor.parseBlockBody('map');
          return directive;
        },
      },
    });
    const [map] = config.block.directives;
    expect(map?.kind === 'directive' && map.args).toEqual(['$a', '$b']);
    expect(map?.kind === 'directive' && map.block?.directives).toHaveLength(1);
  });
});

// ===========================================================================
// tryParse
// ===========================================================================
describe('tryParse', () => {
  it('returns the document on success', () => {
    const result = tryParse('a;');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.block.directives).toHaveLength(1);
    }
  });

  it('returns the parse error on failure', () => {
    const result = tryParse('a');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('BRACECONF_E200');
    }
  });

  it('rethrows errors that are not parse errors', () => {
    expect(() =>
      tryParse('a;', {
        directiveWrappers: {
          a: () => {
            throw new RangeError('boom');
          },
        },
      }),
    ).toThrow(RangeError);
  });
});
