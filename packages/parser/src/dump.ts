import type { Parameter, QuoteChar } from './types';
import type { Block, Config, Node } from './model';

// ─── Styles ─────────────────────────────────────────────────────────────────────

/** Formatting options for the renderer. */
export interface Style {
  /** Indentation unit repeated once per nesting level. */
  readonly indent: string;
  /** `false` renders the whole document on a single line. */
  readonly newlines: boolean;
  /** Put `{` on its own line instead of after the parameters. */
  readonly braceOnNewLine: boolean;
  /** Insert a blank line before a block directive that follows a sibling. */
  readonly spaceBeforeBlocks: boolean;
}

/** One directive per line, four spaces per level. */
export const IndentedStyle: Style = {
  indent: '    ',
  newlines: true,
  braceOnNewLine: false,
  spaceBeforeBlocks: false,
};

/** One directive per line, one tab per level. */
export const TabStyle: Style = { ...IndentedStyle, indent: '\t' };

/** One directive per line, no indentation. */
export const NoIndentStyle: Style = { ...IndentedStyle, indent: '' };

/** Everything on one line. Comments still end their line. */
export const CompactStyle: Style = { ...IndentedStyle, indent: '', newlines: false };

/** Names of the built-in styles. */
export type StyleName = 'indented' | 'tabs' | 'no-indent' | 'compact';

/** The built-in styles by name. */
export const styles: Readonly<Record<StyleName, Style>> = {
  indented: IndentedStyle,
  tabs: TabStyle,
  'no-indent': NoIndentStyle,
  compact: CompactStyle,
};

/** Look up a built-in style by name. */
export function resolveStyle(name: string): Style | undefined {
  return isStyleName(name) ? styles[name] : undefined;
}

/** Whether `name` is one of the built-in style names. */
export function isStyleName(name: string): name is StyleName {
  return Object.prototype.hasOwnProperty.call(styles, name);
}

/** Derive a style from `base` (default {@link IndentedStyle}). */
export function createStyle(overrides: Partial<Style>, base: Style = IndentedStyle): Style {
  return { ...base, ...overrides };
}

// ─── Parameter quoting ──────────────────────────────────────────────────────────

const ESCAPABLE = new Set(['n', 'r', 't', '\\', '\n', '\r', '\t']);

/**
 * Encode `value` for a string delimited by `quote`, so that the lexer
 * decodes it back to `value`. A backslash is doubled only where the lexer
 * would otherwise read it as the start of an escape.
 */
export function encodeQuoted(value: string, quote: QuoteChar): string {
  let out = '';
  for (let i = 0; i < value.length; i++) {
    const ch = value.charAt(i);
    switch (ch) {
      case '\n':
        out += '\\n';
        break;
      case '\r':
        out += '\\r';
        break;
      case '\t':
        out += '\\t';
        break;
      case quote:
        out += '\\' + quote;
        break;
      case '\\': {
        const next = value.charAt(i + 1);
        out += next === '' || next === quote || ESCAPABLE.has(next) ? '\\\\' : '\\';
        break;
      }
      default:
        out += ch;
    }
  }
  return out;
}

/** Whether a bare word would not survive re-tokenizing unchanged. */
export function needsQuoting(value: string): boolean {
  if (value === '') {
    return true;
  }
  if (/[\s;{]/.test(value)) {
    return true;
  }
  const first = value.charAt(0);
  return first === '"' || first === "'" || first === '`' || first === '#' || first === '}';
}

/** Render one parameter as it should appear in the output. */
export function formatParameter(param: Parameter): string {
  if (param.comment) {
    return param.value;
  }
  if (param.quote !== undefined) {
    return param.quote + encodeQuoted(param.value, param.quote) + param.quote;
  }
  return needsQuoting(param.value) ? `"${encodeQuoted(param.value, '"')}"` : param.value;
}

// ─── Rendering ──────────────────────────────────────────────────────────────────

interface Line {
  depth: number;
  text: string;
  /** A `#` comment runs to end of line, so nothing may follow on it. */
  endsWithComment: boolean;
}

function nodeLines(node: Node, depth: number, style: Style, out: Line[]): void {
  if (node.kind === 'comment') {
    out.push({ depth, text: node.text === '' ? '#' : `# ${node.text}`, endsWithComment: true });
    return;
  }

  let text = node.name;
  let lineDepth = depth;
  for (const param of node.getParameters()) {
    const rendered = formatParameter(param);
    text = text === '' ? rendered : `${text} ${rendered}`;
    if (param.comment) {
      out.push({ depth: lineDepth, text, endsWithComment: true });
      text = '';
      lineDepth = depth + 1;
    }
  }

  const block = node.block;
  if (block === undefined) {
    out.push({ depth: lineDepth, text: text === '' ? ';' : `${text};`, endsWithComment: false });
    return;
  }

  if (style.braceOnNewLine) {
    if (text !== '') {
      out.push({ depth: lineDepth, text, endsWithComment: false });
    }
    out.push({ depth, text: '{', endsWithComment: false });
  } else {
    out.push({ depth: lineDepth, text: text === '' ? '{' : `${text} {`, endsWithComment: false });
  }
  blockLines(block, depth + 1, style, out);
  out.push({ depth, text: '}', endsWithComment: false });
}

function blockLines(block: Block, depth: number, style: Style, out: Line[]): void {
  block.directives.forEach((node, index) => {
    if (style.spaceBeforeBlocks && style.newlines && index > 0 && node.kind !== 'comment' && node.block !== undefined) {
      out.push({ depth: 0, text: '', endsWithComment: false });
    }
    nodeLines(node, depth, style, out);
  });
}

function join(lines: Line[], style: Style): string {
  if (style.newlines) {
    return lines.map((line) => (line.text === '' ? '' : style.indent.repeat(line.depth) + line.text)).join('\n');
  }
  let out = '';
  lines.forEach((line, index) => {
    if (index > 0) {
      out += lines[index - 1]?.endsWithComment ? '\n' : ' ';
    }
    out += line.text;
  });
  return out;
}

/**
 * Render a block's contents. Re-parsing the output yields a structurally
 * equal tree: same names, parameter values and order, nesting and node
 * kinds.
 */
export function dumpBlock(block: Block, style: Style = IndentedStyle): string {
  const lines: Line[] = [];
  blockLines(block, 0, style, lines);
  return join(lines, style);
}

/** Render a single node, including its nested block. */
export function dumpNode(node: Node, style: Style = IndentedStyle): string {
  const lines: Line[] = [];
  nodeLines(node, 0, style, lines);
  return join(lines, style);
}

/** Render a whole document. */
export function dumpConfig(config: Config, style: Style = IndentedStyle): string {
  return dumpBlock(config.block, style);
}
