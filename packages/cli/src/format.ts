/**
 * Terminal formatting for the braceconf CLI.
 *
 * ANSI escape codes only; every helper degrades to plain text when colors
 * are switched off.
 *
 * @packageDocumentation
 */

// ─── ANSI color codes ─────────────────────────────────────────────────────────

export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  underline: '\x1b[4m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

// ─── Global color toggle ──────────────────────────────────────────────────────

let colorsEnabled = true;

/** Enable or disable ANSI color output globally. */
export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled;
}

export function getColorsEnabled(): boolean {
  return colorsEnabled;
}

// ─── Low-level colorizers ─────────────────────────────────────────────────────

function c(code: string, text: string): string {
  if (!colorsEnabled) return text;
  return `${code}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return c(colors.bold, text);
}

export function cyan(text: string): string {
  return c(colors.cyan, text);
}

export function yellow(text: string): string {
  return c(colors.yellow, text);
}

// ─── Semantic formatters ──────────────────────────────────────────────────────

/** Green checkmark + message. */
export function success(msg: string): string {
  if (!colorsEnabled) return `[OK] ${msg}`;
  return `${colors.green}✔${colors.reset} ${msg}`;
}

/** Red X + message. Continuation lines (hints) are kept as they are. */
export function error(msg: string): string {
  if (!colorsEnabled) return `[ERROR] ${msg}`;
  return `${colors.red}✘${colors.reset} ${msg}`;
}

/** Yellow exclamation + message. */
export function warning(msg: string): string {
  if (!colorsEnabled) return `[WARN] ${msg}`;
  return `${colors.yellow}!${colors.reset} ${msg}`;
}

/** Bold + underlined header text. */
export function header(msg: string): string {
  if (!colorsEnabled) return msg;
  return `${colors.bold}${colors.underline}${msg}${colors.reset}`;
}

/** Gray text. */
export function dim(msg: string): string {
  if (!colorsEnabled) return msg;
  return `${colors.gray}${msg}${colors.reset}`;
}

// ─── Strip ANSI codes ─────────────────────────────────────────────────────────

/** Strip all ANSI color sequences from a string. */
export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

// ─── Table formatting ─────────────────────────────────────────────────────────

function visibleWidth(text: string): number {
  return stripAnsi(text).length;
}

function padCell(text: string, width: number): string {
  const pad = width - visibleWidth(text);
  return pad > 0 ? text + ' '.repeat(pad) : text;
}

/**
 * Render an aligned table: a bold header row, a rule, then the rows.
 * Cells are left-aligned with a two-space gutter; trailing padding on the
 * last column is dropped.
 */
export function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, col) =>
    rows.reduce((max, row) => Math.max(max, visibleWidth(row[col] ?? '')), visibleWidth(h)),
  );
  const last = headers.length - 1;
  const gutter = '  ';

  function renderRow(cells: string[], style: (text: string) => string = (t) => t): string {
    return widths
      .map((w, i) => style(i === last ? cells[i] ?? '' : padCell(cells[i] ?? '', w)))
      .join(gutter);
  }

  const lines = [renderRow(headers, bold)];
  lines.push(dim(widths.map((w) => '─'.repeat(w)).join(gutter)));
  for (const row of rows) {
    lines.push(renderRow(row));
  }
  return lines.join('\n');
}
