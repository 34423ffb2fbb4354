/**
 * braceconf command-line tool.
 *
 * {@link run} executes one command and returns its exit code and output
 * instead of touching `process`, so it can be driven from tests; `bin.ts`
 * wires it to the real process.
 *
 * @packageDocumentation
 */

import * as fs from 'fs/promises';
import * as path from 'path';

import {
  BraceconfError,
  BraceconfErrorCode,
  LogLevel,
  Logger,
  formatError,
  lineOutput,
  parseLogLevel,
} from '@braceconf/types';
import {
  UpstreamServer,
  dumpConfig,
  parse,
  resolveStyle,
  styles,
  tokenize,
  ConfigFileError,
} from '@braceconf/parser';
import type { Config, ParserOptions, Style, Upstream } from '@braceconf/parser';

import { CONFIG_FILE_NAME, loadConfig } from './config';
import type { BraceconfConfig } from './config';
import { bold, cyan, dim, error, header, setColorsEnabled, success, table, warning, yellow } from './format';

export { loadConfig, findConfigFile, validateConfig, CONFIG_FILE_NAME } from './config';
export type { BraceconfConfig, LoadedConfig } from './config';

/** Version reported by `braceconf version`. */
export const VERSION = '0.1.0';

/** Outcome of one CLI invocation. */
export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

// ─── Argument parsing ─────────────────────────────────────────────────────────

/** Flags that never take a value. */
const BOOLEAN_FLAGS = new Set(['write', 'json', 'strict', 'no-color', 'help', 'version']);

/** Flags that may be given more than once. */
const REPEATABLE_FLAGS = new Set(['param', 'flag']);

export interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Record<string, string | boolean>;
  /** Values of repeatable flags, in the order given. */
  lists: Record<string, string[]>;
}

/**
 * Split user arguments into a command, positionals and `--flags`.
 *
 * @throws {BraceconfError} `BRACECONF_E500` when a value flag has no value.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};
  const lists: Record<string, string[]> = {};
  let command = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      if (BOOLEAN_FLAGS.has(key)) {
        flags[key] = true;
        continue;
      }
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw usageError(`missing value for --${key}`);
      }
      i++;
      if (REPEATABLE_FLAGS.has(key)) {
        lists[key] = [...(lists[key] ?? []), value];
      } else {
        flags[key] = value;
      }
    } else if (command === '') {
      command = arg;
    } else {
      positional.push(arg);
    }
  }

  return { command, positional, flags, lists };
}

function getFlag(parsed: ParsedArgs, key: string): string | undefined {
  const val = parsed.flags[key];
  return typeof val === 'string' ? val : undefined;
}

function hasFlag(parsed: ParsedArgs, key: string): boolean {
  return parsed.flags[key] === true;
}

function usageError(message: string): BraceconfError {
  return new BraceconfError(BraceconfErrorCode.INVALID_ARGUMENT, message, {
    hint: 'Run `braceconf help` for usage',
  });
}

function requireFlag(parsed: ParsedArgs, key: string, description: string): string {
  const val = getFlag(parsed, key);
  if (val === undefined || val === '') {
    throw usageError(`missing required option --${key} <${description}>`);
  }
  return val;
}

function requireFile(parsed: ParsedArgs): string {
  const file = parsed.positional[0];
  if (file === undefined) {
    throw usageError(`usage: braceconf ${parsed.command} <file>`);
  }
  return file;
}

// ─── Command context ──────────────────────────────────────────────────────────

interface Context {
  parsed: ParsedArgs;
  cwd: string;
  config: BraceconfConfig;
  log: Logger;
  out: string[];
}

function resolveSettings(parsed: ParsedArgs, config: BraceconfConfig): { style: Style; parser: ParserOptions } {
  const styleName = getFlag(parsed, 'style') ?? config.style ?? 'indented';
  const style = resolveStyle(styleName);
  if (style === undefined) {
    throw usageError(`unknown style "${styleName}", expected one of: ${Object.keys(styles).join(', ')}`);
  }
  return { style, parser: { strict: hasFlag(parsed, 'strict') || config.strict === true } };
}

async function readSource(ctx: Context, file: string): Promise<string> {
  try {
    return await fs.readFile(path.resolve(ctx.cwd, file), 'utf-8');
  } catch (e) {
    throw new ConfigFileError(file, e instanceof Error ? e : new Error(String(e)));
  }
}

/** Parse `file`, reporting errors against the path as the user wrote it. */
async function load(ctx: Context, file: string): Promise<Config> {
  const { parser } = resolveSettings(ctx.parsed, ctx.config);
  const config = parse(await readSource(ctx, file), { ...parser, filePath: file });
  ctx.log.debug('parsed', { file, statements: config.block.walk().length });
  return config;
}

async function write(ctx: Context, file: string, text: string): Promise<void> {
  const target = path.resolve(ctx.cwd, file);
  try {
    await fs.writeFile(target, text, 'utf-8');
  } catch (e) {
    const cause = e instanceof Error ? e : new Error(String(e));
    throw new BraceconfError(BraceconfErrorCode.FILE_WRITE_FAILED, `cannot write ${file}: ${cause.message}`, {
      cause,
      context: { file },
    });
  }
  ctx.log.info('wrote file', { file, bytes: Buffer.byteLength(text) });
}

// ─── Command: format ──────────────────────────────────────────────────────────

async function cmdFormat(ctx: Context): Promise<void> {
  const file = requireFile(ctx.parsed);
  const { style } = resolveSettings(ctx.parsed, ctx.config);
  const rendered = dumpConfig(await load(ctx, file), style);

  if (hasFlag(ctx.parsed, 'write')) {
    await write(ctx, file, rendered + '\n');
    ctx.out.push(success(`Formatted ${file}`));
    return;
  }
  ctx.out.push(rendered);
}

// ─── Command: check ───────────────────────────────────────────────────────────

async function cmdCheck(ctx: Context): Promise<void> {
  const file = requireFile(ctx.parsed);
  const config = await load(ctx, file);
  const statements = config.block.walk().length;
  const upstreams = config.findUpstreams().length;
  ctx.out.push(success(`${file}: ${statements} statements, ${upstreams} upstreams`));
}

// ─── Command: upstreams ───────────────────────────────────────────────────────

function serverJson(server: UpstreamServer): Record<string, unknown> {
  return {
    address: server.address,
    parameters: Object.fromEntries(server.parameters),
    flags: [...server.flags],
  };
}

function upstreamJson(upstream: Upstream): Record<string, unknown> {
  return {
    name: upstream.upstreamName,
    line: upstream.line ?? null,
    servers: upstream.servers.map(serverJson),
  };
}

async function cmdUpstreams(ctx: Context): Promise<void> {
  const file = requireFile(ctx.parsed);
  const upstreams = (await load(ctx, file)).findUpstreams();

  if (hasFlag(ctx.parsed, 'json')) {
    ctx.out.push(JSON.stringify(upstreams.map(upstreamJson), null, 2));
    return;
  }

  if (upstreams.length === 0) {
    ctx.out.push(warning(`no upstreams in ${file}`));
    return;
  }

  const sections = upstreams.map((upstream) => {
    const title = header(`upstream ${upstream.upstreamName}`) + dim(` (line ${upstream.line ?? '?'})`);
    const servers = upstream.servers;
    if (servers.length === 0) {
      return `${title}\n${dim('  no servers')}`;
    }
    const rows = servers.map((s) => [
      cyan(s.address),
      [...s.parameters].map(([k, v]) => `${k}=${v}`).join(' '),
      yellow([...s.flags].join(' ')),
    ]);
    return `${title}\n${table(['ADDRESS', 'PARAMETERS', 'FLAGS'], rows)}`;
  });
  ctx.out.push(sections.join('\n\n'));
}

// ─── Command: add-server ──────────────────────────────────────────────────────

function parseServerParams(values: string[]): Map<string, string> {
  const params = new Map<string, string>();
  for (const value of values) {
    const eq = value.indexOf('=');
    if (eq <= 0) {
      throw usageError(`--param expects key=value, got "${value}"`);
    }
    params.set(value.slice(0, eq), value.slice(eq + 1));
  }
  return params;
}

async function cmdAddServer(ctx: Context): Promise<void> {
  const file = requireFile(ctx.parsed);
  const name = requireFlag(ctx.parsed, 'upstream', 'name');
  const address = requireFlag(ctx.parsed, 'address', 'host:port');
  const parameters = parseServerParams(ctx.parsed.lists['param'] ?? []);
  const flags = ctx.parsed.lists['flag'] ?? [];
  const { style } = resolveSettings(ctx.parsed, ctx.config);

  const config = await load(ctx, file);
  const upstream = config.findUpstreams().find((u) => u.upstreamName === name);
  if (upstream === undefined) {
    throw new BraceconfError(BraceconfErrorCode.UPSTREAM_NOT_FOUND, `no upstream named "${name}" in ${file}`, {
      context: { file, upstream: name },
      hint: 'Run `braceconf upstreams <file>` to list the upstreams in the file',
    });
  }

  upstream.addServer(new UpstreamServer({ address, parameters, flags }));
  ctx.log.info('added server', { upstream: name, address });
  const rendered = dumpConfig(config, style);

  if (hasFlag(ctx.parsed, 'write')) {
    await write(ctx, file, rendered + '\n');
    ctx.out.push(success(`Added ${address} to upstream ${name} in ${file}`));
    return;
  }
  ctx.out.push(rendered);
}

// ─── Command: tokens ──────────────────────────────────────────────────────────

async function cmdTokens(ctx: Context): Promise<void> {
  const file = requireFile(ctx.parsed);
  const tokens = tokenize(await readSource(ctx, file), { filePath: file });
  if (hasFlag(ctx.parsed, 'json')) {
    ctx.out.push(JSON.stringify(tokens, null, 2));
    return;
  }
  const rows = tokens.map((t) => [`${t.line}:${t.column}`, t.type, JSON.stringify(t.value)]);
  ctx.out.push(table(['POS', 'TYPE', 'VALUE'], rows));
}

// ─── Command: help / version ──────────────────────────────────────────────────

function helpText(): string {
  return [
    bold('braceconf') + ' - parse, query and rewrite directive/block server configuration',
    '',
    bold('Usage:') + ' braceconf <command> <file> [options]',
    '',
    bold('Commands:'),
    '  format <file>        Print the file re-rendered',
    '    --style <name>       indented, tabs, no-indent or compact',
    '    --write              Rewrite the file in place',
    '',
    '  check <file>         Parse the file and report errors',
    '',
    '  upstreams <file>     List upstream pools and their servers',
    '    --json               Print JSON',
    '',
    '  add-server <file>    Append a server to an upstream',
    '    --upstream <name>    Upstream to change (required)',
    '    --address <addr>     Server address (required)',
    '    --param <k=v>        Server option, repeatable',
    '    --flag <flag>        Bare server option such as backup, repeatable',
    '    --write              Rewrite the file in place',
    '',
    '  tokens <file>        Print the token stream',
    '  help                 Show this help message',
    '  version              Show version information',
    '',
    bold('Global options:'),
    '  --strict             Reject stray tokens between statements',
    '  --log-level <level>  debug, info, warn, error or silent (default: warn)',
    '  --no-color           Disable colored output',
    '',
    `Settings may also come from ${CONFIG_FILE_NAME}.`,
  ].join('\n');
}

function cmdVersion(ctx: Context): void {
  if (hasFlag(ctx.parsed, 'json')) {
    ctx.out.push(JSON.stringify({ version: VERSION }));
    return;
  }
  ctx.out.push(`braceconf v${VERSION}`);
}

// ─── Entry point ──────────────────────────────────────────────────────────────

type Command = (ctx: Context) => Promise<void> | void;

const COMMANDS: Readonly<Record<string, Command>> = {
  format: cmdFormat,
  check: cmdCheck,
  upstreams: cmdUpstreams,
  'add-server': cmdAddServer,
  tokens: cmdTokens,
  version: cmdVersion,
};

function describeError(e: unknown): string {
  if (e instanceof BraceconfError) {
    return formatError(e);
  }
  return e instanceof Error ? e.message : String(e);
}

function resolveLogLevel(parsed: ParsedArgs, config: BraceconfConfig): LogLevel {
  const name = getFlag(parsed, 'log-level') ?? config.logLevel;
  if (name === undefined) {
    return LogLevel.WARN;
  }
  const level = parseLogLevel(name);
  if (level === undefined) {
    throw usageError(`unknown log level "${name}"`);
  }
  return level;
}

/**
 * Run one CLI invocation.
 *
 * @param args - User arguments, without the node binary and script path.
 * @param cwd - Directory that relative paths and the config lookup start from.
 */
export async function run(args: string[], cwd: string = process.cwd()): Promise<RunResult> {
  const out: string[] = [];
  const errLines: string[] = [];
  setColorsEnabled(!args.includes('--no-color'));

  try {
    const parsed = parseArgs(args);
    const loaded = loadConfig(cwd);
    const config = loaded?.config ?? {};
    if (config.color === false) {
      setColorsEnabled(false);
    }

    const log = new Logger({
      level: resolveLogLevel(parsed, config),
      component: 'braceconf',
      output: lineOutput((line) => errLines.push(line)),
    });
    if (loaded !== undefined) {
      log.debug('loaded config', { path: loaded.path });
    }

    if (parsed.command === '' || parsed.command === 'help' || hasFlag(parsed, 'help')) {
      out.push(helpText());
    } else if (hasFlag(parsed, 'version')) {
      out.push(`braceconf v${VERSION}`);
    } else {
      const command = Object.prototype.hasOwnProperty.call(COMMANDS, parsed.command)
        ? COMMANDS[parsed.command]
        : undefined;
      if (command === undefined) {
        throw usageError(`unknown command "${parsed.command}"`);
      }
      await command({ parsed, cwd, config, log: log.child(parsed.command), out });
    }
  } catch (e) {
    errLines.push(error(describeError(e)));
    return { exitCode: 1, stdout: joinLines(out), stderr: joinLines(errLines) };
  }

  return { exitCode: 0, stdout: joinLines(out), stderr: joinLines(errLines) };
}

function joinLines(lines: string[]): string {
  return lines.length === 0 ? '' : lines.join('\n') + '\n';
}
