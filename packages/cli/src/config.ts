/**
 * `braceconf.config.json` support.
 *
 * The file is looked up from the working directory towards the
 * filesystem root; the first one found wins. Command-line flags override
 * every setting in it.
 *
 * @packageDocumentation
 */

import { readFileSync, existsSync } from 'fs';
import { join, resolve } from 'path';

import { BraceconfError, BraceconfErrorCode, parseLogLevel } from '@braceconf/types';
import { isStyleName } from '@braceconf/parser';
import type { StyleName } from '@braceconf/parser';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Shape of a `braceconf.config.json` file. */
export interface BraceconfConfig {
  /** Default rendering style for `format` and `add-server`. */
  style?: StyleName;
  /** Default log level: `debug`, `info`, `warn`, `error` or `silent`. */
  logLevel?: string;
  /** Reject stray tokens between statements. */
  strict?: boolean;
  /** Set to `false` to disable ANSI colors. */
  color?: boolean;
}

/** A loaded configuration together with where it came from. */
export interface LoadedConfig {
  path: string;
  config: BraceconfConfig;
}

/** Name of the configuration file. */
export const CONFIG_FILE_NAME = 'braceconf.config.json';

// ─── Validation ───────────────────────────────────────────────────────────────

function invalid(path: string, reason: string, cause?: Error): BraceconfError {
  return new BraceconfError(BraceconfErrorCode.INVALID_CONFIG_FILE, `${path}: ${reason}`, {
    context: { path },
    hint: 'Valid keys: style, logLevel, strict, color',
    cause,
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check the parsed JSON of a config file and copy out the known keys.
 * Unknown keys are ignored.
 *
 * @throws {BraceconfError} `BRACECONF_E502` when a key has the wrong type or value.
 */
export function validateConfig(raw: unknown, path: string): BraceconfConfig {
  if (!isRecord(raw)) {
    throw invalid(path, 'expected a JSON object');
  }

  const config: BraceconfConfig = {};

  const { style, logLevel, strict, color } = raw;
  if (style !== undefined) {
    if (typeof style !== 'string' || !isStyleName(style)) {
      throw invalid(path, `unknown style ${JSON.stringify(style)}`);
    }
    config.style = style;
  }
  if (logLevel !== undefined) {
    if (typeof logLevel !== 'string' || parseLogLevel(logLevel) === undefined) {
      throw invalid(path, `unknown logLevel ${JSON.stringify(logLevel)}`);
    }
    config.logLevel = logLevel;
  }
  if (strict !== undefined) {
    if (typeof strict !== 'boolean') {
      throw invalid(path, '"strict" must be a boolean');
    }
    config.strict = strict;
  }
  if (color !== undefined) {
    if (typeof color !== 'boolean') {
      throw invalid(path, '"color" must be a boolean');
    }
    config.color = color;
  }

  return config;
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Search for a `braceconf.config.json` starting from `cwd` and walking up
 * to the filesystem root.
 *
 * @returns The absolute path, or `undefined` when there is none.
 */
export function findConfigFile(cwd?: string): string | undefined {
  let dir = resolve(cwd ?? '.');

  for (;;) {
    const candidate = join(dir, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return undefined;
    dir = parent;
  }
}

/**
 * Load the nearest `braceconf.config.json` above `cwd`.
 *
 * @returns `undefined` when no config file exists.
 * @throws {BraceconfError} `BRACECONF_E502` when the file is not valid.
 */
export function loadConfig(cwd?: string): LoadedConfig | undefined {
  const path = findConfigFile(cwd);
  if (path === undefined) return undefined;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (e) {
    const cause = e instanceof Error ? e : new Error(String(e));
    throw invalid(path, `cannot read config: ${cause.message}`, cause);
  }
  return { path, config: validateConfig(raw, path) };
}
