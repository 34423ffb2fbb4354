import * as fs from 'fs/promises';
import { readFileSync } from 'fs';

import { parse } from './parser';
import type { ParserOptions } from './parser';
import type { Config } from './model';
import { ConfigFileError } from './errors';

function asError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/**
 * Read and parse a configuration file. The path is recorded on the
 * returned {@link Config} and on any parse error.
 *
 * @throws {ConfigFileError} When the file cannot be read.
 * @throws {ParseError} When its contents do not parse.
 */
export async function parseFile(filePath: string, options?: Omit<ParserOptions, 'filePath'>): Promise<Config> {
  let source: string;
  try {
    source = await fs.readFile(filePath, 'utf-8');
  } catch (e) {
    throw new ConfigFileError(filePath, asError(e));
  }
  return parse(source, { ...options, filePath });
}

/** Synchronous twin of {@link parseFile}. */
export function parseFileSync(filePath: string, options?: Omit<ParserOptions, 'filePath'>): Config {
  let source: string;
  try {
    source = readFileSync(filePath, 'utf-8');
  } catch (e) {
    throw new ConfigFileError(filePath, asError(e));
  }
  return parse(source, { ...options, filePath });
}
