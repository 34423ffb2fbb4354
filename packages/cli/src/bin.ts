#!/usr/bin/env tsx

import { run } from './index';

const args = process.argv.slice(2);
const plain = !process.stdout.isTTY || process.env['NO_COLOR'] !== undefined;

run(plain && !args.includes('--no-color') ? [...args, '--no-color'] : args).then(
  (result) => {
    process.stdout.write(result.stdout);
    process.stderr.write(result.stderr);
    process.exitCode = result.exitCode;
  },
  (e: unknown) => {
    process.stderr.write(`${e instanceof Error ? e.stack ?? e.message : String(e)}\n`);
    process.exitCode = 1;
  },
);
