/**
 * Example 02: Rendering styles
 *
 * The same document under each built-in style, plus a derived one.
 *
 * Run: npx tsx examples/02-format-styles.ts
 */

import { createStyle, dumpConfig, parse, styles } from '@braceconf/parser';

const config = parse(
  '# site\nhttp { server { listen 80; location / { root "/srv/www"; } } upstream api { server 10.0.0.1:80; } }',
);

for (const [name, style] of Object.entries(styles)) {
  console.log(`--- ${name} ---`);
  console.log(dumpConfig(config, style));
  console.log('');
}

console.log('--- two spaces, brace on its own line ---');
console.log(dumpConfig(config, createStyle({ indent: '  ', braceOnNewLine: true, spaceBeforeBlocks: true })));
