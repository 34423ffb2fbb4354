/**
 * Example 03: Custom directive handling
 *
 * Registers a block wrapper that collects every `map` block while the
 * document is parsed, and reports parse failures through `tryParse`.
 *
 * Run: npx tsx examples/03-custom-directives.ts
 */

import { formatError } from '@braceconf/types';
import { tryParse } from '@braceconf/parser';
import type { Directive } from '@braceconf/parser';

const sources = [
  'http { map $uri $bucket { default a; /b b; } map $host $site { default main; } }',
  'http { map $uri $bucket { default a } }',
];

for (const source of sources) {
  const maps: Directive[] = [];
  const result = tryParse(source, {
    blockWrappers: {
      map: (directive) => {
        maps.push(directive);
        return directive;
      },
    },
  });

  if (!result.ok) {
    console.log(formatError(result.error));
    continue;
  }
  for (const map of maps) {
    const [from, to] = map.args;
    console.log(`map ${from} -> ${to}: ${map.block?.directives.length ?? 0} entries`);
  }
}
