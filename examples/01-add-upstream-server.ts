/**
 * Example 01: Add a server to an upstream pool
 *
 * Parses a configuration, finds its upstreams, appends a backend and
 * prints the document again.
 *
 * Run: npx tsx examples/01-add-upstream-server.ts
 */

import { UpstreamServer, dumpConfig, parse } from '@braceconf/parser';

const source = `
http {
  upstream my_backend {
    server 127.0.0.1:443;
    server 127.0.0.2:443 backup;
  }
}
`;

function main(): void {
  const config = parse(source);

  for (const upstream of config.findUpstreams()) {
    console.log(`upstream ${upstream.upstreamName}: ${upstream.servers.length} servers`);
  }

  const [backend] = config.findUpstreams();
  if (backend === undefined) {
    throw new Error('no upstream in the document');
  }

  backend.addServer(
    new UpstreamServer({ address: '127.0.0.1:443', parameters: { weight: '5' }, flags: ['down'] }),
  );

  console.log(dumpConfig(config));
}

main();
