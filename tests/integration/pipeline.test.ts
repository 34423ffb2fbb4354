import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';

import { BraceconfErrorCode, isBraceconfError, unwrap } from '@braceconf/types';
import {
  Http,
  Server,
  TabStyle,
  UpstreamServer,
  dumpConfig,
  parse,
  parseFile,
  tryParse,
} from '@braceconf/parser';

let dir: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), 'braceconf-pipeline-'));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('read, edit, write, read', () => {
  it('keeps every other statement while adding servers', async () => {
    const path = join(dir, 'lb.conf');
    writeFileSync(
      path,
      'http {\n\tupstream api {\n\t\tleast_conn;\n\t\tserver a:1;\n\t}\n\tserver { listen 80; location / { proxy_pass http://api; } }\n}\n',
    );

    const config = await parseFile(path);
    const [api] = config.findUpstreams();
    api?.addServer(new UpstreamServer({ address: 'b:1', parameters: new Map([['weight', '2']]) }));
    api?.removeServer('a:1');
    await writeFile(path, dumpConfig(config, TabStyle) + '\n');

    const reread = await parseFile(path);
    const [http] = reread.block.directives;
    expect(http).toBeInstanceOf(Http);
    expect(reread.findDirectives('least_conn')).toHaveLength(1);
    expect(reread.findUpstreams()[0]?.servers.map((s) => s.getParameters().map((p) => p.value))).toEqual([
      ['b:1', 'weight=2'],
    ]);
    const servers = http instanceof Http ? http.servers : [];
    expect(servers[0]).toBeInstanceOf(Server);
    expect(servers[0]?.locations[0]?.match).toBe('/');
  });
});

describe('error reporting across packages', () => {
  it('exposes parse errors as braceconf errors with codes', () => {
    const result = tryParse('location {}');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(isBraceconfError(result.error, BraceconfErrorCode.LOCATION_MISSING_MATCH)).toBe(true);
      expect(result.error.toJSON()).toEqual({
        code: 'BRACECONF_E303',
        message: 'location requires a match pattern at line 1, column 1',
        hint: 'write `location /path { ... }` or `location ~ regex { ... }`',
        context: { line: 1, column: 1 },
      });
    }
  });

  it('unwraps a successful result', () => {
    expect(unwrap(tryParse('a;')).block.directives).toHaveLength(1);
  });

  it('rethrows from unwrap on failure', () => {
    expect(() => unwrap(tryParse('a'))).toThrow('unexpected token `EOF` (``) at line 1, column 2');
  });

  it('produces an empty document for whitespace and comments only', () => {
    expect(parse('\n# only a comment\n').findDirectives('anything')).toEqual([]);
  });
});
