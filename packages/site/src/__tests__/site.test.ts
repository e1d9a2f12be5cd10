/**
 * Site Lifecycle Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as http from 'http';
import * as https from 'https';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { AddressInfo } from 'net';
import { ContentServer, statusForFailure, type ErrorHandler } from '@snowweb/content';
import { BuildError, type ContentRoot } from '@snowweb/core';
import {
  NixBuilder,
  SiteCoordinator,
  SiteHandler,
  ServingSnapshot,
  parseBuildOutput,
  isReservedPath,
  parsePathInfoOutput,
  readSiteHeaders,
  snapshotOf,
  type ContentBuilder,
} from '../index.js';

// =============================================================================
// Helpers
// =============================================================================

const FIXTURES = fileURLToPath(new URL('../../../tls/src/__tests__/fixtures/', import.meta.url));

function readFixture(name: string): Buffer {
  return fs.readFileSync(path.join(FIXTURES, name));
}

interface Deferred {
  promise: Promise<void>;
  open: () => void;
}

function deferred(): Deferred {
  let open: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

class FakeBuilder implements ContentBuilder {
  readonly calls: string[] = [];
  readonly events: string[] = [];
  readonly roots = new Map<string, ContentRoot>();
  readonly gates = new Map<string, Deferred>();
  failure?: Error;

  async build(installable: string): Promise<ContentRoot> {
    this.calls.push(installable);
    this.events.push(`start:${installable}`);
    await this.gates.get(installable)?.promise;
    this.events.push(`end:${installable}`);

    if (this.failure) throw this.failure;
    const root = this.roots.get(installable);
    if (!root) throw new Error(`unknown installable ${installable}`);
    return root;
  }
}

async function rejection(promise: Promise<unknown>): Promise<BuildError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof BuildError) return error;
    throw error;
  }
  throw new Error('expected a BuildError');
}

interface TestResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

interface RequestOptions {
  method?: string;
  headers?: Record<string, string>;
  /** Client certificate fixture pair, e.g. `client` */
  identity?: string;
}

function collect(resolve: (response: TestResponse) => void, reject: (error: Error) => void) {
  return (res: http.IncomingMessage): void => {
    const chunks: Buffer[] = [];
    res.on('data', (chunk: Buffer) => chunks.push(chunk));
    res.on('end', () =>
      resolve({ status: res.statusCode ?? 0, headers: res.headers, body: Buffer.concat(chunks).toString('utf8') })
    );
    res.on('error', reject);
  };
}

function request(port: number, requestPath: string, options: RequestOptions = {}): Promise<TestResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      { host: '127.0.0.1', port, path: requestPath, method: options.method ?? 'GET', headers: options.headers },
      collect(resolve, reject)
    );
    req.on('error', reject);
    req.end();
  });
}

function secureRequest(port: number, requestPath: string, options: RequestOptions = {}): Promise<TestResponse> {
  return new Promise((resolve, reject) => {
    const req = https.request(
      {
        host: '127.0.0.1',
        port,
        path: requestPath,
        method: options.method ?? 'GET',
        headers: options.headers,
        servername: 'localhost',
        ca: readFixture('ca.pem'),
        cert: options.identity ? readFixture(`${options.identity}.pem`) : undefined,
        key: options.identity ? readFixture(`${options.identity}.key`) : undefined,
        agent: false,
      },
      collect(resolve, reject)
    );
    req.on('error', reject);
    req.end();
  });
}

type TestServer = http.Server | https.Server;

function listen(server: TestServer): Promise<number> {
  return new Promise((resolve) =>
    server.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : 0);
    })
  );
}

function close(server: TestServer): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve) => server.close(() => resolve()));
}

let workspace: string;

function makeRoot(name: string, files: Record<string, string>): ContentRoot {
  const root = path.join(workspace, name);
  for (const [file, content] of Object.entries(files)) {
    fs.mkdirSync(path.dirname(path.join(root, file)), { recursive: true });
    fs.writeFileSync(path.join(root, file), content);
  }
  fs.mkdirSync(root, { recursive: true });
  return { path: root, hash: `sha256-${name}` };
}

beforeEach(() => {
  workspace = fs.mkdtempSync(path.join(os.tmpdir(), 'snowweb-site-'));
});

afterEach(() => {
  fs.rmSync(workspace, { recursive: true, force: true });
});

// =============================================================================
// Nix output parsing
// =============================================================================

describe('parseBuildOutput', () => {
  it('should read the out path', () => {
    expect(parseBuildOutput([{ drvPath: '/nix/store/a.drv', outputs: { out: '/nix/store/a-site' } }])).toBe(
      '/nix/store/a-site'
    );
  });

  it('should reject unexpected shapes', () => {
    expect(parseBuildOutput([])).toBeUndefined();
    expect(parseBuildOutput({ outputs: { out: '/nix/store/a' } })).toBeUndefined();
    expect(parseBuildOutput([{ outputs: { dev: '/nix/store/a-dev' } }])).toBeUndefined();
  });
});

describe('parsePathInfoOutput', () => {
  it('should accept the array shape', () => {
    expect(parsePathInfoOutput([{ path: '/nix/store/a', narHash: 'sha256-aaa' }], '/nix/store/a')).toBe('sha256-aaa');
  });

  it('should accept the path-keyed object shape', () => {
    expect(parsePathInfoOutput({ '/nix/store/a': { narHash: 'sha256-aaa' } }, '/nix/store/a')).toBe('sha256-aaa');
  });

  it('should reject output without a hash', () => {
    expect(parsePathInfoOutput([{ path: '/nix/store/a' }], '/nix/store/a')).toBeUndefined();
    expect(parsePathInfoOutput('sha256-aaa', '/nix/store/a')).toBeUndefined();
  });
});

// =============================================================================
// Nix builder
// =============================================================================

describe('NixBuilder', () => {
  function fakeNix(body: string): { command: string; log: string } {
    const log = path.join(workspace, 'nix.log');
    const command = path.join(workspace, 'nix');
    fs.writeFileSync(command, `#!/bin/sh\necho "$@" >> '${log}'\n${body}\n`, { mode: 0o755 });
    return { command, log };
  }

  it('should build and hash the installable', async () => {
    const { command, log } = fakeNix(
      [
        'case "$4" in',
        `  build) printf '[{"drvPath":"/nix/store/x.drv","outputs":{"out":"/nix/store/abc-site"}}]' ;;`,
        `  path-info) printf '{"%s":{"narHash":"sha256-fake"}}' "$6" ;;`,
        'esac',
      ].join('\n')
    );
    const builder = new NixBuilder({ command, profile: '/tmp/profile' });

    await expect(builder.build('.#site')).resolves.toEqual({ path: '/nix/store/abc-site', hash: 'sha256-fake' });
    expect(fs.readFileSync(log, 'utf8').split('\n')).toEqual([
      '--refresh --experimental-features nix-command flakes build .#site --json --no-link --profile /tmp/profile',
      '--refresh --experimental-features nix-command flakes path-info --json /nix/store/abc-site',
      '',
    ]);
  });

  it('should report a failing nix command', async () => {
    const { command } = fakeNix("echo 'error: flake not found' >&2\nexit 1");
    const error = await rejection(new NixBuilder({ command }).build('.#missing'));

    expect(error.code).toBe('BUILD_FAILED');
    expect(error.context['installable']).toBe('.#missing');
    expect(error.message).toBe(
      `building .#missing: running \`${command} --refresh --experimental-features nix-command flakes build .#missing --json --no-link\``
    );
  });

  it('should reject output that is not JSON', async () => {
    const { command } = fakeNix("echo 'warning: Git tree is dirty'");
    const error = await rejection(new NixBuilder({ command }).build('.#site'));
    expect(error.code).toBe('BUILD_OUTPUT_INVALID');
  });

  it('should reject a build without an out path', async () => {
    const { command } = fakeNix("printf '[]'");
    const error = await rejection(new NixBuilder({ command }).build('.#site'));
    expect(error.code).toBe('BUILD_OUTPUT_INVALID');
    expect(error.message).toBe('building .#site: nix build printed no output path');
  });
});

// =============================================================================
// Coordinator
// =============================================================================

describe('readSiteHeaders', () => {
  it('should treat a missing file as no headers', async () => {
    expect((await readSiteHeaders(makeRoot('plain', { 'index.html': 'x' }))).size).toBe(0);
  });

  it('should reject a malformed file', async () => {
    const root = makeRoot('bad', { '.snowweb/headers': 'X-Ok: 1\nnot a header\n' });
    const error = await rejection(readSiteHeaders(root));
    expect(error.code).toBe('SITE_HEADERS_INVALID');
    expect(error.context['line']).toBe('2');
  });
});

describe('SiteCoordinator', () => {
  let builder: FakeBuilder;
  let coordinator: SiteCoordinator;

  beforeEach(() => {
    builder = new FakeBuilder();
    builder.roots.set('site', makeRoot('a', { 'index.html': 'A', '.snowweb/headers': 'X-Build: a\n' }));
    builder.roots.set('next', makeRoot('b', { 'index.html': 'B', '.snowweb/headers': 'X-Build: b\n' }));
    coordinator = new SiteCoordinator({ installable: 'site', builder });
  });

  it('should not serve before the first build', () => {
    expect(coordinator.ready).toBe(false);
    expect(() => coordinator.snapshot()).toThrow(BuildError);
  });

  it('should publish a build', async () => {
    const snapshot = await coordinator.rebuild();

    expect(coordinator.snapshot()).toBe(snapshot);
    expect(snapshot.root.path).toBe(path.join(workspace, 'a'));
    expect(snapshot.etag).toBe('"sha256-a"');
    expect(snapshot.headers.get('X-Build')).toEqual(['a']);
    expect(snapshot.generation).toBe(1);
    expect(snapshot.server.root).toBe(snapshot.root);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(builder.calls).toEqual(['site']);
  });

  it('should build other installables on request', async () => {
    await coordinator.rebuild();
    const snapshot = await coordinator.rebuild('next');

    expect(snapshot.root.path).toBe(path.join(workspace, 'b'));
    expect(snapshot.generation).toBe(2);
  });

  it('should keep the current snapshot when a build fails', async () => {
    const before = await coordinator.rebuild();
    builder.failure = new Error('nix exploded');

    const error = await rejection(coordinator.rebuild());
    expect(error.code).toBe('BUILD_FAILED');
    expect(error.message).toBe('building site');
    expect(coordinator.snapshot()).toBe(before);
  });

  it('should keep the current snapshot when the headers are malformed', async () => {
    const before = await coordinator.rebuild();
    builder.roots.set('site', makeRoot('c', { 'index.html': 'C', '.snowweb/headers': 'garbage\n' }));

    const error = await rejection(coordinator.rebuild());
    expect(error.code).toBe('SITE_HEADERS_INVALID');
    expect(coordinator.snapshot()).toBe(before);
  });

  it('should keep serving the current snapshot when a header value cannot be sent', async () => {
    const server = http.createServer(new SiteHandler({ coordinator }).app);
    const port = await listen(server);
    try {
      const before = await coordinator.rebuild();
      builder.roots.set('site', makeRoot('d', { 'index.html': 'D', '.snowweb/headers': 'X-Ok: 1\nX-Title: Café ☕\n' }));

      const error = await rejection(coordinator.rebuild());
      expect(error.code).toBe('SITE_HEADERS_INVALID');
      expect(error.context['line']).toBe('2');
      expect(coordinator.snapshot()).toBe(before);

      const page = await request(port, '/');
      expect(page.status).toBe(200);
      expect(page.body).toBe('A');
      expect(page.headers['x-build']).toBe('a');
      expect((await request(port, '/.snowweb/status')).status).toBe(200);
    } finally {
      await close(server);
    }
  });

  it('should publish frozen header values', async () => {
    const snapshot = await coordinator.rebuild();
    expect(Object.isFrozen(snapshot.headers.get('X-Build'))).toBe(true);
  });

  it('should reject a root that does not exist', async () => {
    builder.roots.set('site', { path: path.join(workspace, 'missing'), hash: 'sha256-missing' });
    const error = await rejection(coordinator.rebuild());
    expect(error.code).toBe('BUILD_OUTPUT_INVALID');
  });

  it('should run rebuilds one at a time, last publish winning', async () => {
    const gate = deferred();
    builder.gates.set('site', gate);

    const first = coordinator.rebuild('site');
    const second = coordinator.rebuild('next');
    await tick();
    expect(builder.events).toEqual(['start:site']);

    gate.open();
    const [a, b] = await Promise.all([first, second]);

    expect(builder.events).toEqual(['start:site', 'end:site', 'start:next', 'end:next']);
    expect(a.generation).toBe(1);
    expect(b.generation).toBe(2);
    expect(coordinator.snapshot()).toBe(b);
    expect(b.headers.get('X-Build')).toEqual(['b']);
    expect(a.headers.get('X-Build')).toEqual(['a']);
  });

  it('should notify publish listeners', async () => {
    const published: number[] = [];
    coordinator.onPublish((snapshot) => published.push(snapshot.generation));

    await coordinator.rebuild();
    builder.failure = new Error('nix exploded');
    await coordinator.rebuild().catch(() => undefined);

    expect(published).toEqual([1]);
  });
});

describe('ServingSnapshot', () => {
  it('should keep its own copy of the headers', () => {
    const headers = new Map<string, string[]>([['X-Build', ['a']]]);
    const server = new ContentServer({ root: makeRoot('a', { 'index.html': 'A' }) });
    const snapshot = new ServingSnapshot({ server, headers, generation: 1 });

    headers.get('X-Build')?.push('b');
    headers.set('X-Extra', ['c']);

    expect(snapshot.headers.get('X-Build')).toEqual(['a']);
    expect(snapshot.headers.has('X-Extra')).toBe(false);
    expect(Object.isFrozen(snapshot.headers.get('X-Build'))).toBe(true);
  });
});

// =============================================================================
// Site handler
// =============================================================================

describe('isReservedPath', () => {
  it('should match the reserved directory after decoding', () => {
    expect(isReservedPath('/.snowweb')).toBe(true);
    expect(isReservedPath('/.snowweb/status')).toBe(true);
    expect(isReservedPath('/%2esnowweb/headers')).toBe(true);
    expect(isReservedPath('///.snowweb/headers')).toBe(true);
    expect(isReservedPath('/.snowweb%2Fheaders')).toBe(true);
  });

  it('should leave lookalike paths alone', () => {
    expect(isReservedPath('/.snowwebsite/index.html')).toBe(false);
    expect(isReservedPath('/docs/.snowweb/headers')).toBe(false);
    expect(isReservedPath('/%zz')).toBe(false);
  });
});

describe('SiteHandler', () => {
  let builder: FakeBuilder;
  let coordinator: SiteCoordinator;
  let server: http.Server;
  let port: number;

  beforeEach(async () => {
    builder = new FakeBuilder();
    builder.roots.set(
      'site',
      makeRoot('a', {
        'index.html': 'A',
        '.snowweb/headers': 'x-frame-options: DENY\nLink: </a.css>; rel=preload\nLink: </b.js>; rel=preload\n',
      })
    );
    coordinator = new SiteCoordinator({ installable: 'site', builder });
    server = http.createServer(new SiteHandler({ coordinator }).app);
    port = await listen(server);
  });

  afterEach(async () => {
    await close(server);
  });

  it('should answer 503 before the first build', async () => {
    const res = await request(port, '/');
    expect(res.status).toBe(503);
  });

  describe('once built', () => {
    beforeEach(async () => {
      await coordinator.rebuild();
    });

    it('should serve files with the site headers', async () => {
      const res = await request(port, '/');
      expect(res.status).toBe(200);
      expect(res.body).toBe('A');
      expect(res.headers['etag']).toBe('"sha256-a"');
      expect(res.headers['x-frame-options']).toBe('DENY');
      expect(res.headers['link']).toBe('</a.css>; rel=preload, </b.js>; rel=preload');
      expect(res.headers['x-powered-by']).toBeUndefined();
    });

    it('should report the served path as text by default', async () => {
      const res = await request(port, '/.snowweb/status');
      expect(res.status).toBe(200);
      expect(res.body).toBe(`ok\nserving ${path.join(workspace, 'a')}\n`);
      expect(res.headers['content-type']).toMatch(/^text\/plain/);
      expect(res.headers['vary']).toBe('Accept');
    });

    it('should report the served path as JSON when asked', async () => {
      const res = await request(port, '/.snowweb/status', { headers: { Accept: 'application/json' } });
      expect(res.headers['content-type']).toMatch(/^application\/json/);
      expect(JSON.parse(res.body)).toEqual({ ok: true, path: path.join(workspace, 'a') });
    });

    it('should prefer text when both representations are acceptable', async () => {
      const res = await request(port, '/.snowweb/status', { headers: { Accept: '*/*' } });
      expect(res.body).toBe(`ok\nserving ${path.join(workspace, 'a')}\n`);
    });

    it('should answer HEAD on the status endpoint', async () => {
      const res = await request(port, '/.snowweb/status', { method: 'HEAD' });
      expect(res.status).toBe(200);
      expect(res.body).toBe('');
    });

    it('should reject writes to the status endpoint', async () => {
      const res = await request(port, '/.snowweb/status', { method: 'PUT' });
      expect(res.status).toBe(405);
      expect(res.headers['allow']).toBe('GET, HEAD');
    });

    it('should hide the rest of /.snowweb', async () => {
      expect((await request(port, '/.snowweb/headers')).status).toBe(404);
      expect((await request(port, '/.snowweb')).status).toBe(404);
    });

    it('should hide /.snowweb however the path is spelled', async () => {
      for (const spelling of ['/%2esnowweb/headers', '//.snowweb/headers', '/.snowweb%2fheaders', '/%2Esnowweb/']) {
        const res = await request(port, spelling);
        expect(res.status, spelling).toBe(404);
        expect(res.body, spelling).not.toContain('x-frame-options');
      }
      expect((await request(port, '/index.html')).status).toBe(200);
    });

    it('should only accept POST on the reload endpoint', async () => {
      const res = await request(port, '/.snowweb/reload');
      expect(res.status).toBe(405);
      expect(res.headers['allow']).toBe('POST');
    });

    it('should refuse reloads without a client certificate', async () => {
      const before = coordinator.snapshot();
      const res = await request(port, '/.snowweb/reload', { method: 'POST' });

      expect(res.status).toBe(403);
      expect(res.body).toBe('');
      expect(builder.calls).toEqual(['site']);
      expect(coordinator.snapshot()).toBe(before);
    });
  });

  it('should finish a request on the snapshot it started with', async () => {
    builder.roots.set('next', makeRoot('b', { 'index.html': 'B' }));
    const errorHandler: ErrorHandler = (failure, _req, res) => {
      coordinator
        .rebuild('next')
        .then(() => {
          res.status(statusForFailure(failure)).send(`${snapshotOf(res).root.hash} ${coordinator.snapshot().root.hash}`);
        })
        .catch(() => res.status(500).end());
    };
    coordinator = new SiteCoordinator({ installable: 'site', builder, errorHandler });
    await coordinator.rebuild();
    const isolated = http.createServer(new SiteHandler({ coordinator }).app);
    const isolatedPort = await listen(isolated);

    try {
      const res = await request(isolatedPort, '/missing');
      expect(res.status).toBe(404);
      expect(res.body).toBe('sha256-a sha256-b');
      expect((await request(isolatedPort, '/')).body).toBe('B');
    } finally {
      await close(isolated);
    }
  });
});

describe('SiteHandler over mutual TLS', () => {
  let builder: FakeBuilder;
  let coordinator: SiteCoordinator;
  let server: https.Server | undefined;

  beforeEach(async () => {
    builder = new FakeBuilder();
    builder.roots.set('site', makeRoot('a', { 'index.html': 'A' }));
    coordinator = new SiteCoordinator({ installable: 'site', builder });
    await coordinator.rebuild();
  });

  afterEach(async () => {
    if (server) await close(server);
    server = undefined;
  });

  async function start(options: { reloadFailureStatus?: number; reloadRateLimit?: number } = {}): Promise<number> {
    const handler = new SiteHandler({ coordinator, ...options });
    server = https.createServer(
      {
        cert: readFixture('server.pem'),
        key: readFixture('server.key'),
        ca: readFixture('ca.pem'),
        requestCert: true,
        rejectUnauthorized: false,
      },
      handler.app
    );
    return listen(server);
  }

  it('should rebuild for a trusted client', async () => {
    const port = await start();
    builder.roots.set('site', makeRoot('b', { 'index.html': 'B' }));

    const res = await secureRequest(port, '/.snowweb/reload', { method: 'POST', identity: 'client' });
    expect(res.status).toBe(200);
    expect(res.body).toBe(`ok\nserving ${path.join(workspace, 'b')}\n`);
    expect((await secureRequest(port, '/')).body).toBe('B');
  });

  it('should answer reloads in JSON when asked', async () => {
    const port = await start();
    const res = await secureRequest(port, '/.snowweb/reload', {
      method: 'POST',
      identity: 'client',
      headers: { Accept: 'application/json' },
    });
    expect(JSON.parse(res.body)).toEqual({ ok: true, path: path.join(workspace, 'a') });
  });

  it('should refuse clients with an untrusted certificate', async () => {
    const port = await start();
    const before = coordinator.snapshot();

    const res = await secureRequest(port, '/.snowweb/reload', { method: 'POST', identity: 'rogue-client' });
    expect(res.status).toBe(403);
    expect(builder.calls).toEqual(['site']);
    expect(coordinator.snapshot()).toBe(before);
  });

  it('should refuse TLS clients without a certificate', async () => {
    const port = await start();
    const res = await secureRequest(port, '/.snowweb/reload', { method: 'POST' });
    expect(res.status).toBe(403);
  });

  it('should report a failed rebuild with status 200 by default', async () => {
    const port = await start();
    builder.failure = new Error('nix exploded');

    const res = await secureRequest(port, '/.snowweb/reload', { method: 'POST', identity: 'client' });
    expect(res.status).toBe(200);
    expect(res.body).toBe('error\nbuilding site: nix exploded\n');
    expect((await secureRequest(port, '/')).body).toBe('A');
  });

  it('should use the configured failure status', async () => {
    const port = await start({ reloadFailureStatus: 500 });
    builder.failure = new Error('nix exploded');

    const res = await secureRequest(port, '/.snowweb/reload', {
      method: 'POST',
      identity: 'client',
      headers: { Accept: 'application/json' },
    });
    expect(res.status).toBe(500);
    expect(JSON.parse(res.body)).toEqual({ ok: false, error: 'building site: nix exploded' });
  });

  it('should rate limit reloads', async () => {
    const port = await start({ reloadRateLimit: 1 });

    expect((await secureRequest(port, '/.snowweb/reload', { method: 'POST', identity: 'client' })).status).toBe(200);
    expect((await secureRequest(port, '/.snowweb/reload', { method: 'POST', identity: 'client' })).status).toBe(429);
    expect(builder.calls).toEqual(['site', 'site']);
  });
});
