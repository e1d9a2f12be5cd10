/**
 * Content Server Tests
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import express from 'express';
import * as fs from 'fs';
import * as http from 'http';
import * as os from 'os';
import * as path from 'path';
import type { AddressInfo } from 'net';
import { ContentServer, CACHE_CONTROL, normalizeRequestPath, isValidPath, statusForFailure, type ErrorHandler } from '../index.js';

interface TestResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

function request(
  port: number,
  requestPath: string,
  options: { method?: string; headers?: Record<string, string> } = {}
): Promise<TestResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      { host: '127.0.0.1', port, path: requestPath, method: options.method ?? 'GET', headers: options.headers },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('end', () =>
          resolve({ status: res.statusCode ?? 0, headers: res.headers, body: Buffer.concat(chunks).toString('utf8') })
        );
        res.on('error', reject);
      }
    );
    req.on('error', reject);
    req.end();
  });
}

function listen(app: express.Express): Promise<{ server: http.Server; port: number }> {
  return new Promise((resolve) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      resolve({ server, port: typeof address === 'object' && address !== null ? address.port : 0 });
    });
  });
}

function close(server: http.Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe('normalizeRequestPath', () => {
  it('should map the root to index.html', () => {
    expect(normalizeRequestPath('')).toBe('index.html');
    expect(normalizeRequestPath('/')).toBe('index.html');
  });

  it('should append index.html to directory paths', () => {
    expect(normalizeRequestPath('/docs/')).toBe('docs/index.html');
    expect(normalizeRequestPath('/docs/guide/')).toBe('docs/guide/index.html');
  });

  it('should decode percent escapes', () => {
    expect(normalizeRequestPath('/my%20file.txt')).toBe('my file.txt');
  });

  it('should reject paths leaving the root', () => {
    expect(normalizeRequestPath('/../etc/passwd')).toBeUndefined();
    expect(normalizeRequestPath('/%2e%2e/secret')).toBeUndefined();
    expect(normalizeRequestPath('/a/./b')).toBeUndefined();
    expect(normalizeRequestPath('//a//b')).toBeUndefined();
  });

  it('should reject undecodable paths', () => {
    expect(normalizeRequestPath('/%E0%A4%A')).toBeUndefined();
  });
});

describe('isValidPath', () => {
  it('should accept plain relative paths', () => {
    expect(isValidPath('index.html')).toBe(true);
    expect(isValidPath('.well-known/security.txt')).toBe(true);
  });

  it('should reject backslashes and NUL bytes', () => {
    expect(isValidPath('a\\b')).toBe(false);
    expect(isValidPath('a\0b')).toBe(false);
  });
});

describe('statusForFailure', () => {
  it('should map failures to status codes', () => {
    expect(statusForFailure({ kind: 'unsupported-method', allow: ['GET'] })).toBe(405);
    expect(statusForFailure({ kind: 'invalid-path', path: '/..' })).toBe(400);
    expect(statusForFailure({ kind: 'not-found' })).toBe(404);
    expect(statusForFailure({ kind: 'forbidden' })).toBe(403);
    expect(statusForFailure({ kind: 'unavailable' })).toBe(503);
    expect(statusForFailure({ kind: 'io', cause: new Error('disk') })).toBe(500);
  });
});

describe('ContentServer', () => {
  let root: string;
  let server: http.Server;
  let port: number;

  beforeAll(async () => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'snowweb-content-'));
    fs.writeFileSync(path.join(root, 'index.html'), 'hello');
    fs.mkdirSync(path.join(root, 'docs'));
    fs.writeFileSync(path.join(root, 'docs', 'index.html'), 'docs');
    fs.mkdirSync(path.join(root, 'empty'));
    fs.writeFileSync(path.join(root, 'app.js'), 'console.log(1);');
    fs.writeFileSync(path.join(root, 'app.js.br'), 'BR-DATA');
    fs.mkdirSync(path.join(root, '.well-known'));
    fs.writeFileSync(path.join(root, '.well-known', 'security.txt'), 'Contact: mailto:security@example.com');

    const content = new ContentServer({ root: { path: root, hash: 'sha256-test' } });
    const app = express();
    app.use(content.handler());
    ({ server, port } = await listen(app));
  });

  afterAll(async () => {
    await close(server);
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('should expose the root and its ETag', () => {
    const content = new ContentServer({ root: { path: root, hash: 'sha256-abc' } });
    expect(content.etag).toBe('"sha256-abc"');
    expect(content.root.hash).toBe('sha256-abc');
    expect(Object.isFrozen(content)).toBe(true);
  });

  it('should serve index.html for the root', async () => {
    const res = await request(port, '/');
    expect(res.status).toBe(200);
    expect(res.body).toBe('hello');
    expect(res.headers['etag']).toBe('"sha256-test"');
    expect(res.headers['cache-control']).toBe(CACHE_CONTROL);
    expect(res.headers['vary']).toBe('Accept-Encoding');
    expect(res.headers['content-type']).toMatch(/^text\/html/);
    expect(res.headers['last-modified']).toBeUndefined();
  });

  it('should share one ETag across files', async () => {
    const first = await request(port, '/');
    const second = await request(port, '/app.js');
    expect(first.headers['etag']).toBe(second.headers['etag']);
  });

  it('should serve directories through their index', async () => {
    expect((await request(port, '/docs/')).body).toBe('docs');
    expect((await request(port, '/docs')).body).toBe('docs');
  });

  it('should serve dotfiles', async () => {
    const res = await request(port, '/.well-known/security.txt');
    expect(res.status).toBe(200);
    expect(res.body).toBe('Contact: mailto:security@example.com');
  });

  it('should answer 404 for missing files and index-less directories', async () => {
    const missing = await request(port, '/nope.html');
    expect(missing.status).toBe(404);
    expect(missing.body).toBe('');

    expect((await request(port, '/empty/')).status).toBe(404);
    expect((await request(port, '/index.html/child')).status).toBe(404);
  });

  it('should reject methods other than GET and HEAD', async () => {
    const res = await request(port, '/', { method: 'POST' });
    expect(res.status).toBe(405);
    expect(res.headers['allow']).toBe('GET, HEAD');
  });

  it('should reject traversal attempts', async () => {
    const res = await request(port, '/%2e%2e/secret');
    expect(res.status).toBe(400);
    expect(res.body).toBe('');
  });

  it('should answer HEAD without a body', async () => {
    const res = await request(port, '/', { method: 'HEAD' });
    expect(res.status).toBe(200);
    expect(res.headers['content-length']).toBe('5');
    expect(res.body).toBe('');
  });

  it('should answer 304 for a matching If-None-Match', async () => {
    const res = await request(port, '/', { headers: { 'If-None-Match': '"sha256-test"' } });
    expect(res.status).toBe(304);
    expect(res.body).toBe('');
  });

  it('should ignore a stale If-None-Match', async () => {
    const res = await request(port, '/', { headers: { 'If-None-Match': '"sha256-old"' } });
    expect(res.status).toBe(200);
    expect(res.body).toBe('hello');
  });

  it('should serve byte ranges', async () => {
    const res = await request(port, '/', { headers: { Range: 'bytes=0-1' } });
    expect(res.status).toBe(206);
    expect(res.headers['content-range']).toBe('bytes 0-1/5');
    expect(res.body).toBe('he');
  });

  it('should ignore ranges with a stale If-Range', async () => {
    const res = await request(port, '/', { headers: { Range: 'bytes=0-1', 'If-Range': '"sha256-old"' } });
    expect(res.status).toBe(200);
    expect(res.body).toBe('hello');
  });

  it('should answer 416 for unsatisfiable ranges', async () => {
    const res = await request(port, '/', { headers: { Range: 'bytes=10-20' } });
    expect(res.status).toBe(416);
    expect(res.headers['content-range']).toBe('bytes */5');
  });

  it('should serve a precompressed sibling when accepted', async () => {
    const res = await request(port, '/app.js', { headers: { 'Accept-Encoding': 'br, gzip' } });
    expect(res.status).toBe(200);
    expect(res.body).toBe('BR-DATA');
    expect(res.headers['content-encoding']).toBe('br');
    expect(res.headers['content-type']).toMatch(/^application\/javascript/);
  });

  it('should serve the plain file when brotli is not accepted', async () => {
    const res = await request(port, '/app.js', { headers: { 'Accept-Encoding': 'gzip' } });
    expect(res.body).toBe('console.log(1);');
    expect(res.headers['content-encoding']).toBeUndefined();
  });

  it('should keep a Cache-Control set before it', async () => {
    const content = new ContentServer({ root: { path: root, hash: 'sha256-test' } });
    const app = express();
    app.use((_req, res, next) => {
      res.setHeader('Cache-Control', 'no-store');
      next();
    });
    app.use(content.handler());
    const listening = await listen(app);
    try {
      const res = await request(listening.port, '/');
      expect(res.headers['cache-control']).toBe('no-store');
    } finally {
      await close(listening.server);
    }
  });

  it('should route failures through a custom error handler', async () => {
    const seen: string[] = [];
    const errorHandler: ErrorHandler = (failure, _req, res) => {
      seen.push(failure.kind);
      res.status(statusForFailure(failure)).type('text/plain').send(`failed: ${failure.kind}`);
    };
    const content = new ContentServer({ root: { path: root, hash: 'sha256-test' }, errorHandler });
    const app = express();
    app.use(content.handler());
    const listening = await listen(app);
    try {
      const res = await request(listening.port, '/missing');
      expect(res.status).toBe(404);
      expect(res.body).toBe('failed: not-found');
      expect(seen).toEqual(['not-found']);
    } finally {
      await close(listening.server);
    }
  });
});
