/**
 * Content Server
 *
 * Serves files from one immutable content root. Every file shares the
 * root's ETag, since the root's digest changes whenever any file does;
 * modification times carry no meaning in a content-addressed tree and are
 * never sent or compared.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { createSilentLogger, hasErrorCode, type ContentRoot, type Logger } from '@snowweb/core';
import { defaultErrorHandler, type ErrorHandler, type RequestFailure } from './errors.js';
import { INDEX_FILE, normalizeRequestPath } from './paths.js';

// =============================================================================
// Types
// =============================================================================

export interface ContentServerOptions {
  /** Tree to serve */
  root: ContentRoot;
  /** Response strategy for failed requests */
  errorHandler?: ErrorHandler;
  /** Logger */
  logger?: Logger;
}

/** Encodings offered as precompressed siblings, by file suffix */
const PRECOMPRESSED = [{ encoding: 'br', suffix: '.br' }] as const;

export const CACHE_CONTROL = 'public, max-age=0, proxy-revalidate';

const ALLOWED_METHODS = ['GET', 'HEAD'] as const;

interface ResolvedFile {
  /** Path of the file to send, relative to the root */
  file: string;
  /** Name used to pick the Content-Type */
  typeName: string;
  /** Content-Encoding of the sent file, when precompressed */
  encoding?: string;
}

// =============================================================================
// Content Server
// =============================================================================

export class ContentServer {
  readonly root: ContentRoot;
  readonly etag: string;
  private readonly errorHandler: ErrorHandler;
  private readonly logger: Logger;

  constructor(options: ContentServerOptions) {
    this.root = Object.freeze({ path: path.resolve(options.root.path), hash: options.root.hash });
    this.etag = `"${options.root.hash}"`;
    this.errorHandler = options.errorHandler ?? defaultErrorHandler;
    this.logger = options.logger ?? createSilentLogger();
    Object.freeze(this);
  }

  /**
   * Express middleware serving this root
   */
  handler(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      this.serve(req, res).catch(next);
    };
  }

  /**
   * Respond to a GET or HEAD request with the file under the root.
   * Directories are served through their index.html.
   */
  async serve(req: Request, res: Response): Promise<void> {
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      this.fail({ kind: 'unsupported-method', allow: ALLOWED_METHODS }, req, res);
      return;
    }

    const requestPath = normalizeRequestPath(req.path);
    if (requestPath === undefined) {
      this.logger.warn('invalid request path', { path: req.path });
      this.fail({ kind: 'invalid-path', path: req.path }, req, res);
      return;
    }
    this.logger.debug('rewrote request path', { from: req.path, to: requestPath });

    let file: string;
    try {
      file = await this.locate(requestPath);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
        this.fail({ kind: 'not-found' }, req, res);
      } else {
        this.logger.error('could not open file', { path: requestPath, error });
        this.fail({ kind: 'io', cause: error }, req, res);
      }
      return;
    }

    const resolved = await this.negotiateEncoding(req, file);

    if (!res.getHeader('Cache-Control')) {
      res.setHeader('Cache-Control', CACHE_CONTROL);
    }
    res.setHeader('ETag', this.etag);
    res.vary('Accept-Encoding');
    if (resolved.encoding) {
      res.setHeader('Content-Encoding', resolved.encoding);
      res.type(path.posix.basename(resolved.typeName));
    }

    await this.send(req, res, resolved);
  }

  /**
   * Find the regular file for a validated request path, descending into
   * index.html once when the path names a directory.
   */
  private async locate(requestPath: string): Promise<string> {
    let relative = requestPath;
    let stats = await fs.promises.stat(this.absolute(relative));
    if (stats.isDirectory()) {
      relative = `${relative}/${INDEX_FILE}`;
      stats = await fs.promises.stat(this.absolute(relative));
    }
    if (!stats.isFile()) {
      throw Object.assign(new Error(`${relative} is not a regular file`), { code: 'ENOENT' });
    }
    return relative;
  }

  /**
   * Swap in a precompressed sibling when the client accepts its encoding.
   * Any problem with the sibling falls back to the plain file.
   */
  private async negotiateEncoding(req: Request, file: string): Promise<ResolvedFile> {
    for (const { encoding, suffix } of PRECOMPRESSED) {
      if (req.acceptsEncodings(encoding, 'identity') !== encoding) continue;

      const candidate = file + suffix;
      try {
        const stats = await fs.promises.stat(this.absolute(candidate));
        if (stats.isFile()) {
          this.logger.debug('sending precompressed file', { path: candidate });
          return { file: candidate, typeName: file, encoding };
        }
      } catch (error) {
        if (!hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
          this.logger.error('could not open precompressed file', { path: candidate, error });
        }
      }
    }
    return { file, typeName: file };
  }

  /**
   * Hand the file to the send primitive, which answers conditional and
   * range requests against the ETag set on the response.
   */
  private send(req: Request, res: Response, resolved: ResolvedFile): Promise<void> {
    return new Promise((resolve) => {
      res.sendFile(
        resolved.file,
        {
          root: this.root.path,
          etag: false,
          lastModified: false,
          cacheControl: false,
          dotfiles: 'allow',
          acceptRanges: true,
        },
        (error?: Error) => {
          if (error) {
            this.onSendError(error, req, res, resolved.file);
          } else {
            this.logger.info('served', { path: req.path, status: res.statusCode });
          }
          resolve();
        }
      );
    });
  }

  private onSendError(error: Error, req: Request, res: Response, file: string): void {
    if (hasErrorCode(error, 'ECONNABORTED', 'ECONNRESET', 'EPIPE')) {
      this.logger.debug('client went away', { path: req.path });
      return;
    }

    const status = httpStatusOf(error);
    if (!res.headersSent && status === 416) {
      res.setHeader('Content-Range', contentRangeOf(error) ?? 'bytes */*');
      res.setHeader('Content-Length', '0');
      res.status(416).end();
      return;
    }
    if (!res.headersSent && status === 412) {
      res.setHeader('Content-Length', '0');
      res.status(412).end();
      return;
    }
    if (status === 404 || hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
      this.fail({ kind: 'not-found' }, req, res);
      return;
    }

    this.logger.error('could not send file', { path: file, error });
    this.fail({ kind: 'io', cause: error }, req, res);
  }

  private fail(failure: RequestFailure, req: Request, res: Response): void {
    this.errorHandler(failure, req, res);
  }

  private absolute(relative: string): string {
    return path.join(this.root.path, relative);
  }
}

function httpStatusOf(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function contentRangeOf(error: Error): string | undefined {
  if (!('headers' in error) || typeof error.headers !== 'object' || error.headers === null) {
    return undefined;
  }
  const headers: object = error.headers;
  if ('Content-Range' in headers && typeof headers['Content-Range'] === 'string') {
    return headers['Content-Range'];
  }
  return undefined;
}
