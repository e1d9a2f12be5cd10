/**
 * Site Handler
 *
 * Express application answering every request of the site:
 *
 *   GET|HEAD /.snowweb/status   which root is being served
 *   POST     /.snowweb/reload   rebuild and publish (mutual TLS only)
 *   /.snowweb/*                 404
 *   everything else             files of the captured snapshot
 */

import { TLSSocket } from 'tls';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import rateLimit from 'express-rate-limit';
import { defaultErrorHandler, normalizeRequestPath, type ErrorHandler, type RequestFailure } from '@snowweb/content';
import { createSilentLogger, describeError, type Logger } from '@snowweb/core';
import type { SiteCoordinator } from './coordinator.js';
import { captureSnapshot, snapshotOf } from './snapshot.js';

// =============================================================================
// Types
// =============================================================================

export interface SiteHandlerOptions {
  /** Source of serving snapshots and rebuilds */
  coordinator: SiteCoordinator;
  /** Failure responses */
  errorHandler?: ErrorHandler;
  /** Status of the reload response when the rebuild failed */
  reloadFailureStatus?: number;
  /** Reload requests allowed per client and window */
  reloadRateLimit?: number;
  /** Rate limit window */
  reloadRateWindowMs?: number;
  /** Logger */
  logger?: Logger;
}

export const API_PREFIX = '/.snowweb';
export const STATUS_PATH = `${API_PREFIX}/status`;
export const RELOAD_PATH = `${API_PREFIX}/reload`;

type Representation = 'text' | 'json';

const RESERVED_DIRECTORY = API_PREFIX.slice(1);

/**
 * Whether a request path resolves into the reserved directory once decoded,
 * however its slashes and dots are spelled.
 */
export function isReservedPath(rawPath: string): boolean {
  const relativePath = normalizeRequestPath(rawPath);
  if (relativePath === undefined) return false;
  return relativePath === RESERVED_DIRECTORY || relativePath.startsWith(`${RESERVED_DIRECTORY}/`);
}

// =============================================================================
// Client authentication
// =============================================================================

/**
 * Fingerprint of the verified client certificate of a request, if the
 * request came over TLS with a certificate the server trusts.
 */
export function authenticatedClient(req: Request): string | undefined {
  const socket = req.socket;
  if (!(socket instanceof TLSSocket) || !socket.authorized) {
    return undefined;
  }
  const certificate = socket.getPeerCertificate();
  if (!certificate || Object.keys(certificate).length === 0) {
    return undefined;
  }
  return certificate.fingerprint256;
}

function negotiate(req: Request): Representation {
  return req.accepts(['text/plain', 'application/json']) === 'application/json' ? 'json' : 'text';
}

// =============================================================================
// Site Handler
// =============================================================================

export class SiteHandler {
  readonly app: Express;
  private readonly coordinator: SiteCoordinator;
  private readonly errorHandler: ErrorHandler;
  private readonly config: Required<Pick<SiteHandlerOptions, 'reloadFailureStatus' | 'reloadRateLimit' | 'reloadRateWindowMs'>>;
  private readonly logger: Logger;

  constructor(options: SiteHandlerOptions) {
    this.coordinator = options.coordinator;
    this.errorHandler = options.errorHandler ?? defaultErrorHandler;
    this.logger = options.logger ?? createSilentLogger();
    this.config = {
      reloadFailureStatus: options.reloadFailureStatus ?? 200,
      reloadRateLimit: options.reloadRateLimit ?? 10,
      reloadRateWindowMs: options.reloadRateWindowMs ?? 60 * 1000,
    };

    this.app = express();
    this.app.disable('x-powered-by');
    this.app.set('etag', false);
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Capture the active snapshot once per request; everything downstream
   * uses this capture, however many publishes happen meanwhile.
   */
  private setupMiddleware(): void {
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      if (!this.coordinator.ready) {
        this.fail({ kind: 'unavailable' }, req, res);
        return;
      }
      const snapshot = this.coordinator.snapshot();
      captureSnapshot(res, snapshot);
      snapshot.applyHeaders(res);
      next();
    });
  }

  private setupRoutes(): void {
    this.app.all(STATUS_PATH, (req: Request, res: Response) => this.serveStatus(req, res));

    this.app.all(
      RELOAD_PATH,
      (req: Request, res: Response, next: NextFunction) => {
        if (req.method !== 'POST') {
          this.fail({ kind: 'unsupported-method', allow: ['POST'] }, req, res);
          return;
        }
        next();
      },
      (req: Request, res: Response, next: NextFunction) => {
        if (authenticatedClient(req) === undefined) {
          this.logger.warn('rejected unauthenticated reload request', { remote: req.socket.remoteAddress });
          this.fail({ kind: 'forbidden' }, req, res);
          return;
        }
        next();
      },
      rateLimit({
        windowMs: this.config.reloadRateWindowMs,
        limit: this.config.reloadRateLimit,
        standardHeaders: 'draft-7',
        legacyHeaders: false,
        validate: false,
        keyGenerator: (req: Request) => authenticatedClient(req) ?? 'anonymous',
        handler: (req: Request, res: Response) => {
          this.logger.warn('reload rate limit exceeded', { client: authenticatedClient(req) });
          res.setHeader('Content-Length', '0');
          res.status(429).end();
        },
      }),
      (req: Request, res: Response, next: NextFunction) => {
        this.serveReload(req, res).catch(next);
      }
    );

    // Everything else under /.snowweb is private to the site.
    this.app.use(API_PREFIX, (req: Request, res: Response) => {
      this.fail({ kind: 'not-found' }, req, res);
    });

    this.app.use((req: Request, res: Response, next: NextFunction) => {
      if (isReservedPath(req.path)) {
        this.fail({ kind: 'not-found' }, req, res);
        return;
      }
      snapshotOf(res).server.serve(req, res).catch(next);
    });

    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      this.logger.error('request failed', { path: req.path, error: describeError(error) });
      this.fail({ kind: 'io', cause: error }, req, res);
    });
  }

  private serveStatus(req: Request, res: Response): void {
    res.vary('Accept');
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      this.fail({ kind: 'unsupported-method', allow: ['GET', 'HEAD'] }, req, res);
      return;
    }

    const servingPath = snapshotOf(res).root.path;
    if (negotiate(req) === 'json') {
      res.json({ ok: true, path: servingPath });
    } else {
      res.type('text/plain').send(`ok\nserving ${servingPath}\n`);
    }
  }

  private async serveReload(req: Request, res: Response): Promise<void> {
    res.vary('Accept');
    const representation = negotiate(req);
    const client = authenticatedClient(req);
    this.logger.info('reload requested', { client });

    try {
      const snapshot = await this.coordinator.rebuild();
      if (representation === 'json') {
        res.json({ ok: true, path: snapshot.root.path });
      } else {
        res.type('text/plain').send(`ok\nserving ${snapshot.root.path}\n`);
      }
    } catch (error) {
      const message = describeError(error);
      res.status(this.config.reloadFailureStatus);
      if (representation === 'json') {
        res.json({ ok: false, error: message });
      } else {
        res.type('text/plain').send(`error\n${message}\n`);
      }
    }
  }

  private fail(failure: RequestFailure, req: Request, res: Response): void {
    this.errorHandler(failure, req, res);
  }
}
