/**
 * Request failures and their responses
 *
 * Failures while handling a request are described by a RequestFailure and
 * turned into a response by an ErrorHandler. The default handler answers
 * with the status code alone and an empty body, so that nothing about the
 * filesystem leaks to clients.
 */

import type { Request, Response } from 'express';

export type RequestFailure =
  /** Method not allowed on this resource */
  | { kind: 'unsupported-method'; allow: readonly string[] }
  /** Path escapes the root or cannot be decoded */
  | { kind: 'invalid-path'; path: string }
  /** No such file */
  | { kind: 'not-found' }
  /** Client is not allowed to use this endpoint */
  | { kind: 'forbidden' }
  /** Nothing to serve yet */
  | { kind: 'unavailable' }
  /** Any other I/O failure */
  | { kind: 'io'; cause: unknown };

export type RequestFailureKind = RequestFailure['kind'];

export type ErrorHandler = (failure: RequestFailure, req: Request, res: Response) => void;

const STATUS: Record<RequestFailureKind, number> = {
  'unsupported-method': 405,
  'invalid-path': 400,
  'not-found': 404,
  forbidden: 403,
  unavailable: 503,
  io: 500,
};

export function statusForFailure(failure: RequestFailure): number {
  return STATUS[failure.kind];
}

/**
 * Status code only, no body.
 */
export const defaultErrorHandler: ErrorHandler = (failure, _req, res) => {
  if (res.headersSent) {
    res.destroy();
    return;
  }

  if (failure.kind === 'unsupported-method') {
    res.setHeader('Allow', failure.allow.join(', '));
  }
  res.setHeader('Content-Length', '0');
  res.status(statusForFailure(failure)).end();
};
