/**
 * Serving snapshots
 */

import type { Response } from 'express';
import type { ContentServer } from '@snowweb/content';
import type { ContentRoot, HeaderMap } from '@snowweb/core';

export interface ServingSnapshotInit {
  server: ContentServer;
  headers: HeaderMap;
  generation: number;
  publishedAt?: Date;
}

/**
 * Everything needed to answer a request from one published build: the
 * root, its file server and its header overrides. Snapshots are frozen;
 * publishing a build creates a new one.
 */
export class ServingSnapshot {
  readonly root: ContentRoot;
  readonly etag: string;
  readonly headers: HeaderMap;
  readonly server: ContentServer;
  readonly generation: number;
  readonly publishedAt: Date;

  constructor(init: ServingSnapshotInit) {
    this.server = init.server;
    this.root = init.server.root;
    this.etag = init.server.etag;
    this.headers = freezeHeaders(init.headers);
    this.generation = init.generation;
    this.publishedAt = init.publishedAt ?? new Date();
    Object.freeze(this);
  }

  /**
   * Add the site's header overrides to a response.
   */
  applyHeaders(res: Response): void {
    for (const [name, values] of this.headers) {
      for (const value of values) {
        res.append(name, value);
      }
    }
  }
}

// Snapshots keep their own copy of the header map.
function freezeHeaders(headers: HeaderMap): HeaderMap {
  const copy = new Map<string, readonly string[]>();
  for (const [name, values] of headers) {
    copy.set(name, Object.freeze([...values]));
  }
  return copy;
}

/**
 * Snapshot captured for a request, stored on `res.locals`.
 */
export function snapshotOf(res: Response): ServingSnapshot {
  const snapshot: unknown = res.locals['snapshot'];
  if (!(snapshot instanceof ServingSnapshot)) {
    throw new Error('no serving snapshot captured for this request');
  }
  return snapshot;
}

export function captureSnapshot(res: Response, snapshot: ServingSnapshot): void {
  res.locals['snapshot'] = snapshot;
}
