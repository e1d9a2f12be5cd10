/**
 * Site Lifecycle Coordinator
 *
 * Builds the site and publishes each build as the active serving
 * snapshot. Builds run one at a time; publishing is a single reference
 * assignment, so a request sees either the previous snapshot or the new
 * one, never a mix of a root and another build's headers.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ContentServer, type ErrorHandler } from '@snowweb/content';
import {
  BuildError,
  HeaderSyntaxError,
  SerialExecutor,
  createSilentLogger,
  generateId,
  hasErrorCode,
  parseHeaderBlock,
  type ContentRoot,
  type HeaderMap,
  type Logger,
} from '@snowweb/core';
import type { ContentBuilder } from './builder.js';
import { ServingSnapshot } from './snapshot.js';

/** Header override file, relative to the content root */
export const SITE_HEADERS_FILE = path.join('.snowweb', 'headers');

export interface SiteCoordinatorOptions {
  /** Installable built by default */
  installable: string;
  /** Turns installables into content roots */
  builder: ContentBuilder;
  /** Failure responses of the content servers */
  errorHandler?: ErrorHandler;
  /** Logger */
  logger?: Logger;
}

export type PublishListener = (snapshot: ServingSnapshot) => void;

export class SiteCoordinator {
  readonly installable: string;
  private readonly builder: ContentBuilder;
  private readonly errorHandler?: ErrorHandler;
  private readonly logger: Logger;
  private readonly executor = new SerialExecutor();
  private readonly listeners = new Set<PublishListener>();
  private current?: ServingSnapshot;
  private generation = 0;

  constructor(options: SiteCoordinatorOptions) {
    this.installable = options.installable;
    this.builder = options.builder;
    this.errorHandler = options.errorHandler;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Build an installable and start serving it. Rejects with a BuildError
   * and keeps the current snapshot when any step fails.
   */
  rebuild(installable: string = this.installable): Promise<ServingSnapshot> {
    if (this.executor.pending > 0) {
      this.logger.debug('rebuild queued behind running build', { installable, pending: this.executor.pending });
    }
    return this.executor.run(() => this.buildAndPublish(installable));
  }

  /**
   * Snapshot serving new requests.
   */
  snapshot(): ServingSnapshot {
    if (!this.current) {
      throw new BuildError('SITE_NOT_READY', `${this.installable} has not been built yet`, {
        context: { installable: this.installable },
      });
    }
    return this.current;
  }

  get ready(): boolean {
    return this.current !== undefined;
  }

  onPublish(listener: PublishListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolves once every rebuild requested so far has finished.
   */
  idle(): Promise<void> {
    return this.executor.idle();
  }

  private async buildAndPublish(installable: string): Promise<ServingSnapshot> {
    const startedAt = Date.now();
    const buildId = generateId();
    this.logger.info('building', { installable, build_id: buildId });

    let snapshot: ServingSnapshot;
    try {
      const root = await this.builder.build(installable);
      await assertDirectory(installable, root);
      const headers = await readSiteHeaders(root);
      const server = new ContentServer({
        root,
        errorHandler: this.errorHandler,
        logger: this.logger.child('content'),
      });
      snapshot = new ServingSnapshot({ server, headers, generation: this.generation + 1 });
    } catch (error) {
      const failure =
        error instanceof BuildError
          ? error
          : new BuildError('BUILD_FAILED', `building ${installable}`, { context: { installable }, cause: error });
      this.logger.error('could not build path to serve', {
        installable,
        build_id: buildId,
        serving: this.current?.root.path,
        error: failure,
      });
      throw failure;
    }

    this.generation = snapshot.generation;
    this.current = snapshot;
    this.logger.info('now serving', {
      installable,
      build_id: buildId,
      path: snapshot.root.path,
      generation: snapshot.generation,
      duration_ms: Date.now() - startedAt,
    });
    for (const listener of this.listeners) {
      listener(snapshot);
    }
    return snapshot;
  }
}

async function assertDirectory(installable: string, root: ContentRoot): Promise<void> {
  let isDirectory = false;
  try {
    isDirectory = (await fs.promises.stat(root.path)).isDirectory();
  } catch (error) {
    throw new BuildError('BUILD_OUTPUT_INVALID', `building ${installable}: cannot read ${root.path}`, {
      context: { installable, path: root.path },
      cause: error,
    });
  }
  if (!isDirectory) {
    throw new BuildError('BUILD_OUTPUT_INVALID', `building ${installable}: ${root.path} is not a directory`, {
      context: { installable, path: root.path },
    });
  }
}

/**
 * Header overrides shipped in a root. A root without the file has none.
 */
export async function readSiteHeaders(root: ContentRoot): Promise<HeaderMap> {
  const headersPath = path.join(root.path, SITE_HEADERS_FILE);

  let text: string;
  try {
    text = await fs.promises.readFile(headersPath, 'utf8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return new Map();
    }
    throw new BuildError('SITE_HEADERS_INVALID', `reading site-specific headers from ${headersPath}`, {
      context: { path: headersPath },
      cause: error,
    });
  }

  try {
    return parseHeaderBlock(text);
  } catch (error) {
    if (!(error instanceof HeaderSyntaxError)) throw error;
    throw new BuildError('SITE_HEADERS_INVALID', `reading site-specific headers from ${headersPath}`, {
      context: { path: headersPath, line: String(error.line) },
      cause: error,
    });
  }
}
