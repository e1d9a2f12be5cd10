/**
 * SnowWeb Site Package
 *
 * Builds the site, publishes each build atomically and serves the
 * published snapshot together with the /.snowweb/ API.
 */

export {
  NixBuilder,
  NIX_GLOBAL_ARGS,
  parseBuildOutput,
  parsePathInfoOutput,
  type ContentBuilder,
  type NixBuilderOptions,
} from './builder.js';
export { ServingSnapshot, snapshotOf, captureSnapshot, type ServingSnapshotInit } from './snapshot.js';
export {
  SiteCoordinator,
  SITE_HEADERS_FILE,
  readSiteHeaders,
  type SiteCoordinatorOptions,
  type PublishListener,
} from './coordinator.js';
export {
  SiteHandler,
  authenticatedClient,
  API_PREFIX,
  isReservedPath,
  STATUS_PATH,
  RELOAD_PATH,
  type SiteHandlerOptions,
} from './handler.js';
