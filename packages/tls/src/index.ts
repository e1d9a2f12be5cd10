/**
 * SnowWeb TLS Package
 *
 * Certificate sources and the manager that swaps TLS material under a
 * running server.
 */

export {
  TlsMaterialManager,
  type ActiveTlsMaterial,
  type TlsMaterialManagerOptions,
  type MaterialListener,
} from './manager.js';
export {
  FileMaterialSource,
  AuthorityMaterialSource,
  type MaterialSource,
  type CertificateAuthority,
} from './sources.js';
export {
  AcmeAuthority,
  LETS_ENCRYPT_PRODUCTION,
  RENEWAL_WINDOW_MS,
  type AcmeAuthorityOptions,
  type StoredCertificatePaths,
} from './acme.js';
export { AlpnChallengeStore, ACME_TLS_ALPN_PROTOCOL } from './challenges.js';
export { loadCertificateBundle } from './bundle.js';
