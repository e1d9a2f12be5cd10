/**
 * PEM certificate bundles
 */

import { X509Certificate } from 'crypto';
import * as fs from 'fs';
import { TlsError } from '@snowweb/core';

const PEM_CERTIFICATE = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

/**
 * Read a sequence of PEM certificates from a file.
 *
 * Blocks that do not parse are skipped; the bundle is rejected only when
 * no certificate at all can be parsed.
 */
export async function loadCertificateBundle(bundlePath: string): Promise<string[]> {
  let text: string;
  try {
    text = await fs.promises.readFile(bundlePath, 'utf8');
  } catch (error) {
    throw new TlsError('TLS_READ_FAILED', `loading certificates from ${bundlePath}`, {
      context: { path: bundlePath },
      cause: error,
    });
  }

  const certificates = (text.match(PEM_CERTIFICATE) ?? []).filter(isParsable);
  if (certificates.length === 0) {
    throw new TlsError('TLS_INVALID', `parsing certificates from ${bundlePath}: no certificates could be parsed`, {
      context: { path: bundlePath },
    });
  }
  return certificates;
}

function isParsable(pem: string): boolean {
  try {
    new X509Certificate(pem);
    return true;
  } catch {
    return false;
  }
}
