/**
 * Request path normalization
 */

export const INDEX_FILE = 'index.html';

/**
 * Whether a slash-separated relative path stays inside the root:
 * no empty, `.` or `..` segment, no backslash and no NUL byte.
 */
export function isValidPath(relativePath: string): boolean {
  if (relativePath.includes('\0') || relativePath.includes('\\')) {
    return false;
  }
  return relativePath.split('/').every((segment) => segment !== '' && segment !== '.' && segment !== '..');
}

/**
 * Map a raw URL path to a file path relative to the content root.
 *
 * `` and `/` become `index.html`, `/docs/` becomes `docs/index.html`.
 * Returns undefined when the path cannot be decoded or would leave the
 * root; nothing here touches the filesystem.
 */
export function normalizeRequestPath(rawPath: string): string | undefined {
  let decoded: string;
  try {
    decoded = decodeURIComponent(rawPath);
  } catch {
    return undefined;
  }

  let relativePath = decoded.replace(/^\/+/, '');
  if (relativePath === '') {
    relativePath = INDEX_FILE;
  } else if (relativePath.endsWith('/')) {
    relativePath += INDEX_FILE;
  }

  return isValidPath(relativePath) ? relativePath : undefined;
}
