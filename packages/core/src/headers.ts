/**
 * Header block parsing
 *
 * Reads MIME-style header blocks (`Name: value` lines) such as the per-site
 * header override file shipped inside a content root.
 */

import type { HeaderMap } from './types.js';

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

// Characters an HTTP/1.1 field value may not carry: controls other than
// tab, DEL, and anything outside Latin-1.
const INVALID_VALUE_CHAR = /[^\t\x20-\x7e\x80-\xff]/;

export class HeaderSyntaxError extends Error {
  readonly line: number;

  constructor(line: number, message: string) {
    super(`line ${line}: ${message}`);
    this.name = 'HeaderSyntaxError';
    this.line = line;
  }
}

/**
 * Canonical form of a header name: `content-security-policy` becomes
 * `Content-Security-Policy`.
 */
export function canonicalHeaderName(name: string): string {
  return name
    .toLowerCase()
    .split('-')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('-');
}

/**
 * Parse a header block.
 *
 * Reading stops at the first empty line or at the end of the text. Lines
 * starting with a space or tab continue the previous header's value.
 * Repeated names keep every value, in order. The returned value arrays are
 * frozen.
 *
 * @throws HeaderSyntaxError on a line without a colon, an invalid name,
 *   a value that cannot be sent, or a continuation line with nothing to
 *   continue
 */
export function parseHeaderBlock(text: string): HeaderMap {
  const headers = new Map<string, string[]>();
  const lines = text.split(/\r?\n/);
  let last: { name: string; index: number } | undefined;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    const lineNumber = i + 1;
    if (line === '') break;

    if (line.startsWith(' ') || line.startsWith('\t')) {
      if (!last) {
        throw new HeaderSyntaxError(lineNumber, 'continuation line before any header');
      }
      checkValue(lineNumber, last.name, line);
      const values = headers.get(last.name) ?? [];
      const continued = `${values[last.index]} ${line.trim()}`.trim();
      values[last.index] = continued;
      continue;
    }

    const colon = line.indexOf(':');
    if (colon === -1) {
      throw new HeaderSyntaxError(lineNumber, `malformed header line ${JSON.stringify(line)}`);
    }

    const rawName = line.slice(0, colon);
    if (!TOKEN.test(rawName)) {
      throw new HeaderSyntaxError(lineNumber, `invalid header name ${JSON.stringify(rawName)}`);
    }

    const name = canonicalHeaderName(rawName);
    const value = line.slice(colon + 1).trim();
    checkValue(lineNumber, name, value);
    const values = headers.get(name) ?? [];
    values.push(value);
    headers.set(name, values);
    last = { name, index: values.length - 1 };
  }

  const frozen = new Map<string, readonly string[]>();
  for (const [name, values] of headers) {
    frozen.set(name, Object.freeze(values));
  }
  return frozen;
}

function checkValue(lineNumber: number, name: string, value: string): void {
  const invalid = INVALID_VALUE_CHAR.exec(value);
  if (invalid) {
    const code = invalid[0].codePointAt(0) ?? 0;
    throw new HeaderSyntaxError(
      lineNumber,
      `invalid character U+${code.toString(16).toUpperCase().padStart(4, '0')} in value of ${name}`
    );
  }
}
