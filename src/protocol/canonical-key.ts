/**
 * MIME header key canonicalization
 *
 * "content-type" becomes "Content-Type": the first letter and every
 * letter after a hyphen are upper-cased, the rest lower-cased. Keys that
 * contain a byte outside the RFC 7230 token set (spaces included) are
 * left alone.
 *
 * @packageDocumentation
 */

/**
 * RFC 7230 tchar: "!" / "#" / "$" / "%" / "&" / "'" / "*" / "+" / "-" / "." /
 * "^" / "_" / "`" / "|" / "~" / DIGIT / ALPHA
 */
const TOKEN_SPECIALS = new Set([...'!#$%&\'*+-.^_`|~'].map((c) => c.charCodeAt(0)));

/**
 * Reports whether a byte may appear in a header field name
 */
export function isTokenByte(byte: number): boolean {
  if (byte >= 0x30 && byte <= 0x39) return true;
  if (isAsciiLetter(byte)) return true;
  return TOKEN_SPECIALS.has(byte);
}

/**
 * Reports whether a byte is an ASCII letter
 */
export function isAsciiLetter(byte: number): boolean {
  const lower = byte | 0x20;
  return lower >= 0x61 && lower <= 0x7a;
}

/**
 * Returns the canonical form of a header key
 *
 * @param key - Header field name
 * @returns Canonical key, or the key unchanged when it holds non-token bytes
 */
export function canonicalMimeHeaderKey(key: string): string {
  // Quick check: already canonical
  let upper = true;
  for (let i = 0; i < key.length; i++) {
    const c = key.charCodeAt(i);
    if (!isTokenByte(c)) {
      return key;
    }
    if (upper && c >= 0x61 && c <= 0x7a) {
      return canonicalize(key);
    }
    if (!upper && c >= 0x41 && c <= 0x5a) {
      return canonicalize(key);
    }
    upper = c === 0x2d;
  }
  return key;
}

function canonicalize(key: string): string {
  for (let i = 0; i < key.length; i++) {
    if (!isTokenByte(key.charCodeAt(i))) {
      return key;
    }
  }

  let result = '';
  let upper = true;
  for (let i = 0; i < key.length; i++) {
    let c = key.charCodeAt(i);
    if (upper && c >= 0x61 && c <= 0x7a) {
      c -= 0x20;
    } else if (!upper && c >= 0x41 && c <= 0x5a) {
      c += 0x20;
    }
    result += String.fromCharCode(c);
    upper = c === 0x2d;
  }
  return result;
}
