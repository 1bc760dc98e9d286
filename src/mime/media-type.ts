/**
 * Media type parsing (RFC 2045 Content-Type / RFC 2183 Content-Disposition)
 *
 * @packageDocumentation
 */

import { isTokenByte } from '../protocol/canonical-key.js';
import { MediaTypeError } from '../types/errors.js';
import type { MediaType } from '../types/message.js';
import type { MimeHeader } from './mime-header.js';

function isToken(s: string): boolean {
  if (s.length === 0) return false;
  for (let i = 0; i < s.length; i++) {
    if (!isTokenByte(s.charCodeAt(i))) return false;
  }
  return true;
}

function skipSpace(s: string, pos: number): number {
  while (pos < s.length && /\s/.test(s[pos])) {
    pos++;
  }
  return pos;
}

/**
 * Parses a media type value and its parameters
 *
 * Parameter names are lower-cased and quoted values unquoted. Unquoted
 * values are read up to the next whitespace or semicolon, which admits the
 * "----=_Part_0" style boundaries mail clients emit without quotes.
 *
 * @param value - Content-Type (or Content-Disposition) header value
 * @returns Lower-cased media type and its parameters
 * @throws MediaTypeError for an empty or malformed value
 */
export function parseMediaType(value: string): MediaType {
  const semi = value.indexOf(';');
  const base = (semi === -1 ? value : value.substring(0, semi)).trim().toLowerCase();

  if (base === '') {
    throw new MediaTypeError('mime: no media type', value);
  }
  const slash = base.indexOf('/');
  const typePart = slash === -1 ? base : base.substring(0, slash);
  const subtypePart = slash === -1 ? null : base.substring(slash + 1);
  if (!isToken(typePart) || (subtypePart !== null && !isToken(subtypePart))) {
    throw new MediaTypeError(`mime: expected token in media type "${base}"`, value);
  }

  const params: Record<string, string> = {};
  if (semi === -1) {
    return { mediaType: base, params };
  }

  let pos = semi;
  while (pos < value.length) {
    pos = skipSpace(value, pos);
    if (pos >= value.length) break;
    if (value[pos] !== ';') {
      throw new MediaTypeError('mime: invalid media parameter', value);
    }
    pos = skipSpace(value, pos + 1);
    // Trailing semicolons are ignored
    if (pos >= value.length) break;
    if (value[pos] === ';') continue;

    const nameStart = pos;
    while (pos < value.length && isTokenByte(value.charCodeAt(pos))) {
      pos++;
    }
    const name = value.substring(nameStart, pos).toLowerCase();
    pos = skipSpace(value, pos);
    if (name === '' || value[pos] !== '=') {
      throw new MediaTypeError('mime: invalid media parameter', value);
    }
    pos = skipSpace(value, pos + 1);

    let paramValue = '';
    if (value[pos] === '"') {
      pos++;
      let closed = false;
      while (pos < value.length) {
        const ch = value[pos];
        if (ch === '\\' && pos + 1 < value.length) {
          paramValue += value[pos + 1];
          pos += 2;
          continue;
        }
        if (ch === '"') {
          closed = true;
          pos++;
          break;
        }
        paramValue += ch;
        pos++;
      }
      if (!closed) {
        throw new MediaTypeError('mime: unterminated quoted parameter value', value);
      }
    } else {
      const valueStart = pos;
      while (pos < value.length && value[pos] !== ';' && !/\s/.test(value[pos]) && value[pos] !== '"') {
        pos++;
      }
      paramValue = value.substring(valueStart, pos);
      if (paramValue === '') {
        throw new MediaTypeError('mime: invalid media parameter', value);
      }
    }

    if (Object.prototype.hasOwnProperty.call(params, name)) {
      throw new MediaTypeError(`mime: duplicate parameter name "${name}"`, value);
    }
    params[name] = paramValue;
  }

  return { mediaType: base, params };
}

/**
 * Extracts the multipart boundary from a header's Content-Type
 *
 * @param header - Message or part header
 * @returns The boundary parameter, or '' when there is none
 * @throws MediaTypeError when Content-Type is present but malformed
 */
export function extractBoundary(header: MimeHeader): string {
  const contentType = header.get('Content-Type');
  if (contentType === '') {
    return '';
  }
  const { params } = parseMediaType(contentType);
  return params['boundary'] ?? '';
}
