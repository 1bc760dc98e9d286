/**
 * Content-Transfer-Encoding dispatch
 *
 * Only base64 and quoted-printable transform data; every other value
 * (7bit, 8bit, binary, unknown, empty) passes bytes through.
 */

import { randomBytes } from 'crypto';
import { base64Decode, base64Encode } from './base64.js';
import { quotedPrintableDecode, quotedPrintableEncode } from './quoted-printable.js';
import { UnrecoverableRandomnessError } from '../types/errors.js';
import type { DecodeResult } from '../types/message.js';

function normalizeEncoding(encoding: string): string {
  return encoding.trim().toLowerCase();
}

/**
 * Encodes a body for the given Content-Transfer-Encoding
 *
 * @param body - Raw body bytes
 * @param encoding - Content-Transfer-Encoding value
 * @param lineSeparator - Separator for wrapped base64 lines and quoted-printable soft breaks
 */
export function encodeByContentEncoding(body: Buffer, encoding: string, lineSeparator: string = '\n'): Buffer {
  switch (normalizeEncoding(encoding)) {
    case 'base64':
      return Buffer.from(base64Encode(body, lineSeparator), 'latin1');
    case 'quoted-printable':
      return Buffer.from(quotedPrintableEncode(body, lineSeparator), 'latin1');
    default:
      return body;
  }
}

/**
 * Decodes a body for the given Content-Transfer-Encoding
 *
 * @param body - Encoded body bytes
 * @param encoding - Content-Transfer-Encoding value
 * @returns Decoded bytes and whether a decoder was applied
 * @throws TransferDecodeError on invalid base64 or quoted-printable input
 */
export function decodeByContentEncoding(body: Buffer, encoding: string): DecodeResult {
  switch (normalizeEncoding(encoding)) {
    case 'base64':
      return { data: base64Decode(body.toString('latin1')), transformed: true };
    case 'quoted-printable':
      return { data: quotedPrintableDecode(body), transformed: true };
    default:
      return { data: body, transformed: false };
  }
}

/**
 * Generates a multipart boundary: 30 random bytes as lowercase hex
 *
 * @throws UnrecoverableRandomnessError when the random source fails
 */
export function randomBoundary(): string {
  let bytes: Buffer;
  try {
    bytes = randomBytes(30);
  } catch (err) {
    throw new UnrecoverableRandomnessError(err instanceof Error ? err : new Error(String(err)));
  }
  return bytes.toString('hex');
}
