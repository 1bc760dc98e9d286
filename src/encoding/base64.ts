/**
 * Base64 encoding/decoding using Node.js Buffer
 *
 * Provides the base64 Content-Transfer-Encoding used when unwrapping
 * and re-encoding message/rfc822 bodies.
 */

import { TransferDecodeError } from '../types/errors.js';
import { breakLines } from './line-break.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Encodes a string or Buffer to base64
 *
 * @param data - The data to encode (string or Buffer)
 * @param lineSeparator - When given, output is hard-wrapped at 76 characters with it
 * @returns Base64 encoded string
 */
export function base64Encode(data: string | Buffer, lineSeparator?: string): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
  const encoded = buffer.toString('base64');
  return lineSeparator === undefined ? encoded : breakLines(encoded, 76, lineSeparator);
}

/**
 * Decodes a base64 string to a Buffer
 *
 * Surrounding whitespace is trimmed and line breaks are ignored; anything
 * else outside the standard alphabet, or missing padding, is rejected.
 *
 * @param encoded - The base64 encoded string
 * @returns Decoded Buffer
 * @throws TransferDecodeError on invalid input
 */
export function base64Decode(encoded: string): Buffer {
  const cleaned = encoded.replace(/^[ \t\r\n]+|[ \t\r\n]+$/g, '').replace(/[\r\n]/g, '');

  if (cleaned.length % 4 !== 0 || !BASE64_PATTERN.test(cleaned)) {
    throw new TransferDecodeError('illegal base64 data', 'base64');
  }

  return Buffer.from(cleaned, 'base64');
}

/**
 * Decodes a base64 string to a UTF-8 string
 *
 * @param encoded - The base64 encoded string
 * @returns Decoded UTF-8 string
 */
export function base64DecodeToString(encoded: string): string {
  return base64Decode(encoded).toString('utf-8');
}
