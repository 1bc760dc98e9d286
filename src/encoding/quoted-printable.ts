/**
 * Quoted-Printable encoding/decoding
 *
 * Implements RFC 2045 quoted-printable over raw bytes. Line breaks in the
 * input are kept as hard breaks, so encode/decode round-trips any byte
 * sequence.
 */

import { TransferDecodeError } from '../types/errors.js';

const MAX_LINE_LENGTH = 76;

const CR = 0x0d;
const LF = 0x0a;
const SPACE = 0x20;
const TAB = 0x09;
const EQUALS = 0x3d;

/**
 * Encodes a string or Buffer to quoted-printable format
 *
 * @param data - The data to encode (string or Buffer)
 * @param lineSeparator - Separator used after soft line breaks
 * @returns Quoted-printable encoded string
 */
export function quotedPrintableEncode(data: string | Buffer, lineSeparator: string = '\r\n'): string {
  const buffer = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
  let result = '';
  let lineLength = 0;

  for (let i = 0; i < buffer.length; i++) {
    const byte = buffer[i];

    // Hard line breaks pass through
    if (byte === CR && buffer[i + 1] === LF) {
      result += '\r\n';
      lineLength = 0;
      i++;
      continue;
    }
    if (byte === LF) {
      result += '\n';
      lineLength = 0;
      continue;
    }

    let encoded: string;
    if (byte >= 33 && byte <= 126 && byte !== EQUALS) {
      encoded = String.fromCharCode(byte);
    } else if ((byte === SPACE || byte === TAB) && !isLineEndAhead(buffer, i + 1)) {
      // Whitespace is literal except at the end of a line
      encoded = String.fromCharCode(byte);
    } else {
      encoded = '=' + byte.toString(16).toUpperCase().padStart(2, '0');
    }

    // Soft line break
    if (lineLength + encoded.length > MAX_LINE_LENGTH - 1) {
      result += '=' + lineSeparator;
      lineLength = 0;
    }

    result += encoded;
    lineLength += encoded.length;
  }

  return result;
}

function isLineEndAhead(buffer: Buffer, pos: number): boolean {
  if (pos >= buffer.length) return true;
  if (buffer[pos] === LF) return true;
  return buffer[pos] === CR && buffer[pos + 1] === LF;
}

/**
 * Decodes quoted-printable data to a Buffer
 *
 * Trailing whitespace on each line is transport padding and is dropped.
 *
 * @param encoded - The quoted-printable data
 * @returns Decoded Buffer
 * @throws TransferDecodeError on an invalid escape or an unescaped control byte
 */
export function quotedPrintableDecode(encoded: string | Buffer): Buffer {
  const input = typeof encoded === 'string' ? Buffer.from(encoded, 'latin1') : encoded;
  const bytes: number[] = [];
  let lineStart = 0;

  while (lineStart < input.length) {
    let lineEnd = input.indexOf(LF, lineStart);
    let next: number;
    let terminator: number[];
    if (lineEnd === -1) {
      lineEnd = input.length;
      next = input.length;
      terminator = [];
    } else if (lineEnd > lineStart && input[lineEnd - 1] === CR) {
      next = lineEnd + 1;
      lineEnd--;
      terminator = [CR, LF];
    } else {
      next = lineEnd + 1;
      terminator = [LF];
    }

    // Strip transport padding
    let end = lineEnd;
    while (end > lineStart && (input[end - 1] === SPACE || input[end - 1] === TAB)) {
      end--;
    }

    const softBreak = end > lineStart && input[end - 1] === EQUALS;
    if (softBreak) end--;

    decodeLine(input, lineStart, end, bytes);
    if (!softBreak) {
      bytes.push(...terminator);
    }

    lineStart = next;
  }

  return Buffer.from(bytes);
}

function decodeLine(input: Buffer, start: number, end: number, out: number[]): void {
  let i = start;
  while (i < end) {
    const byte = input[i];

    if (byte === EQUALS) {
      const hi = i + 1 < end ? hexValue(input[i + 1]) : -1;
      const lo = i + 2 < end ? hexValue(input[i + 2]) : -1;
      if (hi < 0 || lo < 0) {
        throw new TransferDecodeError(
          `quotedprintable: invalid escape sequence at offset ${i}`,
          'quoted-printable'
        );
      }
      out.push(hi * 16 + lo);
      i += 3;
      continue;
    }

    if ((byte < SPACE && byte !== TAB) || byte === 0x7f) {
      throw new TransferDecodeError(
        `quotedprintable: invalid unescaped byte 0x${byte.toString(16).padStart(2, '0')} in body`,
        'quoted-printable'
      );
    }

    out.push(byte);
    i++;
  }
}

function hexValue(byte: number): number {
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30;
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x41 + 10;
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x61 + 10;
  return -1;
}

/**
 * Decodes a quoted-printable string to a UTF-8 string
 *
 * @param encoded - The quoted-printable encoded string
 * @returns Decoded UTF-8 string
 */
export function quotedPrintableDecodeToString(encoded: string): string {
  return quotedPrintableDecode(encoded).toString('utf-8');
}
