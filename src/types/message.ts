/**
 * Shared result types for the protocol reader and multipart scanner
 */

import type { MimeHeader } from '../mime/mime-header.js';

/**
 * A single line read by the LineReader
 */
export interface LineResult {
  /** Line content without its terminator */
  line: Buffer;
  /** Bytes consumed, excluding the final "\n" (a CR of a CRLF terminator is kept) */
  raw: Buffer;
}

/**
 * A parsed MIME header block
 */
export interface MimeHeaderResult {
  /** Canonical field name -> values, in encounter order */
  header: MimeHeader;
  /** Every raw line read, including the terminating blank line, joined by "\n" */
  raw: Buffer;
  /** False when input ended before the blank line closing the block */
  terminated: boolean;
}

/**
 * One part produced by the multipart scanner
 */
export interface MultipartPart {
  header: MimeHeader;
  rawOriginalHeader: Buffer;
  body: Buffer;
}

/**
 * Parsed Content-Type value
 */
export interface MediaType {
  /** Lower-cased type/subtype */
  mediaType: string;
  /** Lower-cased parameter names -> unquoted values */
  params: Record<string, string>;
}

/**
 * Result of a transfer decode
 */
export interface DecodeResult {
  data: Buffer;
  /** True when base64 or quoted-printable was actually applied */
  transformed: boolean;
}
