/**
 * Content encoding/decoding utilities
 *
 * Implements base64 and quoted-printable encoding/decoding using only
 * Node.js built-in modules.
 *
 * @packageDocumentation
 */

export { base64Encode, base64Decode, base64DecodeToString } from './base64.js';
export { quotedPrintableEncode, quotedPrintableDecode, quotedPrintableDecodeToString } from './quoted-printable.js';
export { breakLines } from './line-break.js';
export { encodeByContentEncoding, decodeByContentEncoding, randomBoundary } from './content-encoding.js';
