/**
 * Protocol layer exports for mail-recompose
 */

export { LineReader } from './reader.js';

export { DotReader, type DotState } from './dot-reader.js';

export { canonicalMimeHeaderKey, isTokenByte, isAsciiLetter } from './canonical-key.js';
