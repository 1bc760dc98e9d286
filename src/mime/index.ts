/**
 * MIME Module
 *
 * Provides the message tree and its round-trip:
 * - Decomposition of raw messages into Message trees
 * - Rebuilding trees into bytes with untouched headers kept verbatim
 * - Surgical header field rewrites
 * - Multipart splitting and media type parsing
 *
 * @packageDocumentation
 */

// Message tree
export { Message, scanRawHeader, trimTrailingNewlines } from './message.js';
export type { MessageInit } from './message.js';
export { MimeHeader } from './mime-header.js';

// Decomposition
export { MessageDecomposer, MAX_RFC822_DEPTH } from './decomposer.js';
export type { Rfc822FallbackEvent } from './decomposer.js';

// Building
export { MessageBuilder } from './builder.js';

// Multipart and media type parsing
export { MultipartReader } from './multipart-reader.js';
export { parseMediaType, extractBoundary } from './media-type.js';

// Diagnostics
export { describeMessageStructure } from './debug.js';
