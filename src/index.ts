/**
 * mail-recompose - Round-trip MIME message decomposition and rebuilding
 *
 * Splits a raw RFC 5322 / MIME message into a tree of header/body nodes
 * and rebuilds it byte-identical wherever nothing was edited.
 *
 * @packageDocumentation
 */

// Export all types
export * from './types/index.js';

// Export encoding utilities
export * from './encoding/index.js';

// Export protocol reader
export * from './protocol/index.js';

// Export message tree, decomposer and builder
export * from './mime/index.js';
