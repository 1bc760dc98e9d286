/**
 * Configuration types for mail-recompose
 */

/**
 * Line terminators accepted when emitting reconstructed header lines
 * and multipart delimiter lines
 */
export type Newline = '\r\n' | '\n';

/**
 * MessageBuilder options
 */
export interface BuilderOptions {
  /** Line terminator for generated lines (default: "\r\n") */
  newline?: Newline;
}

/**
 * MessageDecomposer options
 */
export interface DecomposerOptions {
  /** Maximum multipart nesting depth (default: 100) */
  maxPartDepth?: number;
}
