/**
 * Type exports for mail-recompose
 */

// Configuration types
export type { Newline, BuilderOptions, DecomposerOptions } from './config.js';

// Reader and scanner result types
export type {
  LineResult,
  MimeHeaderResult,
  MultipartPart,
  MediaType,
  DecodeResult
} from './message.js';

// Error types
export {
  MimeError,
  MalformedHeaderError,
  TransferDecodeError,
  StreamError,
  MediaTypeError,
  MimeDepthError,
  MimeConfigError,
  UnrecoverableRandomnessError
} from './errors.js';

export type { ErrorSource } from './errors.js';
