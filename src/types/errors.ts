/**
 * Error types for mail-recompose
 */

/**
 * Error source categories
 */
export type ErrorSource = 'header' | 'encoding' | 'stream' | 'media-type' | 'limit' | 'config' | 'environment';

/**
 * Base MIME error class
 */
export class MimeError extends Error {
  /** Error code */
  code: string;
  /** Error source category */
  source: ErrorSource;

  constructor(message: string, code: string, source: ErrorSource) {
    super(message);
    this.name = 'MimeError';
    this.code = code;
    this.source = source;
    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Malformed header block (continuation on the first line, line without a colon)
 */
export class MalformedHeaderError extends MimeError {
  override source: 'header' = 'header';
  /** Offending line, truncated to 50 + "..." + 50 bytes when longer than 100 */
  preview: string;

  constructor(message: string, preview: string) {
    super(`${message}: ${preview}`, 'MALFORMED_HEADER', 'header');
    this.name = 'MalformedHeaderError';
    this.preview = preview;
  }
}

/**
 * Invalid base64 or quoted-printable payload
 */
export class TransferDecodeError extends MimeError {
  override source: 'encoding' = 'encoding';
  /** Content-Transfer-Encoding that failed */
  encoding: string;

  constructor(message: string, encoding: string) {
    super(message, 'TRANSFER_DECODE_ERROR', 'encoding');
    this.name = 'TransferDecodeError';
    this.encoding = encoding;
  }
}

/**
 * Failure of the underlying byte source (truncated input, missing delimiters).
 * End of stream itself is never an error.
 */
export class StreamError extends MimeError {
  override source: 'stream' = 'stream';

  constructor(message: string, cause?: Error) {
    super(message, 'STREAM_ERROR', 'stream');
    this.name = 'StreamError';
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Content-Type value that cannot be parsed as a media type
 */
export class MediaTypeError extends MimeError {
  override source: 'media-type' = 'media-type';
  /** The rejected header value */
  value: string;

  constructor(message: string, value: string) {
    super(message, 'MEDIA_TYPE_ERROR', 'media-type');
    this.name = 'MediaTypeError';
    this.value = value;
  }
}

/**
 * Multipart nesting deeper than the configured budget
 */
export class MimeDepthError extends MimeError {
  override source: 'limit' = 'limit';
  /** The exceeded depth limit */
  limit: number;

  constructor(message: string, limit: number) {
    super(message, 'DEPTH_LIMIT', 'limit');
    this.name = 'MimeDepthError';
    this.limit = limit;
  }
}

/**
 * Invalid builder or decomposer option
 */
export class MimeConfigError extends MimeError {
  override source: 'config' = 'config';
  /** Name of the rejected option */
  option: string;

  constructor(message: string, option: string) {
    super(message, 'CONFIG_ERROR', 'config');
    this.name = 'MimeConfigError';
    this.option = option;
  }
}

/**
 * The runtime could not provide random bytes. Not recoverable.
 */
export class UnrecoverableRandomnessError extends MimeError {
  override source: 'environment' = 'environment';

  constructor(cause: Error) {
    super(`random source unavailable: ${cause.message}`, 'RANDOMNESS_UNAVAILABLE', 'environment');
    this.name = 'UnrecoverableRandomnessError';
    this.cause = cause;
  }
}
