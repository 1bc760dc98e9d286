/**
 * Property-based tests for error classes
 *
 * Feature: mail-recompose, Property 3: Error Context Preservation
 * Validates: typed errors carry their code, source and context
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  MimeError,
  MalformedHeaderError,
  TransferDecodeError,
  StreamError,
  MediaTypeError,
  MimeDepthError,
  MimeConfigError,
  UnrecoverableRandomnessError
} from '../../src/types/errors.js';

describe('Property 3: Error Context Preservation', () => {
  it('MalformedHeaderError appends the preview to the message', () => {
    fc.assert(
      fc.property(
        fc.string({ minLength: 1 }),
        fc.string(),
        (message, preview) => {
          const error = new MalformedHeaderError(message, preview);

          expect(error).toBeInstanceOf(Error);
          expect(error).toBeInstanceOf(MimeError);
          expect(error.message).toBe(`${message}: ${preview}`);
          expect(error.preview).toBe(preview);
          expect(error.code).toBe('MALFORMED_HEADER');
          expect(error.source).toBe('header');
          expect(error.name).toBe('MalformedHeaderError');
        }
      ),
      { numRuns: 100 }
    );
  });

  it('TransferDecodeError preserves the encoding', () => {
    fc.assert(
      fc.property(
        fc.string({ minLength: 1 }),
        fc.constantFrom('base64', 'quoted-printable'),
        (message, encoding) => {
          const error = new TransferDecodeError(message, encoding);

          expect(error).toBeInstanceOf(MimeError);
          expect(error.message).toBe(message);
          expect(error.encoding).toBe(encoding);
          expect(error.code).toBe('TRANSFER_DECODE_ERROR');
          expect(error.source).toBe('encoding');
          expect(error.name).toBe('TransferDecodeError');
        }
      ),
      { numRuns: 100 }
    );
  });

  it('StreamError preserves cause when provided', () => {
    fc.assert(
      fc.property(
        fc.string({ minLength: 1 }),
        fc.option(fc.string({ minLength: 1 }), { nil: undefined }),
        (message, causeMessage) => {
          const cause = causeMessage === undefined ? undefined : new Error(causeMessage);
          const error = new StreamError(message, cause);

          expect(error.message).toBe(message);
          expect(error.cause).toBe(cause);
          expect(error.code).toBe('STREAM_ERROR');
          expect(error.source).toBe('stream');
        }
      ),
      { numRuns: 100 }
    );
  });

  it('MediaTypeError preserves the rejected value', () => {
    fc.assert(
      fc.property(fc.string(), (value) => {
        const error = new MediaTypeError('mime: invalid media parameter', value);

        expect(error.value).toBe(value);
        expect(error.code).toBe('MEDIA_TYPE_ERROR');
        expect(error.source).toBe('media-type');
        expect(error.name).toBe('MediaTypeError');
      }),
      { numRuns: 100 }
    );
  });

  it('MimeDepthError and MimeConfigError preserve their context', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 10000 }),
        fc.string({ minLength: 1 }),
        (limit, option) => {
          const depth = new MimeDepthError('too deep', limit);
          expect(depth.limit).toBe(limit);
          expect(depth.code).toBe('DEPTH_LIMIT');
          expect(depth.source).toBe('limit');

          const config = new MimeConfigError('bad option', option);
          expect(config.option).toBe(option);
          expect(config.code).toBe('CONFIG_ERROR');
          expect(config.source).toBe('config');
        }
      ),
      { numRuns: 100 }
    );
  });

  it('UnrecoverableRandomnessError wraps its cause', () => {
    const cause = new Error('entropy source closed');
    const error = new UnrecoverableRandomnessError(cause);

    expect(error).toBeInstanceOf(MimeError);
    expect(error.message).toBe('random source unavailable: entropy source closed');
    expect(error.cause).toBe(cause);
    expect(error.code).toBe('RANDOMNESS_UNAVAILABLE');
    expect(error.source).toBe('environment');
  });
});
