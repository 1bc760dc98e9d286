/**
 * Protocol Reader Unit Tests
 *
 * Line reading, header unfolding, raw byte retention and
 * header key canonicalization.
 */

import { describe, it, expect } from 'vitest';
import { LineReader } from '../../src/protocol/reader.js';
import { canonicalMimeHeaderKey } from '../../src/protocol/canonical-key.js';
import { MalformedHeaderError, MimeError } from '../../src/types/errors.js';

describe('LineReader', () => {
  describe('readLine', () => {
    it('strips CRLF from the line but keeps the CR in the raw bytes', () => {
      const reader = new LineReader('Subject: hi\r\nX-Id: 1\n');

      const first = reader.readLine();
      expect(first?.line.toString()).toBe('Subject: hi');
      expect(first?.raw.toString()).toBe('Subject: hi\r');

      const second = reader.readLine();
      expect(second?.line.toString()).toBe('X-Id: 1');
      expect(second?.raw.toString()).toBe('X-Id: 1');

      expect(reader.readLine()).toBeNull();
    });

    it('returns an unterminated last line', () => {
      const reader = new LineReader('abc');
      const line = reader.readLine();
      expect(line?.line.toString()).toBe('abc');
      expect(line?.raw.toString()).toBe('abc');
      expect(reader.readLine()).toBeNull();
    });

    it('returns null on empty input', () => {
      expect(new LineReader('').readLine()).toBeNull();
    });
  });

  describe('readContinuedLine', () => {
    it('unfolds continuation lines and keeps the raw folding', () => {
      const reader = new LineReader('Subject: This is\r\n  folded\r\n\tagain\r\nFrom: a\r\n');
      const result = reader.readContinuedLine();

      expect(result?.line.toString()).toBe('Subject: This is folded again');
      expect(result?.raw.toString()).toBe('Subject: This is\r\n  folded\r\n\tagain\r');

      const next = reader.readContinuedLine();
      expect(next?.line.toString()).toBe('From: a');
    });

    it('trims spaces and tabs around an unfolded line', () => {
      const reader = new LineReader('  padded \t\r\n');
      expect(reader.readContinuedLine()?.line.toString()).toBe('padded');
    });

    it('returns a blank line as is', () => {
      const reader = new LineReader('\r\nbody');
      const result = reader.readContinuedLine();
      expect(result?.line.length).toBe(0);
      expect(result?.raw.toString()).toBe('\r');
    });
  });

  describe('readMimeHeader', () => {
    it('collects values per canonical key in encounter order', () => {
      const reader = new LineReader(
        'My-Key: Value 1\r\nLong-Key: Even\r\n       Longer Value\r\nmy-key: Value 2\r\n\r\nbody'
      );
      const { header, raw, terminated } = reader.readMimeHeader();

      expect(terminated).toBe(true);
      expect(header.values('My-Key')).toEqual(['Value 1', 'Value 2']);
      expect(header.values('Long-Key')).toEqual(['Even Longer Value']);
      expect(header.keys()).toEqual(['My-Key', 'Long-Key']);
      expect(raw.toString()).toBe(
        'My-Key: Value 1\r\nLong-Key: Even\r\n       Longer Value\r\nmy-key: Value 2\r\n\r'
      );
      expect(reader.remaining().toString()).toBe('body');
    });

    it('trims spaces before the colon and whitespace after it', () => {
      const reader = new LineReader('Subject  : x\r\nA:\t  v\r\n\r\n');
      const { header } = reader.readMimeHeader();
      expect(header.get('Subject')).toBe('x');
      expect(header.get('A')).toBe('v');
    });

    it('keeps keys with non-token bytes unmodified', () => {
      const { header } = new LineReader('x header: v\r\n\r\n').readMimeHeader();
      expect(header.keys()).toEqual(['x header']);
      expect(header.get('x header')).toBe('v');
    });

    it('skips fields with an empty key', () => {
      const { header } = new LineReader(': value\r\nA: 1\r\n\r\n').readMimeHeader();
      expect(header.keys()).toEqual(['A']);
    });

    it('canonicalizes lower-case keys', () => {
      const { header } = new LineReader('content-type: text/plain\r\n\r\n').readMimeHeader();
      expect(header.keys()).toEqual(['Content-Type']);
    });

    it('accepts a header block that ends at end of input', () => {
      const reader = new LineReader('A: 1\r\nB: 2');
      const { header, raw, terminated } = reader.readMimeHeader();
      expect(terminated).toBe(false);
      expect(header.get('B')).toBe('2');
      expect(raw.toString()).toBe('A: 1\r\nB: 2');
      expect(reader.remaining().length).toBe(0);
    });

    it('keeps 8-bit bytes of names and values one character per byte', () => {
      const reader = new LineReader(Buffer.from([0x53, 0x3a, 0x20, 0x63, 0xe9, 0x0d, 0x0a, 0x0d, 0x0a]));
      const { header } = reader.readMimeHeader();
      expect(header.get('S')).toBe('c\u00e9');
    });

    it('accepts LF-only line endings', () => {
      const reader = new LineReader('A: 1\nB: 2\n\nbody\n');
      const { header, raw } = reader.readMimeHeader();
      expect(header.get('A')).toBe('1');
      expect(raw.toString()).toBe('A: 1\nB: 2\n');
      expect(reader.remaining().toString()).toBe('body\n');
    });

    it('rejects a header block starting with a continuation line', () => {
      const reader = new LineReader('\tSubject: x\r\n\r\n');
      expect(() => reader.readMimeHeader()).toThrow(MalformedHeaderError);
    });

    it('previews the offending initial line', () => {
      try {
        new LineReader('\tSubject: x\r\n\r\n').readMimeHeader();
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(MalformedHeaderError);
        expect(err).toBeInstanceOf(MimeError);
        if (err instanceof MalformedHeaderError) {
          expect(err.preview).toBe('\tSubject: x');
          expect(err.message).toBe('malformed MIME header initial line: \tSubject: x');
          expect(err.code).toBe('MALFORMED_HEADER');
        }
      }
    });

    it('truncates the preview of lines longer than 100 bytes', () => {
      const line = '\t' + 'a'.repeat(60) + 'b'.repeat(60);
      try {
        new LineReader(line + '\r\n\r\n').readMimeHeader();
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(MalformedHeaderError);
        if (err instanceof MalformedHeaderError) {
          expect(err.preview).toBe('\t' + 'a'.repeat(49) + '...' + 'b'.repeat(50));
          expect(err.preview.length).toBe(103);
        }
      }
    });

    it('rejects a line without a colon', () => {
      try {
        new LineReader('Subject: ok\r\nnot a header\r\n\r\n').readMimeHeader();
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(MalformedHeaderError);
        if (err instanceof MalformedHeaderError) {
          expect(err.preview).toBe('not a header');
          expect(err.message).toBe('malformed MIME header line: not a header');
        }
      }
    });

    it('keeps a line of exactly 100 bytes whole in the preview', () => {
      const line = 'x'.repeat(100);
      try {
        new LineReader(line + '\r\n\r\n').readMimeHeader();
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(MalformedHeaderError);
        if (err instanceof MalformedHeaderError) {
          expect(err.preview).toBe(line);
        }
      }
    });
  });
});

describe('canonicalMimeHeaderKey', () => {
  it('upper-cases the first letter and letters after hyphens', () => {
    expect(canonicalMimeHeaderKey('content-type')).toBe('Content-Type');
    expect(canonicalMimeHeaderKey('CONTENT-TYPE')).toBe('Content-Type');
    expect(canonicalMimeHeaderKey('cONTENT-tYPE')).toBe('Content-Type');
    expect(canonicalMimeHeaderKey('message-id')).toBe('Message-Id');
    expect(canonicalMimeHeaderKey('dkim-signature')).toBe('Dkim-Signature');
    expect(canonicalMimeHeaderKey('1st-header')).toBe('1st-Header');
  });

  it('returns canonical keys unchanged', () => {
    expect(canonicalMimeHeaderKey('Content-Type')).toBe('Content-Type');
    expect(canonicalMimeHeaderKey('X-Imforwards')).toBe('X-Imforwards');
  });

  it('leaves keys with spaces or non-token bytes alone', () => {
    expect(canonicalMimeHeaderKey('foo bar')).toBe('foo bar');
    expect(canonicalMimeHeaderKey('foo@bar')).toBe('foo@bar');
    expect(canonicalMimeHeaderKey('subject ')).toBe('subject ');
  });

  it('returns the empty key unchanged', () => {
    expect(canonicalMimeHeaderKey('')).toBe('');
  });
});
