/**
 * Text Protocol Reader
 *
 * Line-oriented reader over a byte buffer. Every read hands back the
 * original bytes next to the cleaned-up value, which is what lets a
 * decomposed message rebuild its header block byte for byte.
 *
 * @packageDocumentation
 */

import { canonicalMimeHeaderKey, isAsciiLetter } from './canonical-key.js';
import { DotReader } from './dot-reader.js';
import { MimeHeader } from '../mime/mime-header.js';
import { MalformedHeaderError, StreamError } from '../types/errors.js';
import type { LineResult, MimeHeaderResult } from '../types/message.js';

const LF = 0x0a;
const CR = 0x0d;
const SPACE = 0x20;
const TAB = 0x09;
const COLON = 0x3a;
const NEWLINE = Buffer.from('\n');

/**
 * Builds the diagnostic preview of an offending line:
 * the whole line up to 100 bytes, else the first and last 50 joined by "..."
 */
function errorPreview(line: Buffer): string {
  if (line.length > 100) {
    return Buffer.concat([line.subarray(0, 50), Buffer.from('...'), line.subarray(line.length - 50)]).toString('utf-8');
  }
  return line.toString('utf-8');
}

/**
 * Returns the slice of `s` without leading and trailing spaces and tabs
 */
function trim(s: Buffer): Buffer {
  let i = 0;
  while (i < s.length && (s[i] === SPACE || s[i] === TAB)) {
    i++;
  }
  let n = s.length;
  while (n > i && (s[n - 1] === SPACE || s[n - 1] === TAB)) {
    n--;
  }
  return s.subarray(i, n);
}

function joinLines(lines: Buffer[]): Buffer {
  const chunks: Buffer[] = [];
  lines.forEach((line, index) => {
    if (index > 0) chunks.push(NEWLINE);
    chunks.push(line);
  });
  return Buffer.concat(chunks);
}

export class LineReader {
  private readonly data: Buffer;
  private pos = 0;
  private dot: DotReader | null = null;

  constructor(data: Buffer | string) {
    this.data = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
  }

  /** Bytes not yet consumed */
  get buffered(): number {
    return this.data.length - this.pos;
  }

  /**
   * Reads one line. The "\n" terminator (and a "\r" before it) is removed
   * from `line`; `raw` keeps everything but the final "\n".
   *
   * @returns The line, or null at end of input
   */
  readLine(): LineResult | null {
    this.closeDot();
    if (this.pos >= this.data.length) {
      return null;
    }

    const end = this.data.indexOf(LF, this.pos);
    if (end === -1) {
      const raw = this.data.subarray(this.pos);
      this.pos = this.data.length;
      return { line: raw, raw };
    }

    const raw = this.data.subarray(this.pos, end);
    this.pos = end + 1;
    const line = raw.length > 0 && raw[raw.length - 1] === CR ? raw.subarray(0, raw.length - 1) : raw;
    return { line, raw };
  }

  /**
   * Reads one header line together with its folded continuation lines.
   *
   * `line` holds each physical line trimmed of spaces and tabs, joined by a
   * single space; `raw` holds the physical lines verbatim, joined by "\n".
   *
   * @returns The logical line, or null at end of input
   */
  readContinuedLine(): LineResult | null {
    const first = this.readLine();
    if (first === null) {
      return null;
    }
    if (first.line.length === 0) {
      return first;
    }

    // The next header key starts with a letter: nothing to unfold
    if (this.buffered > 1 && isAsciiLetter(this.peekByte())) {
      return { line: trim(first.line), raw: first.raw };
    }

    const values: Buffer[] = [trim(first.line)];
    const rawLines: Buffer[] = [first.raw];

    for (;;) {
      const skipped = this.skipSpace();
      if (skipped.length === 0) {
        break;
      }
      const next = this.readLine();
      if (next === null) {
        rawLines.push(skipped);
        break;
      }
      values.push(Buffer.from(' '), trim(next.line));
      rawLines.push(Buffer.concat([skipped, next.raw]));
    }

    return { line: Buffer.concat(values), raw: joinLines(rawLines) };
  }

  /**
   * Reads a MIME-style header block: possibly folded "Key: Value" lines
   * ending in a blank line or at end of input. Names and values are byte
   * strings: each byte is one latin1 character.
   *
   * For example, given
   *
   *	My-Key: Value 1
   *	Long-Key: Even
   *	       Longer Value
   *	My-Key: Value 2
   *
   * the header maps "My-Key" to ["Value 1", "Value 2"] and "Long-Key" to
   * ["Even Longer Value"].
   *
   * @throws MalformedHeaderError when the block starts with a continuation
   * line or a line has no colon
   */
  readMimeHeader(): MimeHeaderResult {
    const header = new MimeHeader();
    const rawLines: Buffer[] = [];

    // The first line cannot start with a leading space.
    const lead = this.peekByte();
    if (lead === SPACE || lead === TAB) {
      const first = this.readLine();
      throw new MalformedHeaderError('malformed MIME header initial line', errorPreview(first?.line ?? Buffer.alloc(0)));
    }

    for (;;) {
      const kv = this.readContinuedLine();
      if (kv === null) {
        return { header, raw: joinLines(rawLines), terminated: false };
      }
      rawLines.push(kv.raw);
      if (kv.line.length === 0) {
        return { header, raw: joinLines(rawLines), terminated: true };
      }

      const line = kv.line;
      let i = line.indexOf(COLON);
      if (i < 0) {
        throw new MalformedHeaderError('malformed MIME header line', errorPreview(line));
      }

      // Trailing spaces before the colon show up in the wild
      let endKey = i;
      while (endKey > 0 && line[endKey - 1] === SPACE) {
        endKey--;
      }
      const key = canonicalMimeHeaderKey(line.subarray(0, endKey).toString('latin1'));

      // An empty key is not a token; skip it rather than fail
      if (key === '') {
        continue;
      }

      i++; // skip colon
      while (i < line.length && (line[i] === SPACE || line[i] === TAB)) {
        i++;
      }
      header.add(key, line.subarray(i).toString('latin1'));
    }
  }

  /**
   * Consumes and returns every byte not yet read
   */
  remaining(): Buffer {
    this.closeDot();
    const rest = this.data.subarray(this.pos);
    this.pos = this.data.length;
    return rest;
  }

  /**
   * Returns a reader over the dot-encoded block at the current position.
   * The DotReader is valid until the next call to another method of this reader.
   */
  dotReader(): DotReader {
    this.closeDot();
    this.dot = new DotReader(this);
    return this.dot;
  }

  /**
   * Reads a dot-encoded block and returns the decoded data
   */
  readDotBytes(): Buffer {
    const reader = this.dotReader();
    const chunks: Buffer[] = [];
    for (let chunk = reader.read(); chunk !== null; chunk = reader.read()) {
      chunks.push(chunk);
    }
    return Buffer.concat(chunks);
  }

  /**
   * Reads a dot-encoded block and returns its lines without terminators
   *
   * @throws StreamError when input ends before the "." line
   */
  readDotLines(): string[] {
    const lines: string[] = [];
    for (;;) {
      const next = this.readLine();
      if (next === null) {
        throw new StreamError('unexpected EOF');
      }

      // Dot by itself marks end; otherwise cut one dot.
      let line = next.line;
      if (line.length > 0 && line[0] === 0x2e) {
        if (line.length === 1) {
          return lines;
        }
        line = line.subarray(1);
      }
      lines.push(line.toString('utf-8'));
    }
  }

  /** @internal */
  readByte(): number {
    if (this.pos >= this.data.length) {
      return -1;
    }
    return this.data[this.pos++];
  }

  /** @internal */
  unreadByte(): void {
    if (this.pos > 0) {
      this.pos--;
    }
  }

  /** @internal */
  releaseDot(dot: DotReader): void {
    if (this.dot === dot) {
      this.dot = null;
    }
  }

  private peekByte(): number {
    return this.pos < this.data.length ? this.data[this.pos] : -1;
  }

  /**
   * Consumes spaces and tabs, returning the bytes skipped
   */
  private skipSpace(): Buffer {
    const start = this.pos;
    while (this.pos < this.data.length && (this.data[this.pos] === SPACE || this.data[this.pos] === TAB)) {
      this.pos++;
    }
    return this.data.subarray(start, this.pos);
  }

  /**
   * Drains an open DotReader through its end line
   */
  private closeDot(): void {
    while (this.dot !== null) {
      try {
        this.dot.read();
      } catch (err) {
        // A block cut short by end of input was released; later reads see EOF
        if (!(err instanceof StreamError) || this.dot !== null) throw err;
      }
    }
  }
}
