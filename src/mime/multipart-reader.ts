/**
 * MIME Multipart Reader
 *
 * Splits a multipart body into parts per RFC 2046. Each part comes back
 * with its parsed header, the header's raw bytes and its body bytes.
 *
 * @packageDocumentation
 */

import { LineReader } from '../protocol/reader.js';
import { StreamError } from '../types/errors.js';
import type { MultipartPart } from '../types/message.js';

const LF = 0x0a;
const CR = 0x0d;
const SPACE = 0x20;
const TAB = 0x09;

type DelimiterKind = 'part' | 'close';

export class MultipartReader {
  private readonly body: Buffer;
  private readonly dashBoundary: Buffer;
  private pos = 0;
  private started = false;
  private done = false;

  /**
   * @param body - Multipart body (everything after the enclosing header block)
   * @param boundary - Boundary string (without --)
   */
  constructor(body: Buffer, boundary: string) {
    this.body = body;
    this.dashBoundary = Buffer.from(`--${boundary}`, 'latin1');
  }

  /**
   * Returns the next part, or null after the close delimiter.
   * The preamble and the epilogue are discarded.
   *
   * @throws StreamError when the body has no opening delimiter or ends
   * before the close delimiter
   * @throws MalformedHeaderError when a part header is malformed
   */
  nextPart(): MultipartPart | null {
    if (this.done) {
      return null;
    }

    if (!this.started) {
      this.started = true;
      const first = this.findDelimiter(0, true);
      if (first === null) {
        throw new StreamError(`multipart: NextPart: no opening delimiter for boundary "${this.boundary}"`);
      }
      if (first.kind === 'close') {
        this.done = true;
        return null;
      }
      this.pos = first.next;
    }

    const partStart = this.pos;
    const delimiter = this.findDelimiter(partStart, false);
    if (delimiter === null) {
      throw new StreamError(`multipart: NextPart: unexpected EOF before close delimiter "${this.boundary}--"`);
    }

    // The line break before a delimiter belongs to the delimiter
    let partEnd = delimiter.lineStart;
    if (partEnd > partStart && this.body[partEnd - 1] === LF) {
      partEnd--;
      if (partEnd > partStart && this.body[partEnd - 1] === CR) {
        partEnd--;
      }
    }

    const reader = new LineReader(this.body.subarray(partStart, partEnd));
    const { header, raw } = reader.readMimeHeader();
    const part: MultipartPart = {
      header,
      rawOriginalHeader: raw,
      body: reader.remaining()
    };

    if (delimiter.kind === 'close') {
      this.done = true;
    } else {
      this.pos = delimiter.next;
    }
    return part;
  }

  private get boundary(): string {
    return this.dashBoundary.subarray(2).toString('latin1');
  }

  /**
   * Finds the next delimiter line at or after `from`.
   * A delimiter starts a line (or the body when `atBodyStart`), is followed
   * by an optional "--", optional linear whitespace and the line end.
   */
  private findDelimiter(from: number, atBodyStart: boolean): { lineStart: number; next: number; kind: DelimiterKind } | null {
    let search = from;
    for (;;) {
      const idx = this.body.indexOf(this.dashBoundary, search);
      if (idx === -1) {
        return null;
      }
      search = idx + 1;

      const lineStartOk = (idx === 0 && atBodyStart) || (idx > 0 && this.body[idx - 1] === LF);
      if (!lineStartOk) {
        continue;
      }

      let p = idx + this.dashBoundary.length;
      let kind: DelimiterKind = 'part';
      if (this.body[p] === 0x2d && this.body[p + 1] === 0x2d) {
        kind = 'close';
        p += 2;
      }
      while (p < this.body.length && (this.body[p] === SPACE || this.body[p] === TAB)) {
        p++;
      }

      if (p >= this.body.length) {
        return { lineStart: idx, next: p, kind };
      }
      if (this.body[p] === LF) {
        return { lineStart: idx, next: p + 1, kind };
      }
      if (this.body[p] === CR && this.body[p + 1] === LF) {
        return { lineStart: idx, next: p + 2, kind };
      }
      // "--boundary" followed by other text is ordinary content
    }
  }
}
