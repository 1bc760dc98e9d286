/**
 * MessageBuilder - Message tree to raw message bytes
 *
 * Untouched headers are written from their preserved raw bytes; only
 * changed headers are regenerated.
 *
 * @packageDocumentation
 */

import { encodeByContentEncoding, randomBoundary } from '../encoding/content-encoding.js';
import { canonicalMimeHeaderKey } from '../protocol/canonical-key.js';
import { MimeConfigError } from '../types/errors.js';
import type { BuilderOptions, Newline } from '../types/config.js';
import { scanRawHeader, trimTrailingNewlines, type Message } from './message.js';

/**
 * Default configuration values
 */
const DEFAULT_NEWLINE: Newline = '\r\n';

const LF = 0x0a;
const SPACE = 0x20;
const TAB = 0x09;

function validateNewline(newline: string): Newline {
  if (newline !== '\r\n' && newline !== '\n') {
    throw new MimeConfigError(`newline must be "\\r\\n" or "\\n", got ${JSON.stringify(newline)}`, 'newline');
  }
  return newline;
}

/**
 * Locates the raw lines of a header field: the first top-level line whose
 * name matches case-insensitively, through its continuation lines.
 *
 * @returns [start, end) byte offsets, end just past the run's last "\n"
 * (or the end of the block), or null when the field is absent
 */
function findRawField(raw: Buffer, field: string): [number, number] | null {
  const name = field.toLowerCase();
  let lineStart = 0;

  while (lineStart < raw.length) {
    const lineEnd = raw.indexOf(LF, lineStart);
    const nextLine = lineEnd === -1 ? raw.length : lineEnd + 1;

    if (raw[lineStart] !== SPACE && raw[lineStart] !== TAB && matchesFieldName(raw, lineStart, name)) {
      let end = nextLine;
      while (end < raw.length && (raw[end] === SPACE || raw[end] === TAB)) {
        const next = raw.indexOf(LF, end);
        end = next === -1 ? raw.length : next + 1;
      }
      return [lineStart, end];
    }

    lineStart = nextLine;
  }
  return null;
}

function matchesFieldName(raw: Buffer, pos: number, name: string): boolean {
  const candidate = raw.subarray(pos, pos + name.length).toString('latin1').toLowerCase();
  if (candidate !== name) {
    return false;
  }
  let i = pos + name.length;
  while (i < raw.length && (raw[i] === SPACE || raw[i] === TAB)) {
    i++;
  }
  return raw[i] === 0x3a;
}

/**
 * Serializes Message trees.
 *
 * @example
 * ```typescript
 * const builder = new MessageBuilder({ newline: '\r\n' });
 * builder.setHeaderField(message, 'Subject', 'Updated');
 * const raw = builder.build(message);
 * ```
 */
export class MessageBuilder {
  private _newline: Newline;

  constructor(options: BuilderOptions = {}) {
    this._newline = validateNewline(options.newline ?? DEFAULT_NEWLINE);
  }

  /** Line terminator for generated lines */
  get newline(): Newline {
    return this._newline;
  }

  set newline(value: Newline) {
    this._newline = validateNewline(value);
  }

  /**
   * Builds the complete message: header, blank line, body.
   * A body decoded during decomposition is re-encoded with the message's
   * Content-Transfer-Encoding.
   */
  build(message: Message): Buffer {
    let body = this.buildBody(message);
    if (message.isDecoded) {
      body = encodeByContentEncoding(body, message.header.get('Content-Transfer-Encoding'), this._newline);
    }
    return Buffer.concat([
      this.buildHeader(message),
      Buffer.from(this._newline + this._newline),
      body
    ]);
  }

  /**
   * Builds the header block without its final line terminator.
   *
   * The preserved raw header is returned as is unless the header was
   * changed; otherwise fields are written in their original order, then
   * any others in map order.
   */
  buildHeader(message: Message): Buffer {
    if (message.rawOriginalHeader !== null && message.rawOriginalHeader.length > 0 && !message.headerChanged) {
      return trimTrailingNewlines(message.rawOriginalHeader);
    }

    const lines: string[] = [];
    const consumed = new Map<string, number>();

    for (const name of message.headerOrder) {
      const key = canonicalMimeHeaderKey(name);
      const values = message.header.values(key);
      const used = consumed.get(key) ?? 0;
      if (used < values.length) {
        lines.push(`${name}: ${values[used]}`);
        consumed.set(key, used + 1);
      }
    }

    for (const [key, values] of message.header.entries()) {
      for (const value of values.slice(consumed.get(key) ?? 0)) {
        if (value !== '') {
          lines.push(`${key}: ${value}`);
        }
      }
    }

    return Buffer.from(lines.join(this._newline), 'latin1');
  }

  /**
   * Builds the body: the nested message, the leaf body, and the multipart
   * parts framed by boundary lines. A multipart message without a boundary
   * gets a random one.
   */
  buildBody(message: Message): Buffer {
    const chunks: Buffer[] = [];

    if (message.isRfc822() && message.bodyMessage !== null) {
      chunks.push(this.build(message.bodyMessage));
    } else if (message.body.length > 0) {
      chunks.push(message.body);
    }

    if (message.isMultipart()) {
      if (message.boundary === '') {
        message.boundary = randomBoundary();
      }

      message.parts.forEach((part, index) => {
        if (index > 0) {
          chunks.push(Buffer.from(this._newline));
        }
        chunks.push(Buffer.from(`${this._newline}--${message.boundary}${this._newline}`, 'latin1'));
        chunks.push(this.build(part));
      });
      chunks.push(Buffer.from(`${this._newline}--${message.boundary}--${this._newline}`, 'latin1'));
    }

    return Buffer.concat(chunks);
  }

  /**
   * Sets a header field, replacing its values, and patches the raw header
   * in place so the untouched lines keep their bytes.
   *
   * The field's first line and its continuation lines are cut out and
   * "field: value" is written where they stood; other lines carrying the same
   * field are removed. A field not yet present is appended on a new line.
   */
  setHeaderField(message: Message, field: string, value: string): void {
    message.header.set(field, value);
    this.patchRawHeader(message, field, `${field}: ${value}`);
  }

  /**
   * Removes a header field from the map and from the raw header
   */
  removeHeaderField(message: Message, field: string): void {
    message.header.delete(field);
    this.patchRawHeader(message, field, null);
  }

  private patchRawHeader(message: Message, field: string, replacement: string | null): void {
    let raw = message.rawOriginalHeader;
    if (raw === null || raw.length === 0) {
      return;
    }

    const first = findRawField(raw, field);
    if (first === null) {
      if (replacement !== null) {
        const separator = raw[raw.length - 1] === LF ? '' : this._newline;
        const tail = separator === '' ? this._newline : '';
        raw = Buffer.concat([raw, Buffer.from(separator + replacement + tail, 'latin1')]);
      }
    } else {
      const [start, end] = first;
      const prefix = raw.subarray(0, start);
      let rest = raw.subarray(end);

      // Later occurrences of the same field go as well
      for (let again = findRawField(rest, field); again !== null; again = findRawField(rest, field)) {
        rest = Buffer.concat([rest.subarray(0, again[0]), rest.subarray(again[1])]);
      }

      const runEndsWithNewline = end > start && raw[end - 1] === LF;
      const inserted = replacement === null
        ? ''
        : replacement + (rest.length > 0 || runEndsWithNewline ? this._newline : '');
      raw = Buffer.concat([prefix, Buffer.from(inserted, 'latin1'), rest]);
    }

    message.rawOriginalHeader = raw;
    message.headerOrder = scanRawHeader(raw).order;
  }
}
