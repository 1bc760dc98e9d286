/**
 * Message tree node
 *
 * One Message per message or MIME part. A node is multipart (parts), an
 * RFC822 wrapper (bodyMessage), a leaf with a body, or an empty leaf; never
 * more than one of these.
 *
 * @packageDocumentation
 */

import { MimeHeader } from './mime-header.js';

const LF = 0x0a;
const CR = 0x0d;

/**
 * Constructor fields for authoring a message by hand
 */
export interface MessageInit {
  header?: MimeHeader | Record<string, string | string[]>;
  body?: Buffer | string;
  parts?: Message[];
  bodyMessage?: Message;
  boundary?: string;
  idx?: string;
}

/**
 * Strips trailing CR and LF bytes
 */
export function trimTrailingNewlines(data: Buffer): Buffer {
  let end = data.length;
  while (end > 0 && (data[end - 1] === LF || data[end - 1] === CR)) {
    end--;
  }
  return data.subarray(0, end);
}

/**
 * Splits a raw header block at the first blank line.
 *
 * @returns The header bytes before the blank line and the top-level field
 * names (text before the first colon of lines not starting with space or tab)
 */
export function scanRawHeader(raw: Buffer): { header: Buffer; order: string[] } {
  const order: string[] = [];
  let start = 0;

  while (start < raw.length) {
    let end = raw.indexOf(LF, start);
    const next = end === -1 ? raw.length : end + 1;
    if (end === -1) end = raw.length;

    const line = end > start && raw[end - 1] === CR ? raw.subarray(start, end - 1) : raw.subarray(start, end);
    if (line.length === 0) {
      return { header: raw.subarray(0, start), order };
    }
    if (line[0] !== 0x20 && line[0] !== 0x09) {
      const colon = line.indexOf(0x3a);
      order.push((colon === -1 ? line : line.subarray(0, colon)).toString('latin1'));
    }
    start = next;
  }

  return { header: raw, order };
}

export class Message {
  /** Canonical field name -> values */
  header: MimeHeader;
  /** When false and rawOriginalHeader is set, the builder emits the raw bytes */
  headerChanged = false;
  /** Header block exactly as read, trailing line terminator trimmed */
  rawOriginalHeader: Buffer | null = null;
  /** Field names in first-seen order, derived from rawOriginalHeader */
  headerOrder: string[] = [];
  /** Body of a leaf part */
  body: Buffer;
  /** Child parts of a multipart message */
  parts: Message[] = [];
  /** Embedded message of a message/rfc822 part */
  bodyMessage: Message | null;
  /** Multipart boundary */
  boundary: string;
  /** Position in the tree, e.g. "2-1" */
  idx: string;
  /** The body was transfer-decoded before the nested parse */
  isDecoded = false;
  /** Nested message/rfc822 levels already unwrapped */
  rfc822Depth = 0;
  /** Containing message; navigation only */
  parent: Message | null = null;

  constructor(init: MessageInit = {}) {
    this.header = init.header instanceof MimeHeader ? init.header : new MimeHeader(init.header);
    this.body = typeof init.body === 'string' ? Buffer.from(init.body, 'utf-8') : init.body ?? Buffer.alloc(0);
    this.bodyMessage = init.bodyMessage ?? null;
    this.boundary = init.boundary ?? '';
    this.idx = init.idx ?? '';
    for (const part of init.parts ?? []) {
      this.addPart(part);
    }
  }

  isMultipart(): boolean {
    return this.parts.length > 0;
  }

  isRfc822(): boolean {
    return this.bodyMessage !== null;
  }

  /**
   * Appends a part and points its parent at this message
   */
  addPart(part: Message): void {
    part.parent = this;
    this.parts.push(part);
  }

  /**
   * Captures the raw header block and the field order it carries
   *
   * @param rawHeader - Header bytes as read, possibly including the blank line
   */
  setOriginalHeaderOrder(rawHeader: Buffer): void {
    const { header, order } = scanRawHeader(rawHeader);
    this.headerOrder = order;
    this.rawOriginalHeader = trimTrailingNewlines(header);
  }

  /**
   * Copies the content of another message into this one.
   *
   * Header fields of `other` with a non-empty first value replace ours,
   * empty ones delete ours; fields `other` does not mention are kept. Body,
   * parts, nested message and boundary are taken over as they are.
   */
  merge(other: Message): void {
    for (const [key, values] of other.header.entries()) {
      if (values[0] !== '') {
        this.header.set(key, values[0]);
      } else {
        this.header.delete(key);
      }
    }

    this.bodyMessage = other.bodyMessage;
    this.body = other.body;
    this.boundary = other.boundary;
    this.parts = [];
    for (const part of other.parts) {
      this.addPart(part);
    }
    this.headerChanged = true;
  }
}
