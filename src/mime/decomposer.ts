/**
 * MessageDecomposer - raw message bytes to a Message tree
 *
 * @packageDocumentation
 */

import { EventEmitter } from 'events';
import { readFile } from 'fs/promises';
import { decodeByContentEncoding } from '../encoding/content-encoding.js';
import { LineReader } from '../protocol/reader.js';
import { MediaTypeError, MimeConfigError, MimeDepthError, MimeError, StreamError } from '../types/errors.js';
import type { DecomposerOptions } from '../types/config.js';
import { extractBoundary } from './media-type.js';
import { Message } from './message.js';
import type { MimeHeader } from './mime-header.js';
import { MultipartReader } from './multipart-reader.js';

/**
 * Nested message/rfc822 levels unwrapped at most
 */
export const MAX_RFC822_DEPTH = 5;

/**
 * Default configuration values
 */
const DEFAULT_MAX_PART_DEPTH = 100;

/**
 * Payload of the 'rfc822-fallback' event
 */
export interface Rfc822FallbackEvent {
  /** idx of the message/rfc822 part kept as an opaque body */
  idx: string;
  /** Why the nested parse was abandoned */
  error: MimeError;
}

interface PendingPart {
  message: Message;
  body: Buffer;
  depth: number;
}

/**
 * Decomposes RFC 5322 / MIME messages into Message trees.
 *
 * Emits 'rfc822-fallback' when a message/rfc822 body could not be decoded
 * or parsed and was kept as an opaque body instead.
 *
 * @example
 * ```typescript
 * const decomposer = new MessageDecomposer();
 * const message = decomposer.decompose(raw);
 * message.parts[0].header.get('Content-Type');
 * ```
 */
export class MessageDecomposer extends EventEmitter {
  private readonly maxPartDepth: number;

  constructor(options: DecomposerOptions = {}) {
    super();
    const maxPartDepth = options.maxPartDepth ?? DEFAULT_MAX_PART_DEPTH;
    if (!Number.isInteger(maxPartDepth) || maxPartDepth < 1) {
      throw new MimeConfigError(`maxPartDepth must be a positive integer, got ${maxPartDepth}`, 'maxPartDepth');
    }
    this.maxPartDepth = maxPartDepth;
  }

  /**
   * Decomposes a message into header, body and parts
   *
   * @param rawMessage - Complete message bytes
   * @param partIdx - idx assigned to the root node
   * @throws MalformedHeaderError, StreamError or MimeDepthError; no partial tree is returned
   */
  decompose(rawMessage: Buffer | string, partIdx: string = ''): Message {
    const raw = typeof rawMessage === 'string' ? Buffer.from(rawMessage, 'utf-8') : rawMessage;
    return this.decomposeAt(raw, partIdx, 0);
  }

  /**
   * Reads a message file (.eml) and decomposes it
   */
  async decomposeFile(file: string): Promise<Message> {
    const raw = await readFile(file);
    return this.decompose(raw, '');
  }

  /**
   * Returns the multipart boundary named by the Content-Type header, or ''
   *
   * @throws MediaTypeError when Content-Type cannot be parsed
   */
  extractBoundary(header: MimeHeader): string {
    return extractBoundary(header);
  }

  /**
   * Fills in the parts, nested message or body of a message whose header
   * has been read.
   *
   * Multipart descent runs on an explicit work-list, so nesting depth is
   * bounded by maxPartDepth rather than by the call stack.
   */
  readParts(result: Message, body: Buffer): void {
    const pending: PendingPart[] = [{ message: result, body, depth: 0 }];

    for (let item = pending.pop(); item !== undefined; item = pending.pop()) {
      const { message, depth } = item;

      let boundary = '';
      try {
        boundary = this.extractBoundary(message.header);
      } catch (err) {
        // An unparseable Content-Type leaves the body single-part
        if (!(err instanceof MediaTypeError)) throw err;
      }

      if (boundary === '') {
        this.readBody(message, item.body);
        continue;
      }

      message.boundary = boundary;
      const reader = new MultipartReader(item.body, boundary);
      const children: PendingPart[] = [];
      let seq = 0;

      for (let part = reader.nextPart(); part !== null; part = reader.nextPart()) {
        seq++;
        if (depth + 1 > this.maxPartDepth) {
          throw new MimeDepthError(`multipart nesting exceeds ${this.maxPartDepth} levels at part ${message.idx || 'root'}`, this.maxPartDepth);
        }

        const child = new Message({
          header: part.header,
          idx: message.idx !== '' ? `${message.idx}-${seq}` : `${seq}`
        });
        child.setOriginalHeaderOrder(part.rawOriginalHeader);
        child.rfc822Depth = message.rfc822Depth;
        message.addPart(child);
        children.push({ message: child, body: part.body, depth: depth + 1 });
      }

      // Depth-first, in document order
      pending.push(...children.reverse());
    }
  }

  private decomposeAt(raw: Buffer, partIdx: string, rfc822Depth: number): Message {
    const reader = new LineReader(raw);
    const { header, raw: rawHeader, terminated } = reader.readMimeHeader();
    // A nested header block must end with its blank line
    if (rfc822Depth > 0 && !terminated) {
      throw new StreamError('unexpected EOF in nested message header');
    }
    const body = reader.remaining();

    const result = new Message({ header, idx: partIdx });
    result.rfc822Depth = rfc822Depth;
    result.setOriginalHeaderOrder(rawHeader);

    this.readParts(result, body);
    return result;
  }

  /**
   * Stores a single-part body, unwrapping message/rfc822 content when it
   * parses as a message
   */
  private readBody(message: Message, rawPartBody: Buffer): void {
    const contentType = message.header.get('Content-Type').replace(/^[ \t]+|[ \t]+$/g, '');

    if (contentType.startsWith('message/rfc822') && message.rfc822Depth < MAX_RFC822_DEPTH) {
      try {
        const { data, transformed } = decodeByContentEncoding(
          rawPartBody,
          message.header.get('Content-Transfer-Encoding')
        );
        const nested = this.decomposeAt(data, `${message.idx}-0`, message.rfc822Depth + 1);
        nested.parent = message;
        message.bodyMessage = nested;
        // Re-encoded on rebuild
        message.isDecoded = transformed;
        return;
      } catch (err) {
        if (!(err instanceof MimeError)) throw err;
        const event: Rfc822FallbackEvent = { idx: message.idx, error: err };
        this.emit('rfc822-fallback', event);
      }
    }

    message.body = rawPartBody;
  }
}
