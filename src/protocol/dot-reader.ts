/**
 * Dot-encoded block reader
 *
 * Dot encoding is the framing text protocols such as SMTP and NNTP use
 * for data blocks: a sequence of lines ending in "\r\n", closed by a line
 * holding just ".". Lines beginning with a dot carry an extra escaping dot.
 *
 * The decoded form rewrites "\r\n" into "\n", removes the escaping dots
 * and stops after consuming the closing "." line.
 *
 * @packageDocumentation
 */

import { StreamError } from '../types/errors.js';
import type { LineReader } from './reader.js';

/**
 * Decoder states
 */
export type DotState =
  | 'begin-line' // beginning of line; initial state
  | 'dot'        // read . at beginning of line
  | 'dot-cr'     // read .\r at beginning of line
  | 'cr'         // read \r (possibly at end of line)
  | 'data'       // reading data in middle of line
  | 'eof';       // reached .\r\n end marker line

const DOT = 0x2e;
const CR = 0x0d;
const LF = 0x0a;

export class DotReader {
  private readonly reader: LineReader;
  private _state: DotState = 'begin-line';

  constructor(reader: LineReader) {
    this.reader = reader;
  }

  get state(): DotState {
    return this._state;
  }

  /**
   * Reads up to `size` decoded bytes.
   *
   * @returns Decoded bytes, or null once the end line has been consumed
   * @throws StreamError when input ends before the end line and nothing
   * is left to return
   */
  read(size: number = 4096): Buffer | null {
    const out: number[] = [];

    while (out.length < size && this._state !== 'eof') {
      let c = this.reader.readByte();
      if (c < 0) {
        // Hand out what was decoded; the next read reports the EOF
        if (out.length > 0) {
          return Buffer.from(out);
        }
        this.reader.releaseDot(this);
        throw new StreamError('unexpected EOF');
      }

      switch (this._state) {
        case 'begin-line':
          if (c === DOT) {
            this._state = 'dot';
            continue;
          }
          if (c === CR) {
            this._state = 'cr';
            continue;
          }
          this._state = 'data';
          break;

        case 'dot':
          if (c === CR) {
            this._state = 'dot-cr';
            continue;
          }
          if (c === LF) {
            this._state = 'eof';
            continue;
          }
          this._state = 'data';
          break;

        case 'dot-cr':
          if (c === LF) {
            this._state = 'eof';
            continue;
          }
          // Not part of .\r\n: drop the leading dot, emit the saved \r
          this.reader.unreadByte();
          c = CR;
          this._state = 'data';
          break;

        case 'cr':
          if (c === LF) {
            this._state = 'begin-line';
            break;
          }
          // Not part of \r\n: emit the saved \r
          this.reader.unreadByte();
          c = CR;
          this._state = 'data';
          break;

        case 'data':
          if (c === CR) {
            this._state = 'cr';
            continue;
          }
          if (c === LF) {
            this._state = 'begin-line';
          }
          break;
      }
      out.push(c);
    }

    if (this._state === 'eof') {
      this.reader.releaseDot(this);
      if (out.length === 0) {
        return null;
      }
    }
    return Buffer.from(out);
  }
}
