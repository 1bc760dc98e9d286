/**
 * Property-based tests for message decomposition and rebuilding
 *
 * Feature: mail-recompose, Property 2: Untouched Message Round-Trip
 * Validates: build(decompose(B)) = B for single-part messages,
 * header order retention and multipart framing
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { MessageDecomposer } from '../../src/mime/decomposer.js';
import { MessageBuilder } from '../../src/mime/builder.js';
import { Message } from '../../src/mime/message.js';

const letterArb = fc.constantFrom(...'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ'.split(''));
const textArb = fc.constantFrom(...'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789 .,'.split(''));

interface HeaderField {
  name: string;
  value: string;
  continuation: string | null;
}

const fieldsArb = fc
  .array(
    fc.record({
      suffix: fc.stringOf(letterArb, { maxLength: 12 }),
      value: fc.string({ maxLength: 40 }),
      continuation: fc.option(fc.stringOf(letterArb, { minLength: 1, maxLength: 20 }), { nil: null })
    }),
    { minLength: 1, maxLength: 8 }
  )
  .map((records): HeaderField[] =>
    records.map((r, i) => ({ name: `X-${i}${r.suffix}`, value: r.value, continuation: r.continuation }))
  );

function renderHeader(fields: HeaderField[], newline: string): string {
  return fields
    .map((f) => {
      const first = `${f.name}:${f.value}`;
      return f.continuation === null ? first : `${first}${newline} ${f.continuation}`;
    })
    .join(newline);
}

function expectedValue(field: HeaderField): string {
  const value = field.value.replace(/^[ \t]+|[ \t]+$/g, '');
  if (field.continuation === null) {
    return value;
  }
  return value === '' ? field.continuation : `${value} ${field.continuation}`;
}

describe('Property 2: Untouched Message Round-Trip', () => {
  it('rebuilds single-part messages byte for byte', () => {
    fc.assert(
      fc.property(
        fieldsArb,
        fc.uint8Array({ maxLength: 300 }),
        fc.constantFrom<'\r\n' | '\n'>('\r\n', '\n'),
        (fields, body, newline) => {
          const raw = Buffer.concat([
            Buffer.from(renderHeader(fields, newline) + newline + newline),
            Buffer.from(body)
          ]);

          const message = new MessageDecomposer().decompose(raw);
          const rebuilt = new MessageBuilder({ newline }).build(message);

          expect(rebuilt.equals(raw)).toBe(true);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('retains header field order and unfolded values', () => {
    fc.assert(
      fc.property(fieldsArb, (fields) => {
        const message = new MessageDecomposer().decompose(renderHeader(fields, '\r\n') + '\r\n\r\nbody');

        expect(message.headerOrder).toEqual(fields.map((f) => f.name));
        for (const field of fields) {
          expect(message.header.values(field.name)).toEqual([expectedValue(field)]);
        }
      }),
      { numRuns: 100 }
    );
  });

  it('regenerated headers keep the original field order', () => {
    fc.assert(
      fc.property(fieldsArb, (fields) => {
        const message = new MessageDecomposer().decompose(renderHeader(fields, '\r\n') + '\r\n\r\n');
        message.headerChanged = true;

        const lines = new MessageBuilder().buildHeader(message).toString().split('\r\n');

        expect(lines.map((l) => l.substring(0, l.indexOf(':')))).toEqual(fields.map((f) => f.name));
        expect(lines).toEqual(fields.map((f) => `${f.name}: ${expectedValue(f)}`));
      }),
      { numRuns: 100 }
    );
  });

  it('multipart trees survive build and decompose', () => {
    fc.assert(
      fc.property(
        fc.array(fc.stringOf(textArb, { maxLength: 60 }), { minLength: 1, maxLength: 6 }),
        (bodies) => {
          const root = new Message({
            header: { 'Content-Type': 'multipart/mixed; boundary=frontier' },
            boundary: 'frontier',
            parts: bodies.map((body) => new Message({ header: { 'Content-Type': 'text/plain' }, body }))
          });

          const message = new MessageDecomposer().decompose(new MessageBuilder().build(root));

          expect(message.boundary).toBe('frontier');
          expect(message.parts.map((p) => p.idx)).toEqual(bodies.map((_, i) => `${i + 1}`));
          expect(message.parts.map((p) => p.body.toString())).toEqual(
            bodies.map((body, i) => (i < bodies.length - 1 ? `${body}\r\n` : body))
          );
        }
      ),
      { numRuns: 100 }
    );
  });
});
