/**
 * Ordered MIME header multi-map
 *
 * Keys are stored in canonical form and iterate in first-insertion order,
 * so rebuilding headers from the map is deterministic. Values hold header
 * bytes as latin1 strings, one character per byte, so 8-bit bytes survive
 * a rebuild unchanged.
 *
 * @packageDocumentation
 */

import { canonicalMimeHeaderKey } from '../protocol/canonical-key.js';

export class MimeHeader {
  private readonly fields = new Map<string, string[]>();

  constructor(init?: Record<string, string | string[]>) {
    if (init) {
      for (const [key, value] of Object.entries(init)) {
        for (const v of Array.isArray(value) ? value : [value]) {
          this.add(key, v);
        }
      }
    }
  }

  /** Number of distinct fields */
  get size(): number {
    return this.fields.size;
  }

  /**
   * First value of a field, or '' when absent
   */
  get(key: string): string {
    const values = this.fields.get(canonicalMimeHeaderKey(key));
    return values?.[0] ?? '';
  }

  /**
   * All values of a field in encounter order
   */
  values(key: string): string[] {
    return [...(this.fields.get(canonicalMimeHeaderKey(key)) ?? [])];
  }

  has(key: string): boolean {
    return this.fields.has(canonicalMimeHeaderKey(key));
  }

  /**
   * Replaces every value of a field. An existing field keeps its position.
   */
  set(key: string, value: string): void {
    this.fields.set(canonicalMimeHeaderKey(key), [value]);
  }

  /**
   * Appends a value to a field
   */
  add(key: string, value: string): void {
    const canonical = canonicalMimeHeaderKey(key);
    const existing = this.fields.get(canonical);
    if (existing) {
      existing.push(value);
    } else {
      this.fields.set(canonical, [value]);
    }
  }

  delete(key: string): boolean {
    return this.fields.delete(canonicalMimeHeaderKey(key));
  }

  /** Canonical keys in insertion order */
  keys(): string[] {
    return [...this.fields.keys()];
  }

  /** [key, values] pairs in insertion order */
  entries(): Array<[string, string[]]> {
    return [...this.fields.entries()].map(([key, values]) => [key, [...values]]);
  }

  clone(): MimeHeader {
    const copy = new MimeHeader();
    for (const [key, values] of this.fields) {
      for (const value of values) {
        copy.add(key, value);
      }
    }
    return copy;
  }

  toObject(): Record<string, string[]> {
    return Object.fromEntries(this.entries());
  }
}
