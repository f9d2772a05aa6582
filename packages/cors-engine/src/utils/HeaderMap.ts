/**
 * Header Map
 *
 * Case-insensitive multi-map of HTTP header fields, plus the two narrow
 * capabilities the engine needs from a host framework's request and response.
 */

import { splitCommaList } from '@corsguard/common-types';
import { CORS_WILDCARD } from '../constants/index.js';
import { TokenSet } from './TokenSet.js';

/**
 * Read access to request headers. Lookup is case-insensitive and multiple
 * field lines are combined with ", ".
 */
export interface HeaderLookup {
  get(name: string): string | undefined;
}

/**
 * Read/replace access to response headers
 */
export interface MutableHeaders extends HeaderLookup {
  set(name: string, value: string): void;
}

/** Header record as produced by Node (`IncomingHttpHeaders`, `OutgoingHttpHeaders`) */
export type HeaderRecord = Record<string, string | number | readonly string[] | undefined>;

interface HeaderField {
  /** Spelling of the name when the field was first added */
  name: string;
  values: string[];
}

export class HeaderMap implements MutableHeaders, Iterable<[string, string]> {
  private readonly fields = new Map<string, HeaderField>();

  constructor(init: HeaderRecord = {}) {
    for (const [name, value] of Object.entries(init)) {
      if (value === undefined) {
        continue;
      }
      if (typeof value === 'string' || typeof value === 'number') {
        this.append(name, String(value));
      } else {
        for (const item of value) {
          this.append(name, item);
        }
      }
    }
  }

  static fromEntries(entries: Iterable<readonly [string, string]>): HeaderMap {
    const headers = new HeaderMap();
    for (const [name, value] of entries) {
      headers.append(name, value);
    }
    return headers;
  }

  get size(): number {
    return this.fields.size;
  }

  has(name: string): boolean {
    return this.fields.has(name.toLowerCase());
  }

  get(name: string): string | undefined {
    return this.fields.get(name.toLowerCase())?.values.join(', ');
  }

  getAll(name: string): string[] {
    return [...(this.fields.get(name.toLowerCase())?.values ?? [])];
  }

  /**
   * Replace every value of a field
   */
  set(name: string, value: string): this {
    this.fields.set(name.toLowerCase(), { name, values: [value] });
    return this;
  }

  /**
   * Add a value to a field, keeping the existing ones
   */
  append(name: string, value: string): this {
    const field = this.fields.get(name.toLowerCase());
    if (field === undefined) {
      this.fields.set(name.toLowerCase(), { name, values: [value] });
    } else {
      field.values.push(value);
    }
    return this;
  }

  delete(name: string): boolean {
    return this.fields.delete(name.toLowerCase());
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this);
  }

  *[Symbol.iterator](): Iterator<[string, string]> {
    for (const field of this.fields.values()) {
      yield [field.name, field.values.join(', ')];
    }
  }
}

/**
 * Merge tokens into an existing `Vary` value.
 *
 * Existing tokens keep their order and spelling, additions are appended only
 * when absent (case-insensitive). `Vary: *` already covers every header and is
 * returned unchanged.
 */
export function mergeVary(existing: string | undefined, additions: readonly string[]): string {
  const current = existing === undefined ? [] : splitCommaList(existing);
  if (current.includes(CORS_WILDCARD)) {
    return CORS_WILDCARD;
  }
  return TokenSet.of(current).union(additions).join();
}
