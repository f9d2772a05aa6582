/**
 * Web Origin (RFC 6454)
 *
 * An origin is either the opaque `null` origin or a (scheme, host, port)
 * triple. Two triples are the same origin when their lower-cased scheme,
 * lower-cased (punycoded) host and effective port are equal; userinfo, path,
 * query and trailing slashes play no part.
 *
 * @example
 * Origin.parse('https://Example.com').equals(Origin.parse('https://example.com:443/')); // true
 * Origin.parse('https://example.com:8080').equals(Origin.parse('https://example.com')); // false
 * Origin.parseAllowNull('null').isNull; // true
 */

import { NULL_ORIGIN } from '../constants/index.js';

/**
 * Error thrown when a string cannot be turned into an origin
 */
export class OriginParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OriginParseError';
  }
}

export interface OriginTriple {
  /** Lower-case scheme without the trailing colon */
  readonly scheme: string;
  /** ASCII lower-case host, IDNA-encoded */
  readonly host: string;
  /** Explicit port, or the scheme's default */
  readonly port: number;
}

/** Schemes with a known default port; any other scheme needs an explicit port */
const DEFAULT_PORTS: Readonly<Partial<Record<string, number>>> = {
  http: 80,
  https: 443,
  ws: 80,
  wss: 443,
  ftp: 21,
};

export class Origin {
  /** The opaque origin. Equal only to itself. */
  static readonly NULL = new Origin(null);

  private constructor(readonly triple: OriginTriple | null) {
    Object.freeze(this);
  }

  // ============================================================================
  // Factory Methods
  // ============================================================================

  /**
   * Parse an absolute hierarchical URL into its origin.
   * `"null"` is rejected here; use parseAllowNull where the null origin is acceptable.
   * @throws OriginParseError if the value is not a URL, has no host, or its
   * scheme has no default port and none is given
   */
  static parse(value: string): Origin {
    let url: URL;
    try {
      url = new URL(value.trim());
    } catch {
      throw new OriginParseError(`Could not be parsed as URL: '${value}'`);
    }

    if (url.hostname === '') {
      throw new OriginParseError(`No host in URL '${value}'`);
    }

    const scheme = url.protocol.slice(0, -1).toLowerCase();
    const port = url.port !== '' ? Number(url.port) : DEFAULT_PORTS[scheme];
    if (port === undefined) {
      throw new OriginParseError(`Unsupported URL scheme '${scheme}'`);
    }

    return new Origin({ scheme, host: url.hostname.toLowerCase(), port });
  }

  /**
   * Like parse, but maps the literal `"null"` to Origin.NULL
   */
  static parseAllowNull(value: string): Origin {
    return value.trim() === NULL_ORIGIN ? Origin.NULL : Origin.parse(value);
  }

  /**
   * Like parseAllowNull, but returns undefined instead of throwing
   */
  static tryParse(value: string): Origin | undefined {
    try {
      return Origin.parseAllowNull(value);
    } catch (error) {
      if (error instanceof OriginParseError) {
        return undefined;
      }
      throw error;
    }
  }

  // ============================================================================
  // Accessors
  // ============================================================================

  get isNull(): boolean {
    return this.triple === null;
  }

  /**
   * Normalized comparison key: `scheme://host:port`, or `null`
   */
  get key(): string {
    if (this.triple === null) {
      return NULL_ORIGIN;
    }
    const { scheme, host, port } = this.triple;
    return `${scheme}://${host}:${port}`;
  }

  equals(other: Origin): boolean {
    return this.key === other.key;
  }

  /**
   * ASCII serialization, omitting the port when it is the scheme default
   */
  toString(): string {
    if (this.triple === null) {
      return NULL_ORIGIN;
    }
    const { scheme, host, port } = this.triple;
    return DEFAULT_PORTS[scheme] === port ? `${scheme}://${host}` : `${scheme}://${host}:${port}`;
  }
}
