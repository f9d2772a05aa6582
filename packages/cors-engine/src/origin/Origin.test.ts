/**
 * Origin Tests
 */

import { describe, it, expect } from 'vitest';
import { Origin, OriginParseError } from './Origin.js';

function same(a: string, b: string): boolean {
  return Origin.parse(a).equals(Origin.parse(b));
}

describe('Origin', () => {
  describe('equality', () => {
    it('treats identical origins as equal', () => {
      expect(same('https://shop.test', 'https://shop.test')).toBe(true);
    });

    it('distinguishes schemes', () => {
      expect(same('http://shop.test', 'https://shop.test')).toBe(false);
    });

    it('ignores casing of scheme and host', () => {
      expect(same('HTTPS://Shop.Test', 'https://shop.test')).toBe(true);
      expect(same('hTTp://API.shop.TEST', 'Http://api.Shop.test')).toBe(true);
    });

    it('treats an explicit default port as the default', () => {
      expect(same('http://shop.test', 'http://shop.test:80')).toBe(true);
      expect(same('https://shop.test:443', 'https://shop.test')).toBe(true);
    });

    it('distinguishes non-default ports', () => {
      expect(same('http://shop.test', 'http://shop.test:3000')).toBe(false);
      expect(same('https://shop.test:8443', 'https://shop.test')).toBe(false);
    });

    it('ignores path, query, trailing slash and userinfo', () => {
      expect(same('https://shop.test', 'https://shop.test/cart/items')).toBe(true);
      expect(same('https://shop.test', 'https://shop.test/')).toBe(true);
      expect(same('https://shop.test', 'https://shop.test/?page=2#top')).toBe(true);
      expect(same('https://shop.test', 'HTTPS://alice:pw@SHOP.test:443/cart')).toBe(true);
    });

    it('distinguishes subdomains', () => {
      expect(same('https://shop.test', 'https://api.shop.test')).toBe(false);
    });

    it('compares internationalized hosts by their punycode form', () => {
      expect(same('https://bücher.test', 'HTTPS://BÜCHER.test:443/katalog')).toBe(true);
    });

    it('uses the normalized key for set membership', () => {
      const keys = new Set([Origin.parse('http://shop.test').key]);
      expect(keys.has(Origin.parse('HTTP://SHOP.TEST:80').key)).toBe(true);
    });
  });

  describe('parse', () => {
    it('exposes scheme, host and port', () => {
      expect(Origin.parse('myapp://box:7000').triple).toEqual({
        scheme: 'myapp',
        host: 'box',
        port: 7000,
      });
    });

    it('fills in the default port', () => {
      expect(Origin.parse('ftp://files.test').triple?.port).toBe(21);
      expect(Origin.parse('wss://live.test').triple?.port).toBe(443);
    });

    it('punycodes internationalized hosts', () => {
      expect(Origin.parse('https://Bücher.example').triple?.host).toBe('xn--bcher-kva.example');
    });

    it('rejects strings that are not URLs', () => {
      expect(() => Origin.parse('no-scheme[]')).toThrow(
        new OriginParseError("Could not be parsed as URL: 'no-scheme[]'")
      );
    });

    it('rejects relative URLs', () => {
      expect(() => Origin.parse('/static/app.js')).toThrow(
        "Could not be parsed as URL: '/static/app.js'"
      );
    });

    it('rejects URLs without a host', () => {
      expect(() => Origin.parse('data:text/plain,hello')).toThrow(
        "No host in URL 'data:text/plain,hello'"
      );
    });

    it('rejects schemes without a default port when none is given', () => {
      expect(() => Origin.parse('custom://shop.test')).toThrow("Unsupported URL scheme 'custom'");
    });

    it('rejects the null origin', () => {
      expect(() => Origin.parse('null')).toThrow(OriginParseError);
    });
  });

  describe('parseAllowNull', () => {
    it('maps "null" to the null origin', () => {
      const origin = Origin.parseAllowNull('null');
      expect(origin).toBe(Origin.NULL);
      expect(origin.isNull).toBe(true);
      expect(origin.triple).toBeNull();
    });

    it('parses regular origins', () => {
      expect(Origin.parseAllowNull('http://shop.test').triple).toEqual({
        scheme: 'http',
        host: 'shop.test',
        port: 80,
      });
    });
  });

  describe('tryParse', () => {
    it('returns undefined for unparseable values', () => {
      expect(Origin.tryParse('not an origin')).toBeUndefined();
    });

    it('accepts the null origin', () => {
      expect(Origin.tryParse('null')).toBe(Origin.NULL);
    });
  });

  describe('toString', () => {
    it('omits the default port', () => {
      expect(Origin.parse('HTTPS://Shop.Test:443/path').toString()).toBe('https://shop.test');
    });

    it('keeps a non-default port', () => {
      expect(Origin.parse('http://shop.test:8080').toString()).toBe('http://shop.test:8080');
    });

    it('serializes the null origin', () => {
      expect(Origin.NULL.toString()).toBe('null');
      expect(Origin.NULL.key).toBe('null');
    });
  });
});
