/**
 * Origin Matcher
 *
 * Decides whether a request's `Origin` header is allowed by a policy, and what
 * to write back in `Access-Control-Allow-Origin` when it is.
 */

import { CORS_WILDCARD, NULL_ORIGIN } from '../constants/index.js';
import type { CorsPolicy } from '../policy/CorsPolicy.js';
import { Origin } from './Origin.js';

export class OriginMatcher {
  constructor(private readonly policy: CorsPolicy) {}

  /**
   * @param origin - Raw `Origin` header value
   */
  matches(origin: string): boolean {
    const rule = this.policy.allowedOrigins;
    switch (rule.kind) {
      case 'any':
        return rule.allowNull || origin.trim() !== NULL_ORIGIN;
      case 'exact': {
        const parsed = Origin.tryParse(origin);
        return parsed !== undefined && rule.keys.has(parsed.key);
      }
      case 'predicate': {
        const parsed = Origin.tryParse(origin);
        return parsed !== undefined && rule.test(parsed);
      }
    }
  }

  /**
   * Value for `Access-Control-Allow-Origin` once `origin` has matched.
   * Never `*` when the policy allows credentials.
   */
  allowOriginValue(origin: string): string {
    return this.policy.echoesOrigin ? origin : CORS_WILDCARD;
  }
}
