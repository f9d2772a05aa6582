/**
 * Response Decorator
 *
 * Adds CORS headers to the response of an actual cross-origin request after
 * the downstream handler has produced it. An unauthorized origin leaves the
 * response untouched: the handler has already run, and it is the browser that
 * withholds the response from the calling script.
 */

import { splitCommaList } from '@corsguard/common-types';
import { CorsHeader } from '../constants/index.js';
import type { OriginMatcher } from '../origin/OriginMatcher.js';
import type { CorsPolicy } from '../policy/CorsPolicy.js';
import { HeaderMap, mergeVary, type MutableHeaders } from '../utils/HeaderMap.js';
import { RejectionReason, rejectWith, type CorsDecision } from './CorsDecision.js';
import type { ActualCorsRequest } from './RequestClassifier.js';

export function authorizeActualRequest(
  request: ActualCorsRequest,
  policy: CorsPolicy,
  matcher: OriginMatcher
): CorsDecision {
  if (!matcher.matches(request.origin)) {
    return rejectWith(
      RejectionReason.DisallowedOrigin,
      `Cross-origin request from disallowed origin '${request.origin}'`
    );
  }

  const headers = new HeaderMap();
  headers.set(CorsHeader.AllowOrigin, matcher.allowOriginValue(request.origin));
  if (policy.allowCredentials) {
    headers.set(CorsHeader.AllowCredentials, 'true');
  }
  if (policy.exposedHeaders.length > 0) {
    headers.set(CorsHeader.ExposeHeaders, policy.exposedHeaders.join(', '));
  }
  headers.set(CorsHeader.Vary, CorsHeader.Origin);

  return { authorized: true, headers };
}

/**
 * Write CORS headers onto a response. `Vary` is merged with what the response
 * already carries; every other field is replaced, so applying the same
 * headers twice has the same effect as applying them once.
 */
export function applyCorsHeaders(target: MutableHeaders, corsHeaders: HeaderMap): void {
  for (const [name, value] of corsHeaders) {
    if (name.toLowerCase() === CorsHeader.Vary.toLowerCase()) {
      target.set(CorsHeader.Vary, mergeVary(target.get(CorsHeader.Vary), splitCommaList(value)));
    } else {
      target.set(name, value);
    }
  }
}

export function decorateResponse(
  request: ActualCorsRequest,
  responseHeaders: MutableHeaders,
  policy: CorsPolicy,
  matcher: OriginMatcher
): CorsDecision {
  const decision = authorizeActualRequest(request, policy, matcher);
  if (decision.authorized) {
    applyCorsHeaders(responseHeaders, decision.headers);
  }
  return decision;
}
