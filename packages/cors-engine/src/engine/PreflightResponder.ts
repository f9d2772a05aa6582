/**
 * Preflight Responder
 *
 * Answers a preflight request on its own; the downstream handler never sees
 * it. Authorization is all-or-nothing: a single disallowed method or header
 * voids the whole preflight.
 */

import { CorsHeader, PREFLIGHT_STATUS } from '../constants/index.js';
import type { OriginMatcher } from '../origin/OriginMatcher.js';
import type { CorsPolicy } from '../policy/CorsPolicy.js';
import { HeaderMap } from '../utils/HeaderMap.js';
import {
  RejectionReason,
  rejectWith,
  type CorsDecision,
  type CorsResponse,
} from './CorsDecision.js';
import type { PreflightRequest } from './RequestClassifier.js';

export interface PreflightResult {
  readonly decision: CorsDecision;
  readonly response: CorsResponse;
}

/**
 * Check origin, method and headers, in that order, and build the CORS headers
 * for an authorized preflight.
 *
 * Allowed methods and headers are advertised in full rather than echoing what
 * was requested, so the browser can cache the whole policy for `maxAge`.
 */
export function evaluatePreflight(
  request: PreflightRequest,
  policy: CorsPolicy,
  matcher: OriginMatcher
): CorsDecision {
  if (!matcher.matches(request.origin)) {
    return rejectWith(
      RejectionReason.DisallowedOrigin,
      `Preflight request requesting disallowed origin '${request.origin}'`
    );
  }

  if (!policy.allowedMethods.has(request.requestedMethod)) {
    return rejectWith(
      RejectionReason.DisallowedMethod,
      `Preflight request requesting disallowed method ${request.requestedMethod}`
    );
  }

  const { allowedHeaders } = policy;
  if (allowedHeaders.kind === 'list') {
    const disallowed = allowedHeaders.names.difference(request.requestedHeaders);
    if (disallowed.length > 0) {
      return rejectWith(
        RejectionReason.DisallowedHeaders,
        `Preflight request requesting disallowed header(s) ${disallowed.join(', ')}`
      );
    }
  }

  const headers = new HeaderMap();
  const vary: string[] = [CorsHeader.Origin];

  headers.set(CorsHeader.AllowOrigin, matcher.allowOriginValue(request.origin));
  if (policy.allowCredentials) {
    headers.set(CorsHeader.AllowCredentials, 'true');
  }
  headers.set(CorsHeader.AllowMethods, policy.allowedMethods.join());

  if (allowedHeaders.kind === 'list') {
    if (allowedHeaders.names.size > 0) {
      headers.set(CorsHeader.AllowHeaders, allowedHeaders.names.join());
    }
  } else if (request.requestedHeaders.length > 0) {
    // Unrestricted: reflect the requested headers, never a literal "*"
    headers.set(CorsHeader.AllowHeaders, request.requestedHeaders.join(', '));
    vary.push(CorsHeader.RequestHeaders);
  }

  if (policy.maxAge !== undefined) {
    headers.set(CorsHeader.MaxAge, String(policy.maxAge));
  }
  headers.set(CorsHeader.Vary, vary.join(', '));

  return { authorized: true, headers };
}

/**
 * Build the terminal response for a preflight.
 * Rejections get a 403 with no CORS headers, only `Vary: Origin`.
 */
export function respondToPreflight(
  request: PreflightRequest,
  policy: CorsPolicy,
  matcher: OriginMatcher
): PreflightResult {
  const decision = evaluatePreflight(request, policy, matcher);

  if (decision.authorized) {
    return {
      decision,
      response: { status: policy.preflightStatus, headers: decision.headers, body: '' },
    };
  }

  return {
    decision,
    response: {
      status: PREFLIGHT_STATUS.REJECTED,
      headers: new HeaderMap().set(CorsHeader.Vary, CorsHeader.Origin),
      body: '',
    },
  };
}
