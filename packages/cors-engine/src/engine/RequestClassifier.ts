/**
 * Request Classifier
 *
 * Sorts an inbound request into preflight, actual cross-origin, or not CORS
 * relevant, based only on its method and headers.
 */

import { splitCommaList } from '@corsguard/common-types';
import { CorsHeader } from '../constants/index.js';
import type { HeaderLookup } from '../utils/HeaderMap.js';
import { TokenSet } from '../utils/TokenSet.js';

export enum CorsRequestKind {
  Preflight = 'preflight',
  ActualCrossOrigin = 'actual_cross_origin',
  NotCorsRelevant = 'not_cors_relevant',
}

export interface PreflightRequest {
  readonly kind: CorsRequestKind.Preflight;
  /** Raw `Origin` header value, trimmed */
  readonly origin: string;
  /** `Access-Control-Request-Method` as sent */
  readonly requestedMethod: string;
  /** `Access-Control-Request-Headers` entries, in request order without duplicates */
  readonly requestedHeaders: readonly string[];
}

export interface ActualCorsRequest {
  readonly kind: CorsRequestKind.ActualCrossOrigin;
  readonly origin: string;
}

export interface NotCorsRequest {
  readonly kind: CorsRequestKind.NotCorsRelevant;
}

export type ClassifiedRequest = PreflightRequest | ActualCorsRequest | NotCorsRequest;

const NOT_CORS_RELEVANT: NotCorsRequest = { kind: CorsRequestKind.NotCorsRelevant };

/**
 * Classify a request.
 *
 * 1. No `Origin` → not CORS relevant.
 * 2. `OPTIONS` with `Access-Control-Request-Method` → preflight.
 * 3. Anything else with an `Origin` → actual cross-origin request. This
 *    includes a plain `OPTIONS` call that carries no requested method.
 */
export function classifyRequest(method: string, headers: HeaderLookup): ClassifiedRequest {
  const origin = nonBlank(headers.get(CorsHeader.Origin));
  if (origin === undefined) {
    return NOT_CORS_RELEVANT;
  }

  const requestedMethod = nonBlank(headers.get(CorsHeader.RequestMethod));
  if (method.toUpperCase() === 'OPTIONS' && requestedMethod !== undefined) {
    const requestedHeaders = headers.get(CorsHeader.RequestHeaders);
    return {
      kind: CorsRequestKind.Preflight,
      origin,
      requestedMethod,
      requestedHeaders:
        requestedHeaders === undefined ? [] : TokenSet.of(splitCommaList(requestedHeaders)).toArray(),
    };
  }

  return { kind: CorsRequestKind.ActualCrossOrigin, origin };
}

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed === undefined || trimmed === '' ? undefined : trimmed;
}
