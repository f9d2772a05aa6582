/**
 * CORS Decision Types
 */

import type { HeaderMap } from '../utils/HeaderMap.js';

export enum RejectionReason {
  DisallowedOrigin = 'disallowed_origin',
  DisallowedMethod = 'disallowed_method',
  DisallowedHeaders = 'disallowed_headers',
}

export interface AuthorizedDecision {
  readonly authorized: true;
  /** CORS headers to add to the response */
  readonly headers: HeaderMap;
}

export interface RejectedDecision {
  readonly authorized: false;
  readonly reason: RejectionReason;
  readonly message: string;
}

export type CorsDecision = AuthorizedDecision | RejectedDecision;

/**
 * Terminal response for a short-circuited preflight. The body is always empty.
 */
export interface CorsResponse {
  readonly status: number;
  readonly headers: HeaderMap;
  readonly body: '';
}

export function rejectWith(reason: RejectionReason, message: string): RejectedDecision {
  return { authorized: false, reason, message };
}
