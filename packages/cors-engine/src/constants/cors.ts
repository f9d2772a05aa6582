/**
 * CORS Constants
 *
 * Header names, wildcard token and default method list used by the policy engine.
 */

import { StatusCodes } from 'http-status-codes';

/**
 * Header names read from requests and written to responses.
 * Values use canonical casing; lookups are case-insensitive.
 */
export const CorsHeader = {
  Origin: 'Origin',
  Vary: 'Vary',
  RequestMethod: 'Access-Control-Request-Method',
  RequestHeaders: 'Access-Control-Request-Headers',
  AllowOrigin: 'Access-Control-Allow-Origin',
  AllowCredentials: 'Access-Control-Allow-Credentials',
  AllowMethods: 'Access-Control-Allow-Methods',
  AllowHeaders: 'Access-Control-Allow-Headers',
  ExposeHeaders: 'Access-Control-Expose-Headers',
  MaxAge: 'Access-Control-Max-Age',
} as const;

export type CorsHeaderName = (typeof CorsHeader)[keyof typeof CorsHeader];

/** Literal wildcard accepted in origin and header lists */
export const CORS_WILDCARD = '*';

/** Value of the `Origin` header sent by opaque contexts (sandboxed iframes, file: URLs) */
export const NULL_ORIGIN = 'null';

/**
 * Every standard HTTP method, in the order they are advertised in
 * `Access-Control-Allow-Methods`.
 */
export const STANDARD_METHODS = [
  'OPTIONS',
  'GET',
  'POST',
  'PUT',
  'DELETE',
  'HEAD',
  'TRACE',
  'CONNECT',
  'PATCH',
] as const;

/**
 * Status codes used for preflight responses
 */
export const PREFLIGHT_STATUS = {
  /** Default status for an authorized preflight */
  AUTHORIZED: StatusCodes.OK,
  /** Status for a rejected preflight */
  REJECTED: StatusCodes.FORBIDDEN,
} as const;
