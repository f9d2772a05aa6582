/**
 * CORS policy engine
 */

// Constants
export * from './constants/index.js';

// Origins
export { Origin, OriginParseError, type OriginTriple } from './origin/Origin.js';
export { OriginMatcher } from './origin/OriginMatcher.js';

// Policy
export {
  AllowedOrigins,
  type AnyOriginOptions,
  type AnyOriginRule,
  type ExactOriginRule,
  type OriginPredicate,
  type OriginRule,
  type PredicateOriginRule,
} from './policy/AllowedOrigins.js';
export { CorsConfigError } from './policy/CorsConfigError.js';
export { CorsPolicy, type CorsPolicyOptions, type HeaderRule } from './policy/CorsPolicy.js';

// Engine
export {
  RejectionReason,
  type AuthorizedDecision,
  type CorsDecision,
  type CorsResponse,
  type RejectedDecision,
} from './engine/CorsDecision.js';
export {
  classifyRequest,
  CorsRequestKind,
  type ActualCorsRequest,
  type ClassifiedRequest,
  type NotCorsRequest,
  type PreflightRequest,
} from './engine/RequestClassifier.js';
export {
  evaluatePreflight,
  respondToPreflight,
  type PreflightResult,
} from './engine/PreflightResponder.js';
export {
  applyCorsHeaders,
  authorizeActualRequest,
  decorateResponse,
} from './engine/ResponseDecorator.js';
export {
  CorsEngine,
  type HttpHandler,
  type HttpRequest,
  type HttpResponse,
  type InterceptResult,
} from './engine/CorsEngine.js';

// Utilities
export {
  HeaderMap,
  mergeVary,
  type HeaderLookup,
  type HeaderRecord,
  type MutableHeaders,
} from './utils/HeaderMap.js';
export { TokenSet } from './utils/TokenSet.js';
