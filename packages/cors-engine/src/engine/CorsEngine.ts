/**
 * CORS Engine
 *
 * Binds classification, preflight handling and response decoration behind the
 * two hook points any host framework can offer:
 *
 * - intercept(): before dispatch. Preflights are answered here and never reach
 *   the handler.
 * - finalize(): after dispatch. Adds CORS headers to the handler's response.
 *
 * around() combines both for handlers shaped as `(request) => Promise<response>`.
 *
 * The engine holds no per-request state; one instance serves every request.
 */

import { createLogger } from '@corsguard/common-types';
import { OriginMatcher } from '../origin/OriginMatcher.js';
import { CorsPolicy } from '../policy/CorsPolicy.js';
import type { HeaderLookup, MutableHeaders } from '../utils/HeaderMap.js';
import type { CorsDecision, CorsResponse } from './CorsDecision.js';
import { respondToPreflight } from './PreflightResponder.js';
import {
  classifyRequest,
  CorsRequestKind,
  type ActualCorsRequest,
  type ClassifiedRequest,
  type NotCorsRequest,
  type PreflightRequest,
} from './RequestClassifier.js';
import { decorateResponse } from './ResponseDecorator.js';

const logger = createLogger('CorsEngine');

export type InterceptResult =
  | {
      readonly action: 'respond';
      readonly request: PreflightRequest;
      readonly decision: CorsDecision;
      readonly response: CorsResponse;
    }
  | {
      readonly action: 'continue';
      readonly request: ActualCorsRequest | NotCorsRequest;
    };

export interface HttpRequest {
  readonly method: string;
  readonly headers: HeaderLookup;
}

export interface HttpResponse {
  readonly status: number;
  readonly headers: MutableHeaders;
  readonly body: unknown;
}

export type HttpHandler<Req extends HttpRequest = HttpRequest> = (
  request: Req
) => Promise<HttpResponse>;

export class CorsEngine {
  private readonly matcher: OriginMatcher;

  constructor(readonly policy: CorsPolicy = CorsPolicy.permissive()) {
    this.matcher = new OriginMatcher(policy);
  }

  classify(method: string, headers: HeaderLookup): ClassifiedRequest {
    return classifyRequest(method, headers);
  }

  /**
   * Before-dispatch hook
   */
  intercept(method: string, headers: HeaderLookup): InterceptResult {
    const request = this.classify(method, headers);
    if (request.kind !== CorsRequestKind.Preflight) {
      return { action: 'continue', request };
    }

    const { decision, response } = respondToPreflight(request, this.policy, this.matcher);
    if (!decision.authorized) {
      logger.info(
        {
          origin: request.origin,
          reason: decision.reason,
          requestedMethod: request.requestedMethod,
          requestedHeaders: request.requestedHeaders,
        },
        `[CorsEngine] ${decision.message}`
      );
    }

    return { action: 'respond', request, decision, response };
  }

  /**
   * After-dispatch hook. Returns undefined for requests that are not actual
   * cross-origin requests, which are left alone.
   */
  finalize(request: ClassifiedRequest, responseHeaders: MutableHeaders): CorsDecision | undefined {
    if (request.kind !== CorsRequestKind.ActualCrossOrigin) {
      return undefined;
    }

    const decision = decorateResponse(request, responseHeaders, this.policy, this.matcher);
    if (!decision.authorized) {
      logger.debug(
        { origin: request.origin, reason: decision.reason },
        '[CorsEngine] Withholding CORS headers from cross-origin response'
      );
    }
    return decision;
  }

  /**
   * Wrap a handler so preflights are answered without calling it and actual
   * cross-origin responses are decorated after it returns
   */
  around<Req extends HttpRequest>(handler: HttpHandler<Req>): HttpHandler<Req> {
    return async (request: Req): Promise<HttpResponse> => {
      const result = this.intercept(request.method, request.headers);
      if (result.action === 'respond') {
        return result.response;
      }

      const response = await handler(request);
      this.finalize(result.request, response.headers);
      return response;
    };
  }
}
