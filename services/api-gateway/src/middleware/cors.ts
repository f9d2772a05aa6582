/**
 * CORS Middleware
 *
 * Express adapter for the CORS engine. Preflights are answered here and end
 * the chain; actual cross-origin responses get their CORS headers right
 * before the handler's headers are written, so they also reach 404 and error
 * responses.
 */

import type { ServerResponse } from 'node:http';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import onHeaders from 'on-headers';
import {
  applyCorsHeaders,
  CorsEngine,
  CorsRequestKind,
  HeaderMap,
  type CorsPolicy,
  type MutableHeaders,
} from '@corsguard/cors-engine';

/**
 * MutableHeaders view over a Node response
 */
export class ExpressResponseHeaders implements MutableHeaders {
  constructor(private readonly res: ServerResponse) {}

  get(name: string): string | undefined {
    const value = this.res.getHeader(name);
    if (value === undefined) {
      return undefined;
    }
    return Array.isArray(value) ? value.join(', ') : String(value);
  }

  set(name: string, value: string): void {
    this.res.setHeader(name, value);
  }
}

/**
 * Create CORS middleware enforcing a policy
 */
export function createCorsMiddleware(policy: CorsPolicy): RequestHandler {
  const engine = new CorsEngine(policy);

  return (req: Request, res: Response, next: NextFunction): void => {
    const result = engine.intercept(req.method, new HeaderMap(req.headers));

    if (result.action === 'respond') {
      applyCorsHeaders(new ExpressResponseHeaders(res), result.response.headers);
      res.status(result.response.status).end();
      return;
    }

    const { request } = result;
    if (request.kind === CorsRequestKind.ActualCrossOrigin) {
      onHeaders(res, () => {
        engine.finalize(request, new ExpressResponseHeaders(res));
      });
    }

    next();
  };
}
