/**
 * CORS Policy
 *
 * Immutable description of the cross-origin behavior a service allows.
 * Built once at startup, validated on construction and shared by reference
 * across every request afterwards.
 */

import { z } from 'zod';
import { CORS_WILDCARD, PREFLIGHT_STATUS, STANDARD_METHODS } from '../constants/index.js';
import { TokenSet } from '../utils/TokenSet.js';
import { AllowedOrigins, type OriginRule } from './AllowedOrigins.js';
import { CorsConfigError } from './CorsConfigError.js';

/** RFC 7230 `token` */
const HTTP_TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

const tokenSchema = z.string().trim().regex(HTTP_TOKEN, 'Must be a valid HTTP token');

/**
 * Validation schema for everything except the origin rule, which is
 * validated by the AllowedOrigins helpers that build it
 */
const policyOptionsSchema = z.object({
  allowedMethods: z
    .array(tokenSchema.refine(method => method !== CORS_WILDCARD, 'List methods explicitly'))
    .default([...STANDARD_METHODS]),
  allowedHeaders: z.union([z.literal(CORS_WILDCARD), z.array(tokenSchema)]).default(CORS_WILDCARD),
  exposedHeaders: z.array(tokenSchema).default([]),
  allowCredentials: z.boolean().default(false),
  maxAge: z.number().int().nonnegative().optional(),
  preflightStatus: z.number().int().min(200).max(299).default(PREFLIGHT_STATUS.AUTHORIZED),
});

export interface CorsPolicyOptions {
  /** Defaults to AllowedOrigins.any() */
  allowedOrigins?: OriginRule;
  /** Defaults to every standard method */
  allowedMethods?: readonly string[];
  /** `*` (the default) places no restriction on requested headers */
  allowedHeaders?: typeof CORS_WILDCARD | readonly string[];
  exposedHeaders?: readonly string[];
  allowCredentials?: boolean;
  /** Seconds a browser may cache a preflight result */
  maxAge?: number;
  /** Status of an authorized preflight response (2xx, default 200) */
  preflightStatus?: number;
}

export type HeaderRule =
  | { readonly kind: 'any' }
  | { readonly kind: 'list'; readonly names: TokenSet };

interface CorsPolicyFields {
  allowedOrigins: OriginRule;
  allowedMethods: TokenSet;
  allowedHeaders: HeaderRule;
  exposedHeaders: readonly string[];
  allowCredentials: boolean;
  maxAge: number | undefined;
  preflightStatus: number;
}

export class CorsPolicy {
  readonly allowedOrigins: OriginRule;
  /** Upper-cased method tokens */
  readonly allowedMethods: TokenSet;
  readonly allowedHeaders: HeaderRule;
  readonly exposedHeaders: readonly string[];
  readonly allowCredentials: boolean;
  readonly maxAge: number | undefined;
  readonly preflightStatus: number;

  private constructor(fields: CorsPolicyFields) {
    this.allowedOrigins = fields.allowedOrigins;
    this.allowedMethods = fields.allowedMethods;
    this.allowedHeaders = fields.allowedHeaders;
    this.exposedHeaders = fields.exposedHeaders;
    this.allowCredentials = fields.allowCredentials;
    this.maxAge = fields.maxAge;
    this.preflightStatus = fields.preflightStatus;
    Object.freeze(this);
  }

  /**
   * Validate options and build a policy
   * @throws CorsConfigError listing every problem found
   */
  static create(options: CorsPolicyOptions = {}): CorsPolicy {
    const parsed = policyOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new CorsConfigError(
        parsed.error.issues.map(issue => `${issue.path.map(String).join('.')}: ${issue.message}`)
      );
    }

    const allowedOrigins = options.allowedOrigins ?? AllowedOrigins.any();
    const { allowedMethods, allowedHeaders, exposedHeaders, allowCredentials, maxAge } =
      parsed.data;

    const issues: string[] = [];
    if (allowCredentials && allowedOrigins.kind === 'any' && allowedOrigins.wildcard === true) {
      issues.push(
        'allowedOrigins: a literal "*" origin cannot be combined with allowCredentials; ' +
          'echo the request origin instead (wildcard: false or unset)'
      );
    }
    if (allowCredentials && exposedHeaders.includes(CORS_WILDCARD)) {
      issues.push('exposedHeaders: "*" cannot be combined with allowCredentials; list headers explicitly');
    }
    if (issues.length > 0) {
      throw new CorsConfigError(issues);
    }

    return new CorsPolicy({
      allowedOrigins,
      allowedMethods: TokenSet.of(allowedMethods, method => method.toUpperCase()),
      allowedHeaders:
        allowedHeaders === CORS_WILDCARD || allowedHeaders.includes(CORS_WILDCARD)
          ? { kind: 'any' }
          : { kind: 'list', names: TokenSet.of(allowedHeaders) },
      exposedHeaders: Object.freeze(TokenSet.of(exposedHeaders).toArray()),
      allowCredentials,
      maxAge,
      preflightStatus: parsed.data.preflightStatus,
    });
  }

  /**
   * Zero-config policy: any origin, every standard method, no header
   * restriction, no credentials. Overrides are validated like create().
   * Enabling credentials on top of it switches the allowed origin from `*`
   * to the echoed request origin.
   */
  static permissive(overrides: CorsPolicyOptions = {}): CorsPolicy {
    return CorsPolicy.create({
      allowedOrigins: AllowedOrigins.any(),
      allowedMethods: STANDARD_METHODS,
      allowedHeaders: CORS_WILDCARD,
      allowCredentials: false,
      ...overrides,
    });
  }

  /**
   * Whether `Access-Control-Allow-Origin` carries the request origin rather than `*`
   */
  get echoesOrigin(): boolean {
    const rule = this.allowedOrigins;
    if (rule.kind !== 'any') {
      return true;
    }
    return rule.wildcard === false || (rule.wildcard === undefined && this.allowCredentials);
  }

  /**
   * Loggable summary
   */
  toJSON(): Record<string, unknown> {
    const rule = this.allowedOrigins;
    return {
      allowedOrigins:
        rule.kind === 'exact' ? rule.origins.map(origin => origin.toString()) : rule.kind,
      allowedMethods: this.allowedMethods.toArray(),
      allowedHeaders:
        this.allowedHeaders.kind === 'list' ? this.allowedHeaders.names.toArray() : CORS_WILDCARD,
      exposedHeaders: this.exposedHeaders,
      allowCredentials: this.allowCredentials,
      maxAge: this.maxAge,
      echoesOrigin: this.echoesOrigin,
    };
  }
}
