/**
 * Allowed Origin Rules
 *
 * The three shapes an origin rule can take, and helpers to build them.
 */

import { createLogger } from '@corsguard/common-types';
import { CORS_WILDCARD } from '../constants/index.js';
import { Origin, OriginParseError } from '../origin/Origin.js';
import { CorsConfigError } from './CorsConfigError.js';

const logger = createLogger('AllowedOrigins');

export type OriginPredicate = (origin: Origin) => boolean;

export interface AnyOriginOptions {
  /**
   * How `Access-Control-Allow-Origin` is written:
   * - unset: `*`, or the request origin when credentials are allowed
   * - `true`: always the literal `*` (not allowed together with credentials)
   * - `false`: always the request origin
   */
  wildcard?: boolean;
  /** Whether the opaque `null` origin is accepted (default true) */
  allowNull?: boolean;
}

export interface AnyOriginRule {
  readonly kind: 'any';
  readonly wildcard: boolean | undefined;
  readonly allowNull: boolean;
}

export interface ExactOriginRule {
  readonly kind: 'exact';
  readonly origins: readonly Origin[];
  /** Normalized keys of `origins`, for constant-time membership */
  readonly keys: ReadonlySet<string>;
}

export interface PredicateOriginRule {
  readonly kind: 'predicate';
  readonly test: OriginPredicate;
}

export type OriginRule = AnyOriginRule | ExactOriginRule | PredicateOriginRule;

/**
 * Accept every origin
 */
function any(options: AnyOriginOptions = {}): AnyOriginRule {
  const rule: AnyOriginRule = {
    kind: 'any',
    wildcard: options.wildcard,
    allowNull: options.allowNull ?? true,
  };
  return Object.freeze(rule);
}

/**
 * Accept only the listed origins. `"null"` must be listed explicitly to
 * accept the opaque origin.
 * @throws CorsConfigError listing every entry that is not a valid origin
 */
function exact(entries: Iterable<string | Origin>): ExactOriginRule {
  const origins: Origin[] = [];
  const issues: string[] = [];

  for (const entry of entries) {
    if (entry instanceof Origin) {
      origins.push(entry);
      continue;
    }
    try {
      origins.push(Origin.parseAllowNull(entry));
    } catch (error) {
      if (!(error instanceof OriginParseError)) {
        throw error;
      }
      issues.push(`allowedOrigins: ${error.message}`);
    }
  }

  if (issues.length > 0) {
    throw new CorsConfigError(issues);
  }

  const rule: ExactOriginRule = {
    kind: 'exact',
    origins: Object.freeze(origins),
    keys: new Set(origins.map(origin => origin.key)),
  };
  return Object.freeze(rule);
}

/**
 * Accept origins for which `test` returns true. Unparseable origins never
 * reach the predicate.
 */
function predicate(test: OriginPredicate): PredicateOriginRule {
  const rule: PredicateOriginRule = { kind: 'predicate', test };
  return Object.freeze(rule);
}

/**
 * Build a rule from a flat list such as `CORS_ORIGINS`.
 *
 * `['*']` accepts any origin. When `*` is mixed with concrete origins the
 * concrete list wins and the wildcard is dropped.
 */
function fromList(entries: readonly string[]): OriginRule {
  const concrete = entries.filter(entry => entry.trim() !== CORS_WILDCARD);

  if (concrete.length === entries.length) {
    return exact(concrete);
  }
  if (concrete.length === 0) {
    return any();
  }

  logger.warn(
    { origins: concrete },
    '[AllowedOrigins] Ignoring "*" listed alongside explicit origins; only the explicit origins are allowed'
  );
  return exact(concrete);
}

export const AllowedOrigins = {
  any,
  exact,
  predicate,
  fromList,
} as const;
