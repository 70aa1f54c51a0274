/**
 * infiniview/core - Key Navigation Oracle
 * Boundary detection, equivalence and animation-decision helpers shared by
 * the scroller and the pager.
 */

import type {
  AnimationDecider,
  AnimationDecision,
  KeyEquivalence,
  KeyLike,
  KeyOracle,
  MaybeKey,
} from "../types";

// =============================================================================
// Boundaries
// =============================================================================

/** True when the oracle signalled "no more content" */
export const isBoundary = <K extends KeyLike>(
  key: MaybeKey<K>,
): key is null | undefined => key === null || key === undefined;

// =============================================================================
// Equivalence
// =============================================================================

/** Default key equivalence: SameValue, so NaN matches NaN */
export const sameKey = <K extends KeyLike>(a: K, b: K): boolean =>
  Object.is(a, b);

/**
 * Decide how to move from oldKey to newKey.
 * Equivalent keys are never animated; everything else is up to the application.
 */
export const resolveAnimation = <K extends KeyLike>(
  decide: AnimationDecider<K>,
  areEquivalent: KeyEquivalence<K>,
  oldKey: K,
  newKey: K,
): AnimationDecision => {
  const decision = decide(oldKey, newKey);
  if (areEquivalent(oldKey, newKey)) {
    return { animate: false, direction: decision.direction };
  }
  return decision;
};

// =============================================================================
// Integer Range Oracle
// =============================================================================

/** Options for createRangeOracle */
export interface RangeOracleOptions {
  /** Smallest key (inclusive, default: unbounded) */
  min?: number;

  /** Largest key (inclusive, default: unbounded) */
  max?: number;

  /** Distance between two keys (default: 1) */
  step?: number;
}

/**
 * Oracle over integers, optionally bounded on either side.
 *
 * ```ts
 * const tenItems = createRangeOracle({ min: 0, max: 9 });
 * tenItems.next(9); // null
 * ```
 */
export const createRangeOracle = (
  options: RangeOracleOptions = {},
): KeyOracle<number> => {
  const {
    min = Number.NEGATIVE_INFINITY,
    max = Number.POSITIVE_INFINITY,
    step = 1,
  } = options;

  if (!(step > 0)) {
    throw new Error("[infiniview/oracle] step must be a positive number");
  }
  if (min > max) {
    throw new Error("[infiniview/oracle] min cannot be greater than max");
  }

  return {
    next: (key) => (key + step <= max ? key + step : null),
    prev: (key) => (key - step >= min ? key - step : null),
  };
};
