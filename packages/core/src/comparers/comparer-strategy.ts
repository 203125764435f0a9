import type { Equivalence } from "effect";
import type { ValueComparer } from "../types/value-comparer.js";

// ============================================================================
// Comparer Strategies
// ============================================================================

/**
 * The element mapping supplies its own comparer; arrays forward every
 * element to it, null handling included.
 */
export interface Delegating<E> {
	readonly _tag: "Delegating";
	readonly elementComparer: ValueComparer<E | null>;
}

/**
 * The element type has a native typed equality.
 */
export interface SelfEquatable<E> {
	readonly _tag: "SelfEquatable";
	readonly equivalence: Equivalence.Equivalence<E>;
	readonly hash: (value: E) => number;
}

/**
 * Neither of the above: elements compare with the universal `Equal.equals`.
 */
export interface FallbackEquals {
	readonly _tag: "FallbackEquals";
}

export type ComparerStrategy<E> =
	| Delegating<E>
	| SelfEquatable<E>
	| FallbackEquals;

export type ComparerStrategyTag = ComparerStrategy<unknown>["_tag"];

export const delegating = <E>(
	elementComparer: ValueComparer<E | null>,
): ComparerStrategy<E> => ({ _tag: "Delegating", elementComparer });

export const selfEquatable = <E>(
	equivalence: Equivalence.Equivalence<E>,
	hash: (value: E) => number,
): ComparerStrategy<E> => ({ _tag: "SelfEquatable", equivalence, hash });

export const fallbackEquals: FallbackEquals = { _tag: "FallbackEquals" };
