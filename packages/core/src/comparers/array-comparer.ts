import { Equal, Hash } from "effect";
import type { Sequence, ValueComparer } from "../types/value-comparer.js";
import type {
	ComparerStrategy,
	ComparerStrategyTag,
} from "./comparer-strategy.js";

// ============================================================================
// Array Comparer
// ============================================================================

/**
 * Value comparer over single-dimensional arrays, bound to one strategy.
 *
 * Sequences passed in are never mutated. Null sequences are the caller's
 * concern for `equals` and `hash`; `snapshot(null)` is null.
 */
export interface ArrayComparer<E> extends ValueComparer<Sequence<E>> {
	readonly strategy: ComparerStrategyTag;
	readonly snapshot: (value: Sequence<E> | null) => Array<E | null> | null;
}

/**
 * Per-element operations a strategy resolves to. Built once, so the hot path
 * never inspects the strategy again.
 */
interface ElementOps<E> {
	readonly equals: (self: E | null, that: E | null) => boolean;
	readonly hash: (value: E | null) => number;
	readonly snapshot: (value: E | null) => E | null;
}

const NULL_HASH = Hash.string("null");

const identity = <A>(value: A): A => value;

/**
 * Both null: equal. One null: unequal. Otherwise `equals` decides.
 */
const nullAware =
	<E>(equals: (self: E, that: E) => boolean) =>
	(self: E | null, that: E | null): boolean => {
		if (self === null) {
			return that === null;
		}
		if (that === null) {
			return false;
		}
		return equals(self, that);
	};

const elementOps = <E>(strategy: ComparerStrategy<E>): ElementOps<E> => {
	switch (strategy._tag) {
		case "Delegating":
			return {
				equals: strategy.elementComparer.equals,
				hash: strategy.elementComparer.hash,
				snapshot: strategy.elementComparer.snapshot,
			};
		case "SelfEquatable": {
			const { equivalence, hash } = strategy;
			return {
				equals: nullAware(equivalence),
				hash: (value) => (value === null ? NULL_HASH : hash(value)),
				snapshot: identity,
			};
		}
		case "FallbackEquals":
			return {
				equals: nullAware<E>((self, that) => Equal.equals(self, that)),
				hash: (value) => (value === null ? NULL_HASH : Hash.hash(value)),
				snapshot: identity,
			};
	}
};

export const makeArrayComparer = <E>(
	strategy: ComparerStrategy<E>,
): ArrayComparer<E> => {
	const ops = elementOps(strategy);

	return {
		strategy: strategy._tag,

		equals: (self, that) => {
			if (self.length !== that.length) {
				return false;
			}
			for (let i = 0; i < self.length; i++) {
				if (!ops.equals(self[i] ?? null, that[i] ?? null)) {
					return false;
				}
			}
			return true;
		},

		// Folds element hashes in index order, seeded by the length
		hash: (value) => {
			let h = Hash.number(value.length);
			for (const element of value) {
				h = Hash.combine(ops.hash(element ?? null))(h);
			}
			return Hash.optimize(h);
		},

		snapshot: (value) => {
			if (value === null) {
				return null;
			}
			const copy = new Array<E | null>(value.length);
			for (let i = 0; i < value.length; i++) {
				copy[i] = ops.snapshot(value[i] ?? null);
			}
			return copy;
		},
	};
};
