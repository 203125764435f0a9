import { Hash } from "effect";

/**
 * The equals/hash/snapshot triple a change tracker uses to decide whether a
 * tracked value has been mutated since its last snapshot.
 *
 * `hash` must agree with `equals`: values that compare equal hash identically.
 */
export interface ValueComparer<A> {
	readonly equals: (self: A, that: A) => boolean;
	readonly hash: (value: A) => number;
	readonly snapshot: (value: A | null) => A | null;
}

/**
 * A single-dimensional array value. Elements may be null.
 */
export type Sequence<E> = ReadonlyArray<E | null>;

const NULL_HASH = Hash.string("null");

/**
 * Lifts a comparer over non-null values into one that handles null itself:
 * two nulls are equal, a null and a value are not, `snapshot(null)` is null.
 * Snapshot defaults to identity for immutable values.
 *
 * @example
 * const dateComparer = makeValueComparer<Date>({
 *   equals: (a, b) => a.getTime() === b.getTime(),
 *   hash: (d) => Hash.number(d.getTime()),
 *   snapshot: (d) => new Date(d.getTime()),
 * })
 */
export const makeValueComparer = <A>(options: {
	readonly equals: (self: A, that: A) => boolean;
	readonly hash: (value: A) => number;
	readonly snapshot?: (value: A) => A;
}): ValueComparer<A | null> => {
	const copy = options.snapshot;
	return {
		equals: (self, that) => {
			if (self === null || that === null) {
				return self === that;
			}
			return options.equals(self, that);
		},
		hash: (value) => (value === null ? NULL_HASH : options.hash(value)),
		snapshot: (value) => {
			if (value === null) {
				return null;
			}
			return copy === undefined ? value : copy(value);
		},
	};
};
