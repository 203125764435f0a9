/**
 * Runtime descriptors for array element types.
 *
 * An ElementType stands in for the element's static type: it names the type,
 * recognises its values and records whether the type carries a native typed
 * equality (an Equivalence) that arrays of it can compare with directly.
 */

import { Equal, Equivalence, Hash, Option, type Predicate } from "effect";

export interface ElementType<E> {
	readonly name: string;
	readonly is: Predicate.Refinement<unknown, E>;
	/** Native typed equality, when the type has one. */
	readonly equivalence: Option.Option<Equivalence.Equivalence<E>>;
	/** Agrees with `equivalence` when present, with `Equal.equals` otherwise. */
	readonly hash: (value: E) => number;
}

/**
 * Descriptor of a homogeneous array type. Only rank 1 is supported for
 * comparison and literal rendering.
 */
export interface ArrayType<E> {
	readonly name: string;
	readonly element: ElementType<E>;
	readonly rank: number;
}

// ============================================================================
// Primitive element types
// ============================================================================

const isIntegerInRange =
	(min: number, max: number) =>
	(u: unknown): u is number =>
		typeof u === "number" && Number.isInteger(u) && u >= min && u <= max;

export const int16: ElementType<number> = {
	name: "int16",
	is: isIntegerInRange(-32768, 32767),
	equivalence: Option.some(Equivalence.number),
	hash: Hash.number,
};

export const int32: ElementType<number> = {
	name: "int32",
	is: isIntegerInRange(-2147483648, 2147483647),
	equivalence: Option.some(Equivalence.number),
	hash: Hash.number,
};

// NaN equals NaN, as it does in PostgreSQL
const floatEquivalence: Equivalence.Equivalence<number> = (self, that) =>
	self === that || (Number.isNaN(self) && Number.isNaN(that));

export const float64: ElementType<number> = {
	name: "float64",
	is: (u): u is number => typeof u === "number",
	equivalence: Option.some(floatEquivalence),
	hash: Hash.number,
};

export const bigint64: ElementType<bigint> = {
	name: "bigint64",
	is: (u): u is bigint => typeof u === "bigint",
	equivalence: Option.some(Equivalence.bigint),
	hash: Hash.hash,
};

export const string: ElementType<string> = {
	name: "string",
	is: (u): u is string => typeof u === "string",
	equivalence: Option.some(Equivalence.string),
	hash: Hash.string,
};

export const boolean: ElementType<boolean> = {
	name: "boolean",
	is: (u): u is boolean => typeof u === "boolean",
	equivalence: Option.some(Equivalence.boolean),
	hash: Hash.hash,
};

// ============================================================================
// Class and opaque element types
// ============================================================================

/**
 * Describes instances of a class. The type gets a native equivalence only when
 * its prototype implements Effect's `Equal` contract (e.g. a `Data.Class`);
 * `Date`, `Uint8Array` and plain classes get none.
 *
 * @example
 * class Point extends Data.Class<{ x: number; y: number }> {}
 * fromClass("point", Point).equivalence // Some(Equal.equivalence())
 * fromClass("date", Date).equivalence   // None
 */
export const fromClass = <E extends object>(
	name: string,
	ctor: abstract new (...args: never[]) => E,
): ElementType<E> => {
	const prototype: unknown = ctor.prototype;
	return {
		name,
		is: (u): u is E => u instanceof ctor,
		equivalence: Equal.isEqual(prototype)
			? Option.some(Equal.equivalence<E>())
			: Option.none(),
		hash: Hash.hash,
	};
};

/**
 * An element type with no native typed equality. Arrays of it compare with
 * the universal `Equal.equals`.
 */
export const opaque = <E>(
	name: string,
	is: Predicate.Refinement<unknown, E>,
): ElementType<E> => ({
	name,
	is,
	equivalence: Option.none(),
	hash: Hash.hash,
});

// ============================================================================
// Array types
// ============================================================================

/**
 * Builds the array type over `element`. The name spells the rank the way the
 * element's own name would be suffixed: `int32[]`, `int32[,]`.
 */
export const arrayOf = <E>(element: ElementType<E>, rank = 1): ArrayType<E> => ({
	name: `${element.name}[${",".repeat(Math.max(rank - 1, 0))}]`,
	element,
	rank,
});
