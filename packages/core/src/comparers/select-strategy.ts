import { Option } from "effect";
import type { ElementMapping } from "../mappings/element-mapping.js";
import type { ArrayType } from "../types/element-type.js";
import {
	type ComparerStrategy,
	delegating,
	fallbackEquals,
	selfEquatable,
} from "./comparer-strategy.js";

/**
 * Picks the comparer strategy for arrays of `arrayType`, first match wins:
 *
 * 1. rank other than 1: None (multi-dimensional arrays are not compared)
 * 2. the element mapping has a comparer: Delegating
 * 3. the element type has a native equivalence: SelfEquatable
 * 4. otherwise: FallbackEquals
 *
 * Runs once per mapping; the returned strategy is never re-evaluated.
 */
export const selectComparerStrategy = <E>(
	elementMapping: ElementMapping<E>,
	arrayType: ArrayType<E>,
): Option.Option<ComparerStrategy<E>> => {
	if (arrayType.rank !== 1) {
		return Option.none();
	}

	if (Option.isSome(elementMapping.comparer)) {
		return Option.some(delegating(elementMapping.comparer.value));
	}

	const element = arrayType.element;
	return Option.some(
		Option.match(element.equivalence, {
			onNone: (): ComparerStrategy<E> => fallbackEquals,
			onSome: (equivalence) => selfEquatable(equivalence, element.hash),
		}),
	);
};
