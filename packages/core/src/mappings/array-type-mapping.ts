/**
 * Type mapping for PostgreSQL single-dimensional array columns.
 *
 * An array mapping is built over a fully resolved element mapping: its store
 * type is the element's with `[]` appended, its literals reuse the element's
 * renderer, and its comparer is selected once from the element's
 * capabilities and shared by every clone.
 */

import { Effect, Option } from "effect";
import { type ArrayComparer, makeArrayComparer } from "../comparers/array-comparer.js";
import { selectComparerStrategy } from "../comparers/select-strategy.js";
import { UnsupportedRankError, UnsupportedShapeError } from "../errors/index.js";
import type { ValidationError } from "../errors/index.js";
import { type ArrayType, arrayOf } from "../types/element-type.js";
import type {
	ArrayMappingOptions,
	MappingFacets,
} from "../types/mapping-config-types.js";
import type { Sequence } from "../types/value-comparer.js";
import {
	validateArrayMappingOptions,
	validateFacets,
} from "../validators/config-validator.js";
import type { ElementMapping } from "./element-mapping.js";

// ============================================================================
// Types
// ============================================================================

export interface ArrayTypeMapping<E> {
	readonly _tag: "ArrayTypeMapping";
	readonly storeType: string;
	readonly elementMapping: ElementMapping<E>;
	readonly arrayType: ArrayType<E>;
	readonly facets: MappingFacets;
	/** None when the array type's rank is not 1. */
	readonly comparer: Option.Option<ArrayComparer<E>>;
	readonly renderLiteral: (
		value: Sequence<E> | null,
	) => Effect.Effect<string, UnsupportedRankError>;
	/**
	 * Clones the mapping with merged column facets. The element mapping, store
	 * type and comparer object are carried over unchanged.
	 */
	readonly withFacets: (
		facets: MappingFacets,
	) => Effect.Effect<ArrayTypeMapping<E>, ValidationError>;
}

const rankError = (rank: number, message: string): UnsupportedRankError =>
	new UnsupportedRankError({ rank, message });

// ============================================================================
// Literal rendering
// ============================================================================

const renderArrayLiteral = <E>(
	elementMapping: ElementMapping<E>,
	value: Sequence<E>,
): string => {
	const elements = value.map((element) =>
		elementMapping.renderLiteral(element ?? null),
	);
	return `ARRAY[${elements.join(",")}]::${elementMapping.storeType}[]`;
};

// ============================================================================
// Construction
// ============================================================================

const build = <E>(
	storeType: string,
	elementMapping: ElementMapping<E>,
	arrayType: ArrayType<E>,
	facets: MappingFacets,
	comparer: Option.Option<ArrayComparer<E>>,
): ArrayTypeMapping<E> => ({
	_tag: "ArrayTypeMapping",
	storeType,
	elementMapping,
	arrayType,
	facets,
	comparer,
	renderLiteral: (value) => {
		if (arrayType.rank !== 1) {
			return Effect.fail(
				rankError(
					arrayType.rank,
					"array literals for rank > 1 are not supported",
				),
			);
		}
		if (value === null) {
			return Effect.succeed("NULL");
		}
		return Effect.sync(() => renderArrayLiteral(elementMapping, value));
	},
	withFacets: (next) =>
		validateFacets(next).pipe(
			Effect.map((valid) =>
				build(storeType, elementMapping, arrayType, { ...facets, ...valid }, comparer),
			),
		),
});

const checkShape = <E>(
	elementMapping: ElementMapping<E>,
	arrayType: ArrayType<E>,
): Effect.Effect<void, UnsupportedShapeError> => {
	if (arrayType.element.name !== elementMapping.elementType.name) {
		return Effect.fail(
			new UnsupportedShapeError({
				expected: elementMapping.elementType.name,
				received: arrayType.element.name,
				message: `Array type '${arrayType.name}' does not hold elements of '${elementMapping.elementType.name}' (store type '${elementMapping.storeType}')`,
			}),
		);
	}
	if (elementMapping.storeType.endsWith("[]")) {
		return Effect.fail(
			new UnsupportedShapeError({
				expected: "scalar element store type",
				received: elementMapping.storeType,
				message: `Element store type '${elementMapping.storeType}' is already an array; nested arrays are not supported`,
			}),
		);
	}
	return Effect.void;
};

/**
 * Builds the array mapping over `elementMapping`.
 *
 * `arrayType` defaults to the rank-1 array of the element mapping's type.
 * A rank other than 1 is accepted but leaves the mapping without a comparer.
 * Options are decoded through `ArrayMappingOptionsSchema`.
 *
 * @example
 * const mapping = yield* makeArrayTypeMapping(integerMapping)
 * mapping.storeType // "integer[]"
 * yield* mapping.renderLiteral([1, 2, 3]) // "ARRAY[1,2,3]::integer[]"
 */
export const makeArrayTypeMapping = <E>(
	elementMapping: ElementMapping<E>,
	arrayType: ArrayType<E> = arrayOf(elementMapping.elementType),
	options?: ArrayMappingOptions,
): Effect.Effect<
	ArrayTypeMapping<E>,
	UnsupportedShapeError | ValidationError
> =>
	Effect.gen(function* () {
		const config = yield* validateArrayMappingOptions(options ?? {});
		yield* checkShape(elementMapping, arrayType);

		const storeType = config.storeType ?? `${elementMapping.storeType}[]`;
		const strategy = selectComparerStrategy(elementMapping, arrayType);

		if (Option.isNone(strategy)) {
			yield* Effect.logWarning(
				"Multi-dimensional array mapped without a comparer",
			).pipe(Effect.annotateLogs({ storeType, rank: arrayType.rank }));
		} else {
			yield* Effect.logDebug("Bound array comparer").pipe(
				Effect.annotateLogs({ storeType, strategy: strategy.value._tag }),
			);
		}

		return build(
			storeType,
			elementMapping,
			arrayType,
			config.facets ?? {},
			Option.map(strategy, makeArrayComparer),
		);
	});

/**
 * The mapping's comparer, or UnsupportedRankError when the mapping has none.
 */
export const requireComparer = <E>(
	mapping: ArrayTypeMapping<E>,
): Effect.Effect<ArrayComparer<E>, UnsupportedRankError> =>
	Option.match(mapping.comparer, {
		onNone: () =>
			Effect.fail(
				rankError(
					mapping.arrayType.rank,
					`Arrays of rank ${mapping.arrayType.rank} ('${mapping.storeType}') have no value comparer`,
				),
			),
		onSome: (comparer) => Effect.succeed(comparer),
	});
