import { Context, Effect, Layer, Ref } from "effect";
import type { UnsupportedShapeError, ValidationError } from "../errors/index.js";
import {
	type ArrayTypeMapping,
	makeArrayTypeMapping,
} from "../mappings/array-type-mapping.js";
import type { ElementMapping } from "../mappings/element-mapping.js";
import { type ArrayType, arrayOf } from "../types/element-type.js";
import type {
	ArrayMappingOptions,
	MappingFacets,
} from "../types/mapping-config-types.js";

// ============================================================================
// ArrayMappingCache Effect Service
// ============================================================================

export interface ArrayMappingCacheShape {
	/**
	 * Returns the cached mapping for the (element mapping, array type, options)
	 * key, building and caching it on a miss. Two fibers missing on the same
	 * key may both build; either result is kept.
	 */
	readonly getOrCreate: <E>(
		elementMapping: ElementMapping<E>,
		arrayType?: ArrayType<E>,
		options?: ArrayMappingOptions,
	) => Effect.Effect<ArrayTypeMapping<E>, UnsupportedShapeError | ValidationError>;
	readonly size: Effect.Effect<number>;
}

export class ArrayMappingCache extends Context.Tag("ArrayMappingCache")<
	ArrayMappingCache,
	ArrayMappingCacheShape
>() {}

// Facets sorted by name
const facetsKey = (facets: MappingFacets): string =>
	Object.entries(facets)
		.filter(([, value]) => value !== undefined)
		.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
		.map(([name, value]) => `${name}=${String(value)}`)
		.join(",");

const cacheKey = <E>(
	elementMapping: ElementMapping<E>,
	arrayType: ArrayType<E>,
	options: ArrayMappingOptions | undefined,
): string =>
	[
		elementMapping.storeType,
		arrayType.name,
		options?.storeType ?? "",
		facetsKey(options?.facets ?? {}),
	].join("|");

/**
 * A cached entry belongs to the caller only if it was built over the very
 * same element mapping.
 */
const isMappingOver =
	<E>(elementMapping: ElementMapping<E>) =>
	(u: unknown): u is ArrayTypeMapping<E> =>
		typeof u === "object" &&
		u !== null &&
		"_tag" in u &&
		u._tag === "ArrayTypeMapping" &&
		"elementMapping" in u &&
		u.elementMapping === elementMapping;

export const makeArrayMappingCache: Effect.Effect<ArrayMappingCacheShape> =
	Effect.gen(function* () {
		const entries = yield* Ref.make<ReadonlyMap<string, unknown>>(new Map());

		const getOrCreate = <E>(
			elementMapping: ElementMapping<E>,
			arrayType: ArrayType<E> = arrayOf(elementMapping.elementType),
			options?: ArrayMappingOptions,
		): Effect.Effect<
			ArrayTypeMapping<E>,
			UnsupportedShapeError | ValidationError
		> =>
			Effect.gen(function* () {
				const key = cacheKey(elementMapping, arrayType, options);
				const cached = (yield* Ref.get(entries)).get(key);
				if (isMappingOver(elementMapping)(cached)) {
					return cached;
				}

				const mapping = yield* makeArrayTypeMapping(
					elementMapping,
					arrayType,
					options,
				);
				yield* Ref.update(entries, (map) => new Map(map).set(key, mapping));
				yield* Effect.logDebug("Cached array mapping").pipe(
					Effect.annotateLogs({ key }),
				);
				return mapping;
			});

		return {
			getOrCreate,
			size: Ref.get(entries).pipe(Effect.map((map) => map.size)),
		};
	});

export const ArrayMappingCacheLive: Layer.Layer<ArrayMappingCache> =
	Layer.effect(ArrayMappingCache, makeArrayMappingCache);
