import { Effect, Option } from "effect";
import type { ValidationError } from "../errors/index.js";
import type { ElementType } from "../types/element-type.js";
import type { MappingFacets } from "../types/mapping-config-types.js";
import type { ValueComparer } from "../types/value-comparer.js";
import { validateFacets } from "../validators/config-validator.js";

// ============================================================================
// Element Mapping
// ============================================================================

/**
 * Type mapping for one scalar store type: how its values are named in the
 * database, rendered as SQL literals and, optionally, compared.
 */
export interface ElementMapping<E> {
	readonly storeType: string;
	readonly storeTypeBase: string;
	readonly elementType: ElementType<E>;
	readonly facets: MappingFacets;
	/** Custom comparer. When present, arrays of this mapping delegate to it. */
	readonly comparer: Option.Option<ValueComparer<E | null>>;
	/** Renders one value as a SQL literal; null renders `NULL`. */
	readonly renderLiteral: (value: E | null) => string;
	/** Clones with merged facets, decoded as construction decodes them. */
	readonly withFacets: (
		facets: MappingFacets,
	) => Effect.Effect<ElementMapping<E>, ValidationError>;
}

export interface ElementMappingConfig<E> {
	readonly storeTypeBase: string;
	readonly elementType: ElementType<E>;
	readonly renderNonNull: (value: E) => string;
	readonly comparer?: ValueComparer<E | null>;
	readonly facets?: MappingFacets;
}

/**
 * Appends size or precision/scale facets to a store type name:
 * `varchar(20)`, `numeric(10,2)`, `numeric(10)`.
 */
export const formatStoreType = (
	storeTypeBase: string,
	facets: MappingFacets,
): string => {
	if (facets.size !== undefined) {
		return `${storeTypeBase}(${facets.size})`;
	}
	if (facets.precision !== undefined) {
		return facets.scale !== undefined
			? `${storeTypeBase}(${facets.precision},${facets.scale})`
			: `${storeTypeBase}(${facets.precision})`;
	}
	return storeTypeBase;
};

export const makeElementMapping = <E>(
	config: ElementMappingConfig<E>,
): ElementMapping<E> => {
	const facets = config.facets ?? {};
	const comparer: Option.Option<ValueComparer<E | null>> =
		config.comparer === undefined ? Option.none() : Option.some(config.comparer);

	return {
		storeType: formatStoreType(config.storeTypeBase, facets),
		storeTypeBase: config.storeTypeBase,
		elementType: config.elementType,
		facets,
		comparer,
		renderLiteral: (value) =>
			value === null ? "NULL" : config.renderNonNull(value),
		// Same comparer object on every clone
		withFacets: (next) =>
			validateFacets(next).pipe(
				Effect.map((valid) =>
					makeElementMapping({ ...config, facets: { ...facets, ...valid } }),
				),
			),
	};
};
