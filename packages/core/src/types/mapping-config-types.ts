/**
 * Configuration accepted when constructing or cloning type mappings.
 */

import { Schema } from "effect";

const NonNegativeInt = Schema.Int.pipe(Schema.nonNegative());

/**
 * Column facets. They describe the column a mapping is bound to and never
 * change how values of the mapping compare.
 */
export const MappingFacetsSchema = Schema.Struct({
	size: Schema.optional(NonNegativeInt),
	precision: Schema.optional(NonNegativeInt),
	scale: Schema.optional(NonNegativeInt),
	fixedLength: Schema.optional(Schema.Boolean),
	nullable: Schema.optional(Schema.Boolean),
});

export type MappingFacets = Schema.Schema.Type<typeof MappingFacetsSchema>;

export const ArrayStoreTypeSchema = Schema.String.pipe(
	Schema.filter(
		(name) =>
			name.length > 2 && name.endsWith("[]") && name.indexOf("[]") === name.length - 2,
		{ message: () => "Expected a store type ending in exactly one []" },
	),
);

/**
 * Options for building an array mapping.
 *
 * - `storeType` replaces the derived `<element>[]` store type name. It names a
 *   single-dimensional array: a scalar name followed by exactly one `[]`.
 * - `facets` are recorded on the mapping as given.
 */
export const ArrayMappingOptionsSchema = Schema.Struct({
	storeType: Schema.optional(ArrayStoreTypeSchema),
	facets: Schema.optional(MappingFacetsSchema),
});

export type ArrayMappingOptions = Schema.Schema.Type<
	typeof ArrayMappingOptionsSchema
>;
