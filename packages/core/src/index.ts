/**
 * Main entry point for the array mapping library.
 *
 * Exports the element and array type mappings, the comparer strategy
 * selector and its array comparers, typed errors and the mapping cache
 * service.
 */

// ============================================================================
// Element Types and Value Comparers
// ============================================================================

export * as ElementType from "./types/element-type.js";
export type { ArrayType } from "./types/element-type.js";

export { makeValueComparer } from "./types/value-comparer.js";
export type { Sequence, ValueComparer } from "./types/value-comparer.js";

// ============================================================================
// Configuration
// ============================================================================

export {
	ArrayMappingOptionsSchema,
	MappingFacetsSchema,
} from "./types/mapping-config-types.js";

export type {
	ArrayMappingOptions,
	MappingFacets,
} from "./types/mapping-config-types.js";

export {
	validateArrayMappingOptions,
	validateFacets,
} from "./validators/config-validator.js";

// ============================================================================
// Error Types (Effect TaggedError)
// ============================================================================

export {
	UnsupportedRankError,
	UnsupportedShapeError,
	ValidationError,
} from "./errors/index.js";

export type { MappingError } from "./errors/index.js";

// ============================================================================
// Element Mappings
// ============================================================================

export {
	formatStoreType,
	makeElementMapping,
} from "./mappings/element-mapping.js";

export type {
	ElementMapping,
	ElementMappingConfig,
} from "./mappings/element-mapping.js";

export { Decimal } from "./mappings/decimal.js";

export {
	bigintMapping,
	booleanMapping,
	byteaMapping,
	bytesElementType,
	dateElementType,
	decimalElementType,
	doubleMapping,
	integerMapping,
	numericMapping,
	smallintMapping,
	textMapping,
	timestamptzMapping,
} from "./mappings/scalar-mappings.js";

// ============================================================================
// Comparer Strategies
// ============================================================================

export {
	delegating,
	fallbackEquals,
	selfEquatable,
} from "./comparers/comparer-strategy.js";

export type {
	ComparerStrategy,
	ComparerStrategyTag,
	Delegating,
	FallbackEquals,
	SelfEquatable,
} from "./comparers/comparer-strategy.js";

export { selectComparerStrategy } from "./comparers/select-strategy.js";

export { makeArrayComparer } from "./comparers/array-comparer.js";
export type { ArrayComparer } from "./comparers/array-comparer.js";

// ============================================================================
// Array Type Mapping
// ============================================================================

export {
	makeArrayTypeMapping,
	requireComparer,
} from "./mappings/array-type-mapping.js";

export type { ArrayTypeMapping } from "./mappings/array-type-mapping.js";

// ============================================================================
// Mapping Cache Service
// ============================================================================

export {
	ArrayMappingCache,
	ArrayMappingCacheLive,
	makeArrayMappingCache,
} from "./registry/array-mapping-cache.js";

export type { ArrayMappingCacheShape } from "./registry/array-mapping-cache.js";
