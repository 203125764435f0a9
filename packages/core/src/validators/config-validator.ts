/**
 * Effect Schema decode wrappers that map ParseError to ValidationError.
 */

import { Effect, ParseResult, Schema } from "effect";
import { ValidationError } from "../errors/index.js";
import {
	type ArrayMappingOptions,
	ArrayMappingOptionsSchema,
	type MappingFacets,
	MappingFacetsSchema,
} from "../types/mapping-config-types.js";

/**
 * Decode unknown data through an Effect Schema.
 * Maps Schema ParseError to ValidationError.
 */
export const validateConfig = <A, I>(
	schema: Schema.Schema<A, I>,
	data: unknown,
): Effect.Effect<A, ValidationError> =>
	Schema.decodeUnknown(schema)(data).pipe(
		Effect.mapError((parseError) => parseErrorToValidationError(parseError)),
	);

export const validateArrayMappingOptions = (
	data: unknown,
): Effect.Effect<ArrayMappingOptions, ValidationError> =>
	validateConfig(ArrayMappingOptionsSchema, data);

export const validateFacets = (
	data: unknown,
): Effect.Effect<MappingFacets, ValidationError> =>
	validateConfig(MappingFacetsSchema, data);

/**
 * Convert an Effect Schema ParseError into our ValidationError,
 * extracting structured issue details via ArrayFormatter.
 */
const parseErrorToValidationError = (
	parseError: ParseResult.ParseError,
): ValidationError => {
	const arrayIssues = ParseResult.ArrayFormatter.formatErrorSync(parseError);
	const message = ParseResult.TreeFormatter.formatErrorSync(parseError);

	return new ValidationError({
		message,
		issues: arrayIssues.map((issue) => ({
			field: issue.path.map(String).join(".") || "(root)",
			message: issue.message,
		})),
	});
};
