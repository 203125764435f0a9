import { Data } from "effect";

// ============================================================================
// Effect TaggedError Mapping Error Types
// ============================================================================

export class UnsupportedRankError extends Data.TaggedError(
	"UnsupportedRankError",
)<{
	readonly rank: number;
	readonly message: string;
}> {}

export class UnsupportedShapeError extends Data.TaggedError(
	"UnsupportedShapeError",
)<{
	readonly expected: string;
	readonly received: string;
	readonly message: string;
}> {}

export class ValidationError extends Data.TaggedError("ValidationError")<{
	readonly message: string;
	readonly issues: ReadonlyArray<{
		readonly field: string;
		readonly message: string;
	}>;
}> {}

// ============================================================================
// Mapping Error Union
// ============================================================================

export type MappingError =
	| UnsupportedRankError
	| UnsupportedShapeError
	| ValidationError;
