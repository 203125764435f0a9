// ============================================================================
// Mapping Errors (re-exported from mapping-errors.ts)
// ============================================================================

export type { MappingError } from "./mapping-errors.js";
export {
	UnsupportedRankError,
	UnsupportedShapeError,
	ValidationError,
} from "./mapping-errors.js";
