import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import {
	type MappingError,
	UnsupportedRankError,
	UnsupportedShapeError,
	ValidationError,
} from "../src/errors/index.js";

describe("Mapping error creation and _tag discrimination", () => {
	it("UnsupportedRankError has correct _tag and fields", () => {
		const err = new UnsupportedRankError({
			rank: 2,
			message: "array literals for rank > 1 are not supported",
		});
		expect(err._tag).toBe("UnsupportedRankError");
		expect(err.rank).toBe(2);
		expect(err.message).toBe("array literals for rank > 1 are not supported");
	});

	it("UnsupportedShapeError has correct _tag and fields", () => {
		const err = new UnsupportedShapeError({
			expected: "int32",
			received: "string",
			message: "mismatch",
		});
		expect(err._tag).toBe("UnsupportedShapeError");
		expect(err.expected).toBe("int32");
		expect(err.received).toBe("string");
	});

	it("ValidationError has correct _tag and issues", () => {
		const err = new ValidationError({
			message: "invalid options",
			issues: [{ field: "facets.size", message: "expected an integer" }],
		});
		expect(err._tag).toBe("ValidationError");
		expect(err.issues).toHaveLength(1);
		expect(err.issues[0]?.field).toBe("facets.size");
	});

	it("errors are instances of Error", () => {
		const err = new UnsupportedRankError({ rank: 3, message: "nope" });
		expect(err).toBeInstanceOf(Error);
	});
});

describe("Mapping errors in the Effect error channel", () => {
	it("catchTag recovers a specific error from the union", async () => {
		const failing: Effect.Effect<string, MappingError> = Effect.fail(
			new UnsupportedRankError({ rank: 2, message: "rank 2" }),
		);

		const result = await Effect.runPromise(
			failing.pipe(
				Effect.catchTag("UnsupportedRankError", (e) =>
					Effect.succeed(`recovered rank ${e.rank}`),
				),
				Effect.catchTag("UnsupportedShapeError", () =>
					Effect.succeed("shape"),
				),
				Effect.catchTag("ValidationError", () => Effect.succeed("validation")),
			),
		);

		expect(result).toBe("recovered rank 2");
	});

	it("flip exposes the failure for inspection", async () => {
		const err = await Effect.runPromise(
			Effect.flip(
				Effect.fail(
					new UnsupportedShapeError({
						expected: "a",
						received: "b",
						message: "a vs b",
					}),
				),
			),
		);
		expect(err._tag).toBe("UnsupportedShapeError");
	});
});
