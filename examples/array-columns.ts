/**
 * Array column mappings: store types, literals and change detection.
 *
 * Builds mappings for `integer[]`, `numeric[]` and `timestamp with time zone[]`
 * columns, renders constant arrays as SQL and uses the bound comparers the
 * way a change tracker would.
 */

import { Effect, Logger, LogLevel, Option } from "effect";
import {
	ArrayMappingCache,
	ArrayMappingCacheLive,
	Decimal,
	ElementType,
	integerMapping,
	numericMapping,
	requireComparer,
	timestamptzMapping,
} from "../packages/core/src/index.js";

const program = Effect.gen(function* () {
	const cache = yield* ArrayMappingCache;

	// integer[] — SelfEquatable
	const scores = yield* cache.getOrCreate(integerMapping);
	console.log(scores.storeType, yield* scores.renderLiteral([90, 75, null]));

	const scoresComparer = yield* requireComparer(scores);
	const tracked = [90, 75, null];
	const original = scoresComparer.snapshot(tracked) ?? [];
	tracked[1] = 80;
	console.log("scores changed:", !scoresComparer.equals(original, tracked));

	// numeric(10,2)[] — Delegating to the numeric comparer
	const prices = yield* cache.getOrCreate(
		yield* numericMapping.withFacets({ precision: 10, scale: 2 }),
	);
	const priceComparer = yield* requireComparer(prices);
	const before = [yield* Decimal.parse("9.90")];
	const after = [yield* Decimal.parse("9.9")];
	console.log(prices.storeType, "changed:", !priceComparer.equals(before, after));

	// timestamp with time zone[] — snapshots are deep copies
	const events = yield* cache.getOrCreate(timestamptzMapping);
	console.log(yield* events.renderLiteral([new Date(Date.UTC(2024, 5, 1))]));

	// integer[,] — mapped, but without a comparer
	const matrix = yield* cache.getOrCreate(
		integerMapping,
		ElementType.arrayOf(ElementType.int32, 2),
	);
	console.log("matrix comparer:", Option.isSome(matrix.comparer));
	console.log("cached mappings:", yield* cache.size);
});

Effect.runPromise(
	program.pipe(
		Effect.provide(ArrayMappingCacheLive),
		Logger.withMinimumLogLevel(LogLevel.Debug),
	),
).catch((error: unknown) => {
	console.error(error);
	process.exitCode = 1;
});
