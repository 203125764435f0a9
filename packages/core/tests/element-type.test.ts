import { Data, Option } from "effect";
import { describe, expect, it } from "vitest";
import * as ElementType from "../src/types/element-type.js";

class Point extends Data.Class<{ readonly x: number; readonly y: number }> {}

class PlainPoint {
	constructor(
		readonly x: number,
		readonly y: number,
	) {}
}

describe("primitive element types", () => {
	it("int32 recognises integers within range", () => {
		expect(ElementType.int32.is(42)).toBe(true);
		expect(ElementType.int32.is(1.5)).toBe(false);
		expect(ElementType.int32.is(2147483648)).toBe(false);
		expect(ElementType.int32.is("42")).toBe(false);
	});

	it("int16 rejects values outside the smallint range", () => {
		expect(ElementType.int16.is(32767)).toBe(true);
		expect(ElementType.int16.is(32768)).toBe(false);
	});

	it("every primitive carries a native equivalence", () => {
		for (const type of [
			ElementType.int16,
			ElementType.int32,
			ElementType.float64,
			ElementType.string,
			ElementType.boolean,
		]) {
			expect(Option.isSome<unknown>(type.equivalence)).toBe(true);
		}
		expect(Option.isSome(ElementType.bigint64.equivalence)).toBe(true);
	});

	it("string equivalence compares by value", () => {
		const equivalence = Option.getOrThrow(ElementType.string.equivalence);
		expect(equivalence("a", "a")).toBe(true);
		expect(equivalence("a", "b")).toBe(false);
	});
});

describe("fromClass", () => {
	it("gives Equal-implementing classes a native equivalence", () => {
		const type = ElementType.fromClass("point", Point);
		const equivalence = Option.getOrThrow(type.equivalence);

		expect(equivalence(new Point({ x: 1, y: 2 }), new Point({ x: 1, y: 2 }))).toBe(
			true,
		);
		expect(equivalence(new Point({ x: 1, y: 2 }), new Point({ x: 2, y: 1 }))).toBe(
			false,
		);
	});

	it("hashes Equal-implementing instances consistently with their equivalence", () => {
		const type = ElementType.fromClass("point", Point);
		expect(type.hash(new Point({ x: 1, y: 2 }))).toBe(
			type.hash(new Point({ x: 1, y: 2 })),
		);
	});

	it("leaves plain classes without an equivalence", () => {
		expect(Option.isNone(ElementType.fromClass("plain", PlainPoint).equivalence)).toBe(
			true,
		);
		expect(Option.isNone(ElementType.fromClass("date", Date).equivalence)).toBe(true);
	});

	it("recognises instances with instanceof", () => {
		const type = ElementType.fromClass("plain", PlainPoint);
		expect(type.is(new PlainPoint(0, 0))).toBe(true);
		expect(type.is({ x: 0, y: 0 })).toBe(false);
	});
});

describe("opaque", () => {
	it("has no equivalence", () => {
		const type = ElementType.opaque(
			"record",
			(u): u is Record<string, unknown> => typeof u === "object" && u !== null,
		);
		expect(type.name).toBe("record");
		expect(Option.isNone(type.equivalence)).toBe(true);
	});
});

describe("arrayOf", () => {
	it("defaults to rank 1", () => {
		const arrayType = ElementType.arrayOf(ElementType.int32);
		expect(arrayType.rank).toBe(1);
		expect(arrayType.name).toBe("int32[]");
		expect(arrayType.element).toBe(ElementType.int32);
	});

	it("spells higher ranks with commas", () => {
		expect(ElementType.arrayOf(ElementType.int32, 2).name).toBe("int32[,]");
		expect(ElementType.arrayOf(ElementType.string, 3).name).toBe("string[,,]");
	});
});

describe("float64", () => {
	it("treats NaN as equal to itself", () => {
		const equivalence = Option.getOrThrow(ElementType.float64.equivalence);
		expect(equivalence(Number.NaN, Number.NaN)).toBe(true);
		expect(equivalence(0, -0)).toBe(true);
		expect(equivalence(1, Number.NaN)).toBe(false);
	});

	it("hashes NaN consistently", () => {
		expect(ElementType.float64.hash(Number.NaN)).toBe(
			ElementType.float64.hash(Number.NaN),
		);
	});
});
