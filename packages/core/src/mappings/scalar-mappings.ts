/**
 * Built-in PostgreSQL element mappings.
 *
 * Primitive mappings carry no comparer: their element types have a native
 * equivalence. Mappings over mutable or scale-carrying values (Date,
 * Uint8Array, Decimal) bring their own comparer.
 */

import { Hash } from "effect";
import * as ElementType from "../types/element-type.js";
import { makeValueComparer } from "../types/value-comparer.js";
import { Decimal } from "./decimal.js";
import { type ElementMapping, makeElementMapping } from "./element-mapping.js";

// ============================================================================
// Numeric and boolean
// ============================================================================

export const smallintMapping: ElementMapping<number> = makeElementMapping({
	storeTypeBase: "smallint",
	elementType: ElementType.int16,
	renderNonNull: (value) => String(value),
});

export const integerMapping: ElementMapping<number> = makeElementMapping({
	storeTypeBase: "integer",
	elementType: ElementType.int32,
	renderNonNull: (value) => String(value),
});

export const bigintMapping: ElementMapping<bigint> = makeElementMapping({
	storeTypeBase: "bigint",
	elementType: ElementType.bigint64,
	renderNonNull: (value) => value.toString(),
});

const renderDouble = (value: number): string => {
	if (Number.isNaN(value)) {
		return "'NaN'::double precision";
	}
	if (!Number.isFinite(value)) {
		return value > 0
			? "'Infinity'::double precision"
			: "'-Infinity'::double precision";
	}
	return String(value);
};

export const doubleMapping: ElementMapping<number> = makeElementMapping({
	storeTypeBase: "double precision",
	elementType: ElementType.float64,
	renderNonNull: renderDouble,
});

export const booleanMapping: ElementMapping<boolean> = makeElementMapping({
	storeTypeBase: "boolean",
	elementType: ElementType.boolean,
	renderNonNull: (value) => (value ? "TRUE" : "FALSE"),
});

// ============================================================================
// Text
// ============================================================================

export const textMapping: ElementMapping<string> = makeElementMapping({
	storeTypeBase: "text",
	elementType: ElementType.string,
	renderNonNull: (value) => `'${value.replaceAll("'", "''")}'`,
});

// ============================================================================
// Values with their own comparer
// ============================================================================

export const decimalElementType = ElementType.fromClass("decimal", Decimal);

export const numericMapping: ElementMapping<Decimal> = makeElementMapping({
	storeTypeBase: "numeric",
	elementType: decimalElementType,
	renderNonNull: (value) => value.toString(),
	// 1.50 and 1.5 are the same numeric value
	comparer: makeValueComparer<Decimal>({
		equals: (self, that) => self.normalized() === that.normalized(),
		hash: (value) => Hash.string(value.normalized()),
	}),
});

export const dateElementType = ElementType.fromClass("date", Date);

export const timestamptzMapping: ElementMapping<Date> = makeElementMapping({
	storeTypeBase: "timestamp with time zone",
	elementType: dateElementType,
	renderNonNull: (value) => `TIMESTAMPTZ '${value.toISOString()}'`,
	comparer: makeValueComparer<Date>({
		equals: (self, that) => self.getTime() === that.getTime(),
		hash: (value) => Hash.number(value.getTime()),
		snapshot: (value) => new Date(value.getTime()),
	}),
});

export const bytesElementType = ElementType.fromClass<Uint8Array>(
	"bytes",
	Uint8Array,
);

const toHex = (bytes: Uint8Array): string =>
	Array.from(bytes, (byte) => byte.toString(16).padStart(2, "0")).join("");

export const byteaMapping: ElementMapping<Uint8Array> = makeElementMapping({
	storeTypeBase: "bytea",
	elementType: bytesElementType,
	renderNonNull: (value) => `'\\x${toHex(value)}'::bytea`,
	comparer: makeValueComparer<Uint8Array>({
		equals: (self, that) =>
			self.length === that.length &&
			self.every((byte, index) => byte === that[index]),
		hash: (value) => Hash.string(toHex(value)),
		snapshot: (value) => value.slice(),
	}),
});
