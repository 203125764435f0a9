import { Data, Effect } from "effect";
import { ValidationError } from "../errors/index.js";

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Exact decimal number kept as its text, scale included: `1.50` stays `1.50`.
 *
 * Native equality (from `Data.Class`) is textual, so `1.50` and `1.5` are not
 * `Equal`; `normalized()` gives the scale-insensitive form.
 */
export class Decimal extends Data.Class<{ readonly text: string }> {
	static parse(text: string): Effect.Effect<Decimal, ValidationError> {
		if (!DECIMAL_PATTERN.test(text)) {
			return Effect.fail(
				new ValidationError({
					message: `Invalid decimal '${text}'`,
					issues: [{ field: "text", message: "expected digits with an optional fraction" }],
				}),
			);
		}
		return Effect.succeed(new Decimal({ text }));
	}

	/** Strips trailing fractional zeros and leading integer zeros; `-0` becomes `0`. */
	normalized(): string {
		const negative = this.text.startsWith("-");
		const unsigned = negative ? this.text.slice(1) : this.text;
		const [integerPart = "0", fraction = ""] = unsigned.split(".");
		const integer = integerPart.replace(/^0+(?=\d)/, "");
		const trimmedFraction = fraction.replace(/0+$/, "");
		const body =
			trimmedFraction.length > 0 ? `${integer}.${trimmedFraction}` : integer;
		return negative && body !== "0" ? `-${body}` : body;
	}

	toString(): string {
		return this.text;
	}
}
