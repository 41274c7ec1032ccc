/**
 * Integer conversions: `d i u o x X`
 *
 * @module conversions/integer
 */

import { DEFAULT_INT_BITS, LENGTH_BITS } from "../shared/constants.js";
import { ArgumentTypeError } from "../shared/errors.js";
import type {
	ConversionContext,
	FormatValue,
	ResolvedSpec,
} from "../shared/types.js";
import {
	assembleNumber,
	groupThousands,
	signFor,
	zeroExtend,
} from "../shared/utils.js";

const RADIX: Readonly<Record<string, number>> = {
	d: 10,
	i: 10,
	u: 10,
	o: 8,
	x: 16,
	X: 16,
};

/**
 * Renders an integer placeholder
 *
 * @param value - Argument value
 * @param spec - Placeholder with width and precision resolved
 * @param position - 1-based argument position, for error messages
 * @param context - Formatter settings
 * @throws {ArgumentTypeError} If the value is not an integer
 *
 * @example
 * ```typescript
 * renderInteger(7, spec('%02d'), 1, context);   // '07'
 * renderInteger(255, spec('%#x'), 1, context);  // '0xff'
 * ```
 */
export function renderInteger(
	value: FormatValue,
	spec: ResolvedSpec,
	position: number,
	context: ConversionContext,
): string {
	const { conversion, flags, precision, width } = spec;
	const signed = conversion === "d" || conversion === "i";
	const integer = wrapInteger(
		toBigInt(value, spec, position, context),
		spec,
		signed,
	);

	const negative = integer < 0n;
	const magnitude = negative ? -integer : integer;

	let digits =
		precision === 0 && magnitude === 0n
			? ""
			: zeroExtend(magnitude.toString(RADIX[conversion] ?? 10), precision ?? 1);

	if (conversion === "X") {
		digits = digits.toUpperCase();
	}

	if (conversion === "o" && flags.alternate && !digits.startsWith("0")) {
		digits = "0" + digits;
	}

	if (flags.grouping && RADIX[conversion] === 10) {
		digits = groupThousands(digits, context.groupingSeparator);
	}

	let prefix = "";
	if (flags.alternate && magnitude !== 0n) {
		if (conversion === "x") prefix = "0x";
		if (conversion === "X") prefix = "0X";
	}

	const sign = signed ? signFor(negative, flags) : "";

	return assembleNumber(
		sign,
		prefix,
		digits,
		width,
		flags,
		flags.zeroPad && precision === undefined,
	);
}

/**
 * Coerces an argument to a bigint
 *
 * Booleans count as 0 and 1. Fractional numbers are rejected unless
 * strictIntegers is off, in which case they are truncated toward zero.
 */
function toBigInt(
	value: FormatValue,
	spec: ResolvedSpec,
	position: number,
	context: ConversionContext,
): bigint {
	if (typeof value === "bigint") {
		return value;
	}

	if (typeof value === "boolean") {
		return value ? 1n : 0n;
	}

	if (typeof value === "number") {
		if (!Number.isFinite(value)) {
			throw new ArgumentTypeError(
				spec.conversion,
				position,
				value,
				"a finite integer",
			);
		}
		if (Number.isInteger(value)) {
			return BigInt(value);
		}
		if (context.strictIntegers) {
			throw new ArgumentTypeError(
				spec.conversion,
				position,
				value,
				"an integer (use %f, %e, %g or %a for fractional numbers)",
			);
		}
		return BigInt(Math.trunc(value));
	}

	throw new ArgumentTypeError(spec.conversion, position, value, "an integer");
}

/**
 * Applies the two's complement wrap implied by the length modifier
 *
 * Unsigned conversions of negative values without a modifier wrap at the
 * width of C `int`.
 */
function wrapInteger(value: bigint, spec: ResolvedSpec, signed: boolean): bigint {
	const bits = spec.length === undefined ? undefined : LENGTH_BITS[spec.length];

	if (signed) {
		return bits === undefined ? value : BigInt.asIntN(bits, value);
	}

	if (bits !== undefined) {
		return BigInt.asUintN(bits, value);
	}

	return value < 0n ? BigInt.asUintN(DEFAULT_INT_BITS, value) : value;
}
