/**
 * Floating point conversions: `f F e E g G`
 *
 * Digits are produced from the exact binary value with bigint arithmetic and
 * rounded half to even, so every precision is exact.
 *
 * @module conversions/float
 */

import { DEFAULT_FLOAT_PRECISION } from "../shared/constants.js";
import { ArgumentTypeError } from "../shared/errors.js";
import type {
	ConversionContext,
	FormatValue,
	PlaceholderFlags,
	ResolvedSpec,
} from "../shared/types.js";
import {
	assembleNumber,
	groupThousands,
	padField,
	signFor,
	trimFraction,
	zeroExtend,
} from "../shared/utils.js";

/**
 * Renders a floating point placeholder
 *
 * @throws {ArgumentTypeError} If the value is not numeric
 *
 * @example
 * ```typescript
 * renderFloat(1 / 6, spec('%f'), 1, context);   // '0.166667'
 * renderFloat(1 / 6, spec('%.3f'), 1, context); // '0.167'
 * renderFloat(1234.5, spec('%e'), 1, context);  // '1.234500e+03'
 * ```
 */
export function renderFloat(
	value: FormatValue,
	spec: ResolvedSpec,
	position: number,
	context: ConversionContext,
): string {
	const number = toNumber(value, spec, position);
	const { conversion, flags, width } = spec;
	const upper = conversion === "F" || conversion === "E" || conversion === "G";

	if (!Number.isFinite(number)) {
		return renderNonFinite(number, flags, width, upper);
	}

	const negative = number < 0 || Object.is(number, -0);
	const magnitude = Math.abs(number);
	const precision = spec.precision ?? DEFAULT_FLOAT_PRECISION;

	let body: string;
	switch (conversion) {
		case "e":
		case "E":
			body = exponentDigits(magnitude, precision, flags.alternate);
			break;
		case "g":
		case "G":
			body = generalDigits(magnitude, precision, flags.alternate);
			break;
		default:
			body = fixedDigits(magnitude, precision);
			if (flags.alternate && precision === 0) {
				body += ".";
			}
	}

	if (flags.grouping && !body.includes("e")) {
		body = groupIntegerPart(body, context.groupingSeparator);
	}

	if (upper) {
		body = body.toUpperCase();
	}

	return assembleNumber(
		signFor(negative, flags),
		"",
		body,
		width,
		flags,
		flags.zeroPad,
	);
}

/**
 * Coerces an argument to a number for the float and hex-float conversions
 */
export function toNumber(
	value: FormatValue,
	spec: ResolvedSpec,
	position: number,
): number {
	if (typeof value === "number") return value;
	if (typeof value === "bigint") return Number(value);
	if (typeof value === "boolean") return value ? 1 : 0;
	throw new ArgumentTypeError(spec.conversion, position, value, "a number");
}

/**
 * Renders infinities and NaN; zero padding never applies to them
 */
export function renderNonFinite(
	number: number,
	flags: PlaceholderFlags,
	width: number | undefined,
	upper: boolean,
): string {
	const text = Number.isNaN(number) ? "nan" : "inf";
	const sign = signFor(number === -Infinity, flags);
	return padField(sign + (upper ? text.toUpperCase() : text), width, flags.leftAlign);
}

// ============================================================================
// DIGIT GENERATION
// ============================================================================

const FRACTION_MASK = (1n << 52n) - 1n;

/**
 * Exact binary form of a non-negative finite number: `mantissa * 2 ** exponent`
 */
export function binaryParts(magnitude: number): { mantissa: bigint; exponent: number } {
	const view = new DataView(new ArrayBuffer(8));
	view.setFloat64(0, magnitude);
	const bits = view.getBigUint64(0);

	const biased = Number(bits >> 52n);
	const fraction = bits & FRACTION_MASK;

	if (biased === 0) {
		return { mantissa: fraction, exponent: -1074 };
	}
	return { mantissa: fraction | (1n << 52n), exponent: biased - 1075 };
}

/**
 * `magnitude * 10 ** scale` rounded half to even to an integer
 *
 * Works on the exact binary value, so a tie is only a tie when the double
 * really sits halfway: 0.125 is one, 0.15 (stored as 0.1499999...) is not.
 */
export function scaleAndRound(magnitude: number, scale: number): bigint {
	const { mantissa, exponent } = binaryParts(magnitude);

	let numerator = mantissa;
	let denominator = 1n;

	if (exponent >= 0) {
		numerator <<= BigInt(exponent);
	} else {
		denominator <<= BigInt(-exponent);
	}

	if (scale >= 0) {
		numerator *= 10n ** BigInt(scale);
	} else {
		denominator *= 10n ** BigInt(-scale);
	}

	let quotient = numerator / denominator;
	const twiceRemainder = (numerator % denominator) * 2n;

	if (
		twiceRemainder > denominator ||
		(twiceRemainder === denominator && (quotient & 1n) === 1n)
	) {
		quotient += 1n;
	}

	return quotient;
}

/**
 * Fixed notation with exactly `precision` fraction digits
 */
export function fixedDigits(magnitude: number, precision: number): string {
	const digits = scaleAndRound(magnitude, precision)
		.toString()
		.padStart(precision + 1, "0");

	if (precision === 0) {
		return digits;
	}
	return `${digits.slice(0, -precision)}.${digits.slice(-precision)}`;
}

/**
 * The `precision + 1` significant digits of a value and its decimal exponent
 * once rounded, e.g. 9.96 at precision 1 gives `10n` and exponent 1
 */
function scientific(
	magnitude: number,
	precision: number,
): { digits: bigint; exponent: number } {
	if (magnitude === 0) {
		return { digits: 0n, exponent: 0 };
	}

	const lower = 10n ** BigInt(precision);
	const upper = lower * 10n;

	// log10 can be off by one near powers of ten
	let exponent = Math.floor(Math.log10(magnitude));
	let digits = scaleAndRound(magnitude, precision - exponent);

	if (digits < lower) {
		exponent -= 1;
		digits = scaleAndRound(magnitude, precision - exponent);
	}
	if (digits >= upper) {
		exponent += 1;
		digits = scaleAndRound(magnitude, precision - exponent);
	}

	return { digits, exponent };
}

/**
 * Exponent notation with a two-or-more digit exponent, e.g. `1.500000e+00`
 */
export function exponentDigits(
	magnitude: number,
	precision: number,
	alternate: boolean,
): string {
	const { digits, exponent } = scientific(magnitude, precision);
	const text = digits.toString().padStart(precision + 1, "0");

	let mantissa = precision > 0 ? `${text.slice(0, 1)}.${text.slice(1)}` : text;
	if (alternate && precision === 0) {
		mantissa += ".";
	}

	const exponentSign = exponent < 0 ? "-" : "+";
	return `${mantissa}e${exponentSign}${zeroExtend(String(Math.abs(exponent)), 2)}`;
}

/**
 * `%g`: fixed or exponent notation depending on the decimal exponent
 *
 * With P significant digits (precision 0 counts as 1) and X the exponent the
 * value has once rounded to P digits, fixed notation is used when
 * P > X >= -4. Trailing zeros are removed unless `#` is given.
 */
export function generalDigits(
	magnitude: number,
	precision: number,
	alternate: boolean,
): string {
	const significant = precision === 0 ? 1 : precision;
	const { exponent } = scientific(magnitude, significant - 1);

	let body =
		significant > exponent && exponent >= -4
			? fixedDigits(magnitude, significant - 1 - exponent)
			: exponentDigits(magnitude, significant - 1, false);

	const [mantissa = "", tail] = splitExponent(body);

	if (alternate) {
		body = mantissa.includes(".") ? body : `${mantissa}.${tail ?? ""}`;
	} else {
		body = trimFraction(mantissa) + (tail ?? "");
	}

	return body;
}

/**
 * Splits `1.5e+03` into `1.5` and `e+03`
 */
function splitExponent(body: string): [string, string | undefined] {
	const index = body.indexOf("e");
	return index === -1 ? [body, undefined] : [body.slice(0, index), body.slice(index)];
}

function groupIntegerPart(body: string, separator: string): string {
	const point = body.indexOf(".");
	const integer = point === -1 ? body : body.slice(0, point);
	const rest = point === -1 ? "" : body.slice(point);
	return groupThousands(integer, separator) + rest;
}
