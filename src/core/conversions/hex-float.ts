/**
 * Hexadecimal floating point conversions: `a A`
 *
 * Prints the IEEE-754 binary64 value as `0xh.hhhp±d`. Normal numbers have a
 * leading `1`, subnormals a leading `0` with exponent -1022.
 *
 * @module conversions/hex-float
 */

import type {
	ConversionContext,
	FormatValue,
	ResolvedSpec,
} from "../shared/types.js";
import { assembleNumber, signFor } from "../shared/utils.js";
import { binaryParts, renderNonFinite, toNumber } from "./float.js";

/** Hex digits in the 52-bit fraction of a binary64 */
const FRACTION_HEX_DIGITS = 13;

const FRACTION_MASK = (1n << 52n) - 1n;

/**
 * Renders a hexadecimal floating point placeholder
 *
 * @throws {ArgumentTypeError} If the value is not numeric
 *
 * @example
 * ```typescript
 * renderHexFloat(3, spec('%a'), 1, context);    // '0x1.8p+1'
 * renderHexFloat(1, spec('%.2A'), 1, context);  // '0X1.00P+0'
 * ```
 */
export function renderHexFloat(
	value: FormatValue,
	spec: ResolvedSpec,
	position: number,
	_context: ConversionContext,
): string {
	const number = toNumber(value, spec, position);
	const { flags, width, precision } = spec;
	const upper = spec.conversion === "A";

	if (!Number.isFinite(number)) {
		return renderNonFinite(number, flags, width, upper);
	}

	const negative = number < 0 || Object.is(number, -0);
	let body = hexDigits(Math.abs(number), precision, flags.alternate);
	let prefix = "0x";

	if (upper) {
		body = body.toUpperCase();
		prefix = "0X";
	}

	return assembleNumber(
		signFor(negative, flags),
		prefix,
		body,
		width,
		flags,
		flags.zeroPad,
	);
}

/**
 * Mantissa and binary exponent of a non-negative finite number, without prefix
 */
export function hexDigits(
	magnitude: number,
	precision: number | undefined,
	alternate: boolean,
): string {
	const parts = binaryParts(magnitude);
	const subnormal = parts.mantissa <= FRACTION_MASK;

	let lead: bigint;
	let exponent: number;
	if (magnitude === 0) {
		lead = 0n;
		exponent = 0;
	} else if (subnormal) {
		lead = 0n;
		exponent = -1022;
	} else {
		lead = 1n;
		exponent = parts.exponent + 52;
	}
	const fraction = parts.mantissa & FRACTION_MASK;

	const mantissa =
		precision === undefined
			? shortestMantissa(lead, fraction)
			: roundedMantissa(lead, fraction, precision);

	const point = alternate && !mantissa.includes(".") ? "." : "";
	const exponentSign = exponent < 0 ? "-" : "+";
	return `${mantissa}${point}p${exponentSign}${Math.abs(exponent)}`;
}

/**
 * Exact mantissa with trailing zero digits removed
 */
function shortestMantissa(lead: bigint, fraction: bigint): string {
	const digits = fraction
		.toString(16)
		.padStart(FRACTION_HEX_DIGITS, "0")
		.replace(/0+$/, "");
	return digits === "" ? lead.toString(16) : `${lead.toString(16)}.${digits}`;
}

/**
 * Mantissa rounded half to even to `precision` hex digits
 *
 * A carry out of the leading digit is kept there, so 0x1.f rounded to no
 * digits prints as `2`.
 */
function roundedMantissa(lead: bigint, fraction: bigint, precision: number): string {
	if (precision >= FRACTION_HEX_DIGITS) {
		const digits = fraction
			.toString(16)
			.padStart(FRACTION_HEX_DIGITS, "0")
			.padEnd(precision, "0");
		return `${lead.toString(16)}.${digits}`;
	}

	const shift = BigInt(4 * (FRACTION_HEX_DIGITS - precision));
	const full = (lead << 52n) | fraction;
	let kept = full >> shift;
	const remainder = full & ((1n << shift) - 1n);
	const half = 1n << (shift - 1n);

	if (remainder > half || (remainder === half && (kept & 1n) === 1n)) {
		kept += 1n;
	}

	const fractionBits = BigInt(4 * precision);
	const leadDigit = kept >> fractionBits;
	if (precision === 0) {
		return leadDigit.toString(16);
	}
	const digits = (kept & ((1n << fractionBits) - 1n))
		.toString(16)
		.padStart(precision, "0");
	return `${leadDigit.toString(16)}.${digits}`;
}
