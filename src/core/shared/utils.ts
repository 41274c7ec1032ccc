/**
 * Utility functions used throughout fmtkit
 *
 * This module contains pure utility functions that don't fit into
 * specific classes but are used across multiple conversions.
 *
 * @module shared/utils
 */

import type { PlaceholderFlags } from "./types.js";

// ============================================================================
// PADDING UTILITIES
// ============================================================================

/**
 * Pads a rendered field to the requested width
 *
 * Text is padded with spaces, on the right when left-aligned.
 *
 * @param text - Rendered field
 * @param width - Minimum field width (undefined means no padding)
 * @param leftAlign - Pad on the right instead of the left
 * @returns Padded field
 *
 * @example
 * ```typescript
 * padField('42', 5, false); // '   42'
 * padField('42', 5, true);  // '42   '
 * ```
 */
export function padField(
	text: string,
	width: number | undefined,
	leftAlign: boolean,
): string {
	if (width === undefined) {
		return text;
	}
	const length = codePointLength(text);
	if (length >= width) {
		return text;
	}
	const padding = " ".repeat(width - length);
	return leftAlign ? text + padding : padding + text;
}

/**
 * Assembles a numeric field from its sign, radix prefix and digits
 *
 * Zero padding is inserted between the prefix and the digits; otherwise the
 * whole field is space padded.
 *
 * @param sign - Sign character or empty string
 * @param prefix - Radix prefix such as `0x`, or empty string
 * @param digits - Body of the number
 * @param width - Minimum field width
 * @param flags - Placeholder flags
 * @param zeroPad - Whether zero padding applies to this value
 * @returns The complete field
 *
 * @example
 * ```typescript
 * assembleNumber('-', '', '42', 6, flags, true);   // '-00042'
 * assembleNumber('', '0x', 'ff', 6, flags, false); // '  0xff'
 * ```
 */
export function assembleNumber(
	sign: string,
	prefix: string,
	digits: string,
	width: number | undefined,
	flags: PlaceholderFlags,
	zeroPad: boolean,
): string {
	const head = sign + prefix;
	if (zeroPad && !flags.leftAlign && width !== undefined) {
		const missing = width - head.length - digits.length;
		if (missing > 0) {
			return head + "0".repeat(missing) + digits;
		}
		return head + digits;
	}
	return padField(head + digits, width, flags.leftAlign);
}

/**
 * Picks the sign character for a number
 *
 * @param negative - Whether the value is negative
 * @param flags - Placeholder flags (`+` wins over space)
 */
export function signFor(negative: boolean, flags: PlaceholderFlags): string {
	if (negative) return "-";
	if (flags.sign) return "+";
	if (flags.space) return " ";
	return "";
}

// ============================================================================
// DIGIT UTILITIES
// ============================================================================

/**
 * Inserts a separator between groups of three digits
 *
 * @param digits - Run of decimal digits without sign
 * @param separator - Separator to insert (empty string leaves digits as-is)
 *
 * @example
 * ```typescript
 * groupThousands('1234567', ','); // '1,234,567'
 * ```
 */
export function groupThousands(digits: string, separator: string): string {
	if (separator === "" || digits.length <= 3) {
		return digits;
	}
	const head = digits.length % 3;
	const groups: string[] = head > 0 ? [digits.slice(0, head)] : [];
	for (let i = head; i < digits.length; i += 3) {
		groups.push(digits.slice(i, i + 3));
	}
	return groups.join(separator);
}

/**
 * Left-pads a digit string with zeros to a minimum number of digits
 */
export function zeroExtend(digits: string, minDigits: number): string {
	return digits.length >= minDigits ? digits : "0".repeat(minDigits - digits.length) + digits;
}

/**
 * Strips trailing zeros from the fraction of a decimal string
 *
 * Removes the decimal point too when nothing is left after it.
 *
 * @example
 * ```typescript
 * trimFraction('1.2500'); // '1.25'
 * trimFraction('3.000');  // '3'
 * ```
 */
export function trimFraction(text: string): string {
	if (!text.includes(".")) {
		return text;
	}
	return text.replace(/0+$/, "").replace(/\.$/, "");
}

// ============================================================================
// TEXT UTILITIES
// ============================================================================

/**
 * Counts code points rather than UTF-16 units
 */
export function codePointLength(text: string): number {
	let count = 0;
	for (const _ of text) {
		count++;
	}
	return count;
}

/**
 * Truncates text to at most `max` code points
 */
export function truncateCodePoints(text: string, max: number): string {
	if (text.length <= max) {
		return text;
	}
	return Array.from(text).slice(0, max).join("");
}
