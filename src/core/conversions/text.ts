/**
 * Text conversions: `s c`
 *
 * @module conversions/text
 */

import { ArgumentTypeError } from "../shared/errors.js";
import {
	type ConversionContext,
	type FormatValue,
	type ResolvedSpec,
	isKindRecord,
} from "../shared/types.js";
import { padField, truncateCodePoints } from "../shared/utils.js";

const MAX_CODE_POINT = 0x10ffff;

/**
 * Renders a `%s` placeholder; precision caps the number of code points
 *
 * @example
 * ```typescript
 * renderString('espresso', spec('%.3s'), 1, context);  // 'esp'
 * renderString(null, spec('%s'), 1, context);          // '(null)'
 * ```
 */
export function renderString(
	value: FormatValue,
	spec: ResolvedSpec,
	_position: number,
	context: ConversionContext,
): string {
	let text = stringify(value, context);
	if (spec.precision !== undefined) {
		text = truncateCodePoints(text, spec.precision);
	}
	return padField(text, spec.width, spec.flags.leftAlign);
}

/**
 * Renders a `%c` placeholder
 *
 * Numbers are code points; strings contribute their first code point.
 *
 * @throws {ArgumentTypeError} If the value is neither a code point nor a string
 */
export function renderChar(
	value: FormatValue,
	spec: ResolvedSpec,
	position: number,
	_context: ConversionContext,
): string {
	let char: string;

	if (typeof value === "number") {
		if (!Number.isInteger(value) || value < 0 || value > MAX_CODE_POINT) {
			throw new ArgumentTypeError("c", position, value, "a code point");
		}
		char = String.fromCodePoint(value);
	} else if (typeof value === "string") {
		const codePoint = value.codePointAt(0);
		char = codePoint === undefined ? "" : String.fromCodePoint(codePoint);
	} else {
		throw new ArgumentTypeError("c", position, value, "a code point or string");
	}

	return padField(char, spec.width, spec.flags.leftAlign);
}

/**
 * Text form of any argument
 *
 * Kind-tagged records go through the registered display first. Objects whose
 * string form is the generic `[object Object]` are written as JSON instead,
 * unless they hold bigints or cycles.
 */
export function stringify(value: FormatValue, context: ConversionContext): string {
	if (typeof value === "string") {
		return value;
	}

	if (value === null || value === undefined) {
		return "(null)";
	}

	if (typeof value !== "object") {
		return String(value);
	}

	if (isKindRecord(value) && context.display) {
		const displayed = context.display(value);
		if (displayed !== undefined) {
			return displayed;
		}
	}

	// Objects without a prototype have no toString
	const text =
		typeof value.toString === "function"
			? String(value)
			: Object.prototype.toString.call(value);
	if (text !== "[object Object]") {
		return text;
	}
	return toJSON(value) ?? text;
}

function toJSON(value: object): string | undefined {
	try {
		return JSON.stringify(value);
	} catch (error) {
		// Bigints and cycles cannot be written as JSON
		if (error instanceof TypeError) {
			return undefined;
		}
		throw error;
	}
}
