import { jsonrepair } from "jsonrepair";
import { ArgumentParseError, getErrorMessage } from "./core/shared/errors.js";
import type { FormatValue } from "./core/shared/types.js";

const SCALAR = /^(true|false|null|-?\d[\d.eE+-]*|"[\s\S]*"|'[\s\S]*')$/;

/**
 * Parses an argument list written as JSON
 *
 * Accepts the list inside markdown fences or surrounded by prose, and
 * repairs loosely written JSON (single quotes, trailing commas, missing
 * closing brackets). A value that is not an array becomes a one-element list.
 *
 * @throws {ArgumentParseError} If no usable JSON can be recovered
 *
 * @example
 * ```typescript
 * parseArgumentList("['latte', 3.5,]"); // ['latte', 3.5]
 * parseArgumentList('42');              // [42]
 * ```
 */
export function parseArgumentList(raw: string): FormatValue[] {
	const parsed = parseJSON(raw);
	return Array.isArray(parsed) ? parsed : [parsed];
}

export function parseJSON(raw: string): FormatValue {
	// Remove markdown code blocks
	let cleaned = raw
		.trim()
		.replace(/```json\s*/gi, "")
		.replace(/```\s*/g, "")
		.trim();

	if (cleaned === "") {
		throw new ArgumentParseError("No JSON found in input", { raw });
	}

	const start = findContainerStart(cleaned);
	if (start !== -1) {
		cleaned = cleaned.substring(start);
		const end = findContainerEnd(cleaned);
		if (end !== -1) {
			cleaned = cleaned.substring(0, end + 1);
		}
	}

	try {
		return readJSON(cleaned);
	} catch {
		return readJSON(repair(cleaned, raw));
	}
}

function readJSON(text: string): FormatValue {
	// JSON only holds strings, numbers, booleans, null, arrays and objects
	const value: FormatValue = JSON.parse(text);
	return value;
}

/**
 * Offset of the first `[` or `{`, unless the text is a bare scalar
 */
function findContainerStart(text: string): number {
	if (SCALAR.test(text)) {
		return -1;
	}

	const brace = text.indexOf("{");
	const bracket = text.indexOf("[");
	if (brace === -1) return bracket;
	if (bracket === -1) return brace;
	return Math.min(brace, bracket);
}

/**
 * Offset of the bracket closing the container that starts the text
 */
function findContainerEnd(text: string): number {
	const openChar = text.charAt(0);
	const closeChar = openChar === "{" ? "}" : "]";

	let depth = 0;
	let quote: string | undefined;
	let escapeNext = false;

	for (let i = 0; i < text.length; i++) {
		const char = text[i];

		// Handle string escaping
		if (escapeNext) {
			escapeNext = false;
			continue;
		}

		if (char === "\\") {
			escapeNext = true;
			continue;
		}

		// Handle string boundaries; loose JSON may quote with either mark
		if (char === '"' || char === "'") {
			if (quote === undefined) {
				quote = char;
			} else if (quote === char) {
				quote = undefined;
			}
			continue;
		}

		// Only count brackets outside of strings
		if (quote === undefined) {
			if (char === openChar) {
				depth++;
			} else if (char === closeChar) {
				depth--;
				if (depth === 0) {
					return i;
				}
			}
		}
	}

	return -1;
}

function repair(text: string, raw: string): string {
	try {
		return jsonrepair(text);
	} catch (error) {
		throw new ArgumentParseError(
			`Could not read arguments as JSON: ${getErrorMessage(error)}`,
			{ raw },
		);
	}
}
