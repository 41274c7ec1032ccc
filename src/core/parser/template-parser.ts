/**
 * Template parser
 *
 * Turns a template into literal and placeholder tokens following the
 * `%[position$][flags][width][.precision][length]conversion` grammar.
 * Parsing happens once per template; rendering only walks the tokens.
 *
 * @module parser/template-parser
 */

import {
	CONVERSIONS,
	FLAG_CHARACTERS,
	UNSUPPORTED_CONVERSIONS,
} from "../shared/constants.js";
import { FormatSyntaxError } from "../shared/errors.js";
import type {
	Amount,
	Conversion,
	LengthModifier,
	PlaceholderFlags,
	PlaceholderSpec,
	PlaceholderToken,
	Token,
} from "../shared/types.js";

/**
 * Result of parsing a template
 */
export interface ParsedTemplate {
	/** Template as given */
	source: string;

	/** Literal runs and placeholders in template order */
	tokens: Token[];

	/** Only the placeholder tokens */
	placeholders: PlaceholderToken[];

	/**
	 * Number of arguments the template reads: the larger of the sequential
	 * reads and the highest explicit position
	 */
	argumentCount: number;
}

const LENGTH_MODIFIERS: LengthModifier[] = ["hh", "ll", "h", "l", "L", "q", "j", "z", "t"];

/**
 * Parses a template into tokens
 *
 * @param template - Template to parse
 * @returns Tokens and argument bookkeeping
 * @throws {FormatSyntaxError} If a placeholder is malformed
 *
 * @example
 * ```typescript
 * const parsed = parseTemplate('%s is %d years old');
 * parsed.placeholders.length; // 2
 * parsed.argumentCount;       // 2
 * ```
 */
export function parseTemplate(template: string): ParsedTemplate {
	return new TemplateParser(template).parse();
}

/**
 * Single-use cursor over one template
 */
class TemplateParser {
	private index = 0;
	private readonly tokens: Token[] = [];
	private literal = "";

	constructor(private readonly template: string) {}

	parse(): ParsedTemplate {
		const { template } = this;

		while (this.index < template.length) {
			const next = template.indexOf("%", this.index);
			if (next === -1) {
				this.literal += template.slice(this.index);
				break;
			}

			this.literal += template.slice(this.index, next);

			if (template[next + 1] === "%") {
				this.literal += "%";
				this.index = next + 2;
				continue;
			}

			this.flushLiteral();
			this.tokens.push(this.parsePlaceholder(next));
		}

		this.flushLiteral();

		const placeholders = this.tokens.filter(
			(token): token is PlaceholderToken => token.type === "placeholder",
		);

		return {
			source: template,
			tokens: this.tokens,
			placeholders,
			argumentCount: countArguments(placeholders),
		};
	}

	// ============================================================================
	// PLACEHOLDER GRAMMAR
	// ============================================================================

	private parsePlaceholder(start: number): PlaceholderToken {
		this.index = start + 1;

		const position = this.parsePosition(start);
		const flags = this.parseFlags();
		const width = this.parseAmount(start);
		const precision = this.parsePrecision(start);
		const length = this.parseLength();
		const conversion = this.parseConversion(start);

		const spec: PlaceholderSpec = { flags, width, precision, conversion };
		if (position !== undefined) spec.position = position;
		if (length !== undefined) spec.length = length;

		return {
			type: "placeholder",
			spec,
			start,
			end: this.index,
			source: this.template.slice(start, this.index),
		};
	}

	/**
	 * Reads `n$`; digits not followed by `$` belong to flags or width
	 */
	private parsePosition(start: number): number | undefined {
		const digits = this.peekDigits();
		if (digits === "" || this.template[this.index + digits.length] !== "$") {
			return undefined;
		}
		const position = Number(digits);
		if (position < 1) {
			throw new FormatSyntaxError(
				"Argument positions start at 1",
				this.template,
				start,
			);
		}
		this.index += digits.length + 1;
		return position;
	}

	private parseFlags(): PlaceholderFlags {
		const flags: PlaceholderFlags = {
			leftAlign: false,
			sign: false,
			space: false,
			zeroPad: false,
			alternate: false,
			grouping: false,
		};

		let char = this.template.charAt(this.index);
		while (char !== "" && FLAG_CHARACTERS.includes(char)) {
			switch (char) {
				case "-":
					flags.leftAlign = true;
					break;
				case "+":
					flags.sign = true;
					break;
				case " ":
					flags.space = true;
					break;
				case "0":
					flags.zeroPad = true;
					break;
				case "#":
					flags.alternate = true;
					break;
				case "'":
					flags.grouping = true;
					break;
			}
			this.index++;
			char = this.template.charAt(this.index);
		}

		return flags;
	}

	/**
	 * Reads a width-style amount: digits, `*` or `*m$`
	 */
	private parseAmount(start: number): Amount {
		if (this.template[this.index] === "*") {
			this.index++;
			const digits = this.peekDigits();
			if (digits !== "" && this.template[this.index + digits.length] === "$") {
				const position = Number(digits);
				if (position < 1) {
					throw new FormatSyntaxError(
						"Argument positions start at 1",
						this.template,
						start,
					);
				}
				this.index += digits.length + 1;
				return { source: "positional", position };
			}
			return { source: "next" };
		}

		const digits = this.peekDigits();
		if (digits === "") {
			return { source: "none" };
		}
		this.index += digits.length;
		return { source: "fixed", value: Number(digits) };
	}

	/**
	 * Reads `.precision`; a bare `.` means precision 0
	 */
	private parsePrecision(start: number): Amount {
		if (this.template[this.index] !== ".") {
			return { source: "none" };
		}
		this.index++;
		const amount = this.parseAmount(start);
		return amount.source === "none" ? { source: "fixed", value: 0 } : amount;
	}

	private parseLength(): LengthModifier | undefined {
		for (const modifier of LENGTH_MODIFIERS) {
			if (this.template.startsWith(modifier, this.index)) {
				this.index += modifier.length;
				return modifier;
			}
		}
		return undefined;
	}

	private parseConversion(start: number): Conversion {
		const char = this.template.charAt(this.index);

		if (char === "") {
			throw new FormatSyntaxError(
				"Incomplete placeholder at end of template",
				this.template,
				start,
			);
		}

		if (char === "%") {
			throw new FormatSyntaxError(
				'"%%" cannot take a position, flags, width or precision',
				this.template,
				start,
			);
		}

		const unsupported = UNSUPPORTED_CONVERSIONS[char];
		if (unsupported !== undefined) {
			throw new FormatSyntaxError(unsupported, this.template, start);
		}

		if (!isConversion(char)) {
			throw new FormatSyntaxError(
				`Unknown conversion "%${char}"`,
				this.template,
				start,
			);
		}

		this.index++;
		return char;
	}

	// ============================================================================
	// HELPERS
	// ============================================================================

	private peekDigits(): string {
		let end = this.index;
		while (end < this.template.length && isDigit(this.template.charCodeAt(end))) {
			end++;
		}
		return this.template.slice(this.index, end);
	}

	private flushLiteral(): void {
		if (this.literal !== "") {
			this.tokens.push({ type: "literal", text: this.literal });
			this.literal = "";
		}
	}
}

// ============================================================================
// ARGUMENT BOOKKEEPING
// ============================================================================

/**
 * Counts how many arguments a list of placeholders needs
 *
 * Sequential reads (`%d`, `*`) advance a counter; explicit positions only
 * raise the high-water mark.
 */
function countArguments(placeholders: PlaceholderToken[]): number {
	let sequential = 0;
	let highest = 0;

	const visit = (amount: Amount): void => {
		if (amount.source === "next") {
			sequential++;
		} else if (amount.source === "positional") {
			highest = Math.max(highest, amount.position);
		}
	};

	for (const { spec } of placeholders) {
		visit(spec.width);
		visit(spec.precision);
		if (spec.position === undefined) {
			sequential++;
		} else {
			highest = Math.max(highest, spec.position);
		}
	}

	return Math.max(sequential, highest);
}

function isConversion(char: string): char is Conversion {
	return CONVERSIONS.has(char);
}

function isDigit(code: number): boolean {
	return code >= 48 && code <= 57;
}
