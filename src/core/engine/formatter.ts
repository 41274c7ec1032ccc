/**
 * Formatter - printf-style formatting
 *
 * Main entry point of the library. Parses templates once (keeping them in an
 * LRU cache), resolves arguments for each placeholder and hands them to the
 * conversions.
 *
 * @module engine/formatter
 *
 * @example Basic Usage
 * ```typescript
 * const formatter = new Formatter();
 *
 * formatter.format('%s: %5.1f°F', 'Oslo', 41.36);  // 'Oslo:  41.4°F'
 * formatter.format('file_%02d.csv', 7);           // 'file_07.csv'
 * formatter.format('%2$s %1$s %2$s', 'a', 'b');   // 'b a b'
 * ```
 *
 * @example Vectorised formatting
 * ```typescript
 * formatter.formatEach('file_%02d.csv', [1, 2, 3]);
 * // ['file_01.csv', 'file_02.csv', 'file_03.csv']
 * ```
 */

import { renderValue } from "../conversions/index.js";
import type { ParsedTemplate } from "../parser/template-parser.js";
import { WARNING_MESSAGES } from "../shared/constants.js";
import {
	FormatRangeError,
	UnusedArgumentError,
} from "../shared/errors.js";
import type {
	ConversionContext,
	FormatValue,
	PlaceholderToken,
	ResolvedSpec,
} from "../shared/types.js";
import { ConfigValidator } from "../validation/config-validator.js";
import { parseArgumentList } from "../../utils.js";
import { ArgumentCursor } from "./argument-cursor.js";
import { CompiledTemplate } from "./compiled-template.js";
import {
	type FormatterConfig,
	type ResolvedFormatterConfig,
	resolveFormatterConfig,
} from "./formatter-config.js";
import { type CacheStats, TemplateCache } from "./template-cache.js";

/**
 * Argument to formatEach: arrays are recycled, anything else repeats
 */
export type VectorArgument = FormatValue | readonly FormatValue[];

export class Formatter {
	private readonly config: ResolvedFormatterConfig;
	private readonly context: ConversionContext;
	private readonly cache: TemplateCache;

	/**
	 * Creates a new Formatter instance
	 *
	 * @param config - Formatter configuration
	 * @throws {ValidationError} If configuration is invalid
	 */
	constructor(config: FormatterConfig = {}) {
		ConfigValidator.validate(config);

		this.config = resolveFormatterConfig(config);
		this.cache = new TemplateCache(this.config.cacheSize);

		const { displays } = this.config;
		this.context = {
			strictIntegers: this.config.strictIntegers,
			groupingSeparator: this.config.groupingSeparator,
			display: displays ? (record) => displays.tryRender(record) : undefined,
		};
	}

	// ============================================================================
	// PUBLIC API
	// ============================================================================

	/**
	 * Formats arguments into a template
	 *
	 * @throws {FormatSyntaxError} If the template is malformed
	 * @throws {MissingArgumentError} If a placeholder has no argument
	 * @throws {ArgumentTypeError} If an argument does not suit its placeholder
	 */
	format(template: string, ...args: FormatValue[]): string {
		return this.formatArray(template, args);
	}

	/**
	 * Formats an argument array into a template (vsprintf)
	 */
	formatArray(template: string, args: readonly FormatValue[]): string {
		return this.render(this.cache.get(template), args);
	}

	/**
	 * Parses a template for repeated rendering
	 *
	 * @throws {FormatSyntaxError} If the template is malformed
	 *
	 * @example
	 * ```typescript
	 * const row = formatter.compile('%-10s %6.2f');
	 * row.render('Espresso', 2.5); // 'Espresso     2.50'
	 * ```
	 */
	compile(template: string): CompiledTemplate {
		return new CompiledTemplate(this.cache.get(template), this);
	}

	/**
	 * Vectorised formatting
	 *
	 * The template and every array argument are recycled to the length of the
	 * longest one; scalars repeat. Any zero-length input gives an empty result.
	 *
	 * @example
	 * ```typescript
	 * formatter.formatEach('%s costs %.2f', ['tea', 'mocha'], [1.5, 3]);
	 * // ['tea costs 1.50', 'mocha costs 3.00']
	 * ```
	 */
	formatEach(
		templates: string | readonly string[],
		...args: VectorArgument[]
	): string[] {
		const templateList = typeof templates === "string" ? [templates] : templates;
		const lengths = [
			templateList.length,
			...args.map((arg) => (isVector(arg) ? arg.length : 1)),
		];

		if (lengths.some((length) => length === 0)) {
			return [];
		}

		const count = Math.max(...lengths);
		const results: string[] = [];

		for (let i = 0; i < count; i++) {
			const template = templateList[i % templateList.length] ?? "";
			const row = args.map((arg) => (isVector(arg) ? arg[i % arg.length] : arg));
			results.push(this.formatArray(template, row));
		}

		return results;
	}

	/**
	 * Formats arguments given as JSON text
	 *
	 * Loosely written or truncated JSON is repaired before parsing.
	 *
	 * @throws {ArgumentParseError} If the text holds no usable JSON
	 *
	 * @example
	 * ```typescript
	 * formatter.formatFromJSON('%s x%d', "['latte', 2]"); // 'latte x2'
	 * ```
	 */
	formatFromJSON(template: string, rawArgs: string): string {
		return this.formatArray(template, parseArgumentList(rawArgs));
	}

	clearCache(): void {
		this.cache.clear();
	}

	cacheStats(): CacheStats {
		return this.cache.stats();
	}

	// ============================================================================
	// RENDERING
	// ============================================================================

	/**
	 * Renders a parsed template
	 *
	 * Used by CompiledTemplate; prefer format() or compile().
	 */
	render(parsed: ParsedTemplate, args: readonly FormatValue[]): string {
		const cursor = new ArgumentCursor(args);
		let output = "";

		for (const token of parsed.tokens) {
			output +=
				token.type === "literal" ? token.text : this.renderPlaceholder(token, cursor);
		}

		this.checkUnused(cursor, parsed.source);
		return output;
	}

	/**
	 * Reads `*` amounts, then the value, and renders the placeholder
	 */
	private renderPlaceholder(
		token: PlaceholderToken,
		cursor: ArgumentCursor,
	): string {
		const { spec } = token;

		let width = cursor.amount(spec.width);
		let precision = cursor.amount(spec.precision);
		let flags = spec.flags;

		// A negative `*` width left-aligns; a negative `*` precision is ignored
		if (width !== undefined && width < 0) {
			width = -width;
			flags = { ...flags, leftAlign: true };
		}
		if (precision !== undefined && precision < 0) {
			precision = undefined;
		}

		if (width !== undefined && width > this.config.maxWidth) {
			throw new FormatRangeError("width", width, this.config.maxWidth);
		}
		if (precision !== undefined && precision > this.config.maxWidth) {
			throw new FormatRangeError("precision", precision, this.config.maxWidth);
		}

		const { value, position } =
			spec.position === undefined ? cursor.next() : cursor.at(spec.position);

		const resolved: ResolvedSpec = {
			flags,
			width,
			precision,
			length: spec.length,
			conversion: spec.conversion,
		};

		return renderValue(value, resolved, position, this.context);
	}

	private checkUnused(cursor: ArgumentCursor, template: string): void {
		if (this.config.unusedArguments === "ignore") {
			return;
		}

		const unused = cursor.unused();
		if (unused.length === 0) {
			return;
		}

		if (this.config.unusedArguments === "error") {
			throw new UnusedArgumentError(unused, template);
		}

		this.config.onWarning(WARNING_MESSAGES.UNUSED_ARGUMENTS(unused, template), {
			positions: unused,
		});
	}
}

function isVector(value: VectorArgument): value is readonly FormatValue[] {
	return Array.isArray(value);
}
