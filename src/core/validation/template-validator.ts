/**
 * Template validator
 *
 * Checks a template, and optionally the arguments meant for it, without
 * throwing. Useful for linting templates that come from configuration or
 * translation files.
 *
 * @module validation/template-validator
 */

import { renderValue } from "../conversions/index.js";
import { ArgumentCursor } from "../engine/argument-cursor.js";
import { type ParsedTemplate, parseTemplate } from "../parser/template-parser.js";
import {
	DEFAULT_FORMATTER_CONFIG,
	INTEGER_CONVERSIONS,
	MAX_CHECKED_PRECISION,
	WARNING_MESSAGES,
} from "../shared/constants.js";
import { FormatError, FormatSyntaxError } from "../shared/errors.js";
import type {
	ConversionContext,
	FormatValue,
	PlaceholderToken,
} from "../shared/types.js";

/**
 * One problem found in a template
 */
export interface TemplateIssue {
	/** Error code, or a warning code such as `ZERO_FLAG_IGNORED` */
	code: string;
	message: string;

	/** Offset of the placeholder in the template, when known */
	offset?: number;
}

/**
 * Result of checking a template
 */
export interface TemplateCheckResult {
	valid: boolean;
	errors: TemplateIssue[];
	warnings: TemplateIssue[];

	/** Arguments the template needs; absent when it does not parse */
	argumentCount?: number;
}

export interface TemplateCheckOptions {
	/** @default true */
	strictIntegers?: boolean;
}

/**
 * Template validator
 *
 * Reports:
 * - Syntax errors
 * - Missing arguments and arguments of the wrong type
 * - Unused arguments (warning)
 * - Flag combinations where one flag is ignored (warning)
 */
export class TemplateValidator {
	/**
	 * Checks a template
	 *
	 * @param template - Template to check
	 * @param args - Arguments to check against it; omit to check syntax only
	 *
	 * @example
	 * ```typescript
	 * const result = TemplateValidator.check('%-05d|%s', [7]);
	 * result.valid;       // false (argument 2 is missing)
	 * result.warnings[0].message; // '"0" flag is ignored with "-" in %-05d'
	 * ```
	 */
	static check(
		template: string,
		args?: readonly FormatValue[],
		options: TemplateCheckOptions = {},
	): TemplateCheckResult {
		const errors: TemplateIssue[] = [];
		const warnings: TemplateIssue[] = [];

		let parsed: ParsedTemplate;
		try {
			parsed = parseTemplate(template);
		} catch (error) {
			if (error instanceof FormatSyntaxError) {
				errors.push({
					code: error.code,
					message: error.message,
					offset: error.offset,
				});
				return { valid: false, errors, warnings };
			}
			throw error;
		}

		for (const placeholder of parsed.placeholders) {
			warnings.push(...TemplateValidator.checkFlags(placeholder));
		}

		if (args !== undefined) {
			TemplateValidator.checkArguments(parsed, args, options, errors, warnings);
		}

		return {
			valid: errors.length === 0,
			errors,
			warnings,
			argumentCount: parsed.argumentCount,
		};
	}

	// ============================================================================
	// PRIVATE CHECKS
	// ============================================================================

	/**
	 * Flags that have no effect in combination with others
	 */
	private static checkFlags(placeholder: PlaceholderToken): TemplateIssue[] {
		const { flags, conversion, precision } = placeholder.spec;
		const issues: TemplateIssue[] = [];
		const warn = (code: string, message: string): void => {
			issues.push({ code, message, offset: placeholder.start });
		};

		if (flags.zeroPad && flags.leftAlign) {
			warn(
				"ZERO_FLAG_IGNORED",
				WARNING_MESSAGES.ZERO_FLAG_WITH_LEFT_ALIGN(placeholder.source),
			);
		} else if (
			flags.zeroPad &&
			INTEGER_CONVERSIONS.has(conversion) &&
			precision.source !== "none"
		) {
			warn(
				"ZERO_FLAG_IGNORED",
				WARNING_MESSAGES.ZERO_FLAG_WITH_PRECISION(placeholder.source),
			);
		} else if (flags.zeroPad && (conversion === "s" || conversion === "c")) {
			warn("ZERO_FLAG_IGNORED", WARNING_MESSAGES.ZERO_FLAG_WITH_TEXT(placeholder.source));
		}

		if (flags.space && flags.sign) {
			warn(
				"SPACE_FLAG_IGNORED",
				WARNING_MESSAGES.SPACE_FLAG_WITH_SIGN(placeholder.source),
			);
		}

		return issues;
	}

	/**
	 * Walks the placeholders the way the formatter does, collecting failures
	 * instead of stopping at the first
	 */
	private static checkArguments(
		parsed: ParsedTemplate,
		args: readonly FormatValue[],
		options: TemplateCheckOptions,
		errors: TemplateIssue[],
		warnings: TemplateIssue[],
	): void {
		const cursor = new ArgumentCursor(args);
		const context: ConversionContext = {
			strictIntegers: options.strictIntegers ?? DEFAULT_FORMATTER_CONFIG.STRICT_INTEGERS,
			groupingSeparator: DEFAULT_FORMATTER_CONFIG.GROUPING_SEPARATOR,
		};

		for (const placeholder of parsed.placeholders) {
			const { spec } = placeholder;
			try {
				cursor.amount(spec.width);
				const precision = cursor.amount(spec.precision);
				const { value, position } =
					spec.position === undefined ? cursor.next() : cursor.at(spec.position);

				// Width never changes validity; precision is capped to keep this cheap
				renderValue(
					value,
					{
						flags: spec.flags,
						precision:
							precision === undefined || precision < 0
								? undefined
								: Math.min(precision, MAX_CHECKED_PRECISION),
						length: spec.length,
						conversion: spec.conversion,
					},
					position,
					context,
				);
			} catch (error) {
				if (!(error instanceof FormatError)) {
					throw error;
				}
				errors.push({
					code: error.code,
					message: error.message,
					offset: placeholder.start,
				});
			}
		}

		const unused = cursor.unused();
		if (unused.length > 0) {
			warnings.push({
				code: "UNUSED_ARGUMENT",
				message: WARNING_MESSAGES.UNUSED_ARGUMENTS(unused, parsed.source),
			});
		}
	}
}
