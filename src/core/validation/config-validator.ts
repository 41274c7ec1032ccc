/**
 * Formatter configuration validator
 *
 * Validates Formatter configuration during construction to catch
 * errors before the first template is rendered.
 *
 * @module validation/config-validator
 */

import type { FormatterConfig } from "../engine/formatter-config.js";
import { VALIDATION } from "../shared/constants.js";
import { ValidationError } from "../shared/errors.js";
import { codePointLength } from "../shared/utils.js";

/**
 * Configuration validator for Formatter
 *
 * Performs validation of formatter configuration including:
 * - Numeric constraints (cache size, width limit)
 * - Grouping separator shape
 * - Unused-argument mode
 */
export class ConfigValidator {
	/**
	 * Validates formatter configuration
	 *
	 * @param config - Formatter configuration to validate
	 * @throws {ValidationError} If configuration is invalid
	 *
	 * @example
	 * ```typescript
	 * try {
	 *   ConfigValidator.validate({ cacheSize: -1 });
	 * } catch (error) {
	 *   if (error instanceof ValidationError) {
	 *     console.error('Invalid config:', error.field);
	 *   }
	 * }
	 * ```
	 */
	static validate(config: FormatterConfig): void {
		if (config.cacheSize !== undefined) {
			this.validateCacheSize(config.cacheSize);
		}

		if (config.maxWidth !== undefined) {
			this.validateMaxWidth(config.maxWidth);
		}

		if (config.groupingSeparator !== undefined) {
			this.validateGroupingSeparator(config.groupingSeparator);
		}

		if (config.unusedArguments !== undefined) {
			this.validateUnusedArguments(config.unusedArguments);
		}
	}

	// ============================================================================
	// PRIVATE VALIDATION METHODS
	// ============================================================================

	/**
	 * Validates cache size
	 *
	 * @throws {ValidationError} If cache size is not an integer in range
	 */
	private static validateCacheSize(cacheSize: number): void {
		if (!Number.isInteger(cacheSize)) {
			throw new ValidationError("Cache size must be an integer", "cacheSize", {
				provided: cacheSize,
			});
		}

		if (cacheSize < VALIDATION.MIN_CACHE_SIZE) {
			throw new ValidationError(
				`Cache size must be at least ${VALIDATION.MIN_CACHE_SIZE}`,
				"cacheSize",
				{
					provided: cacheSize,
					minimum: VALIDATION.MIN_CACHE_SIZE,
				},
			);
		}

		if (cacheSize > VALIDATION.MAX_CACHE_SIZE) {
			throw new ValidationError(
				`Cache size must not exceed ${VALIDATION.MAX_CACHE_SIZE}`,
				"cacheSize",
				{
					provided: cacheSize,
					maximum: VALIDATION.MAX_CACHE_SIZE,
				},
			);
		}
	}

	/**
	 * Validates the width/precision limit
	 *
	 * @throws {ValidationError} If the limit is not an integer in range
	 */
	private static validateMaxWidth(maxWidth: number): void {
		if (!Number.isInteger(maxWidth)) {
			throw new ValidationError("Max width must be an integer", "maxWidth", {
				provided: maxWidth,
			});
		}

		if (maxWidth < VALIDATION.MIN_MAX_WIDTH) {
			throw new ValidationError(
				`Max width must be at least ${VALIDATION.MIN_MAX_WIDTH}`,
				"maxWidth",
				{
					provided: maxWidth,
					minimum: VALIDATION.MIN_MAX_WIDTH,
				},
			);
		}

		if (maxWidth > VALIDATION.MAX_MAX_WIDTH) {
			throw new ValidationError(
				`Max width must not exceed ${VALIDATION.MAX_MAX_WIDTH}`,
				"maxWidth",
				{
					provided: maxWidth,
					maximum: VALIDATION.MAX_MAX_WIDTH,
				},
			);
		}
	}

	/**
	 * Validates the grouping separator
	 *
	 * @throws {ValidationError} If it is not empty or a single character
	 */
	private static validateGroupingSeparator(separator: string): void {
		if (typeof separator !== "string" || codePointLength(separator) > 1) {
			throw new ValidationError(
				"Grouping separator must be a single character or empty",
				"groupingSeparator",
				{ provided: separator },
			);
		}

		if (/[0-9]/.test(separator)) {
			throw new ValidationError(
				"Grouping separator must not be a digit",
				"groupingSeparator",
				{ provided: separator },
			);
		}
	}

	/**
	 * Validates the unused-argument mode
	 *
	 * @throws {ValidationError} If the mode is unknown
	 */
	private static validateUnusedArguments(mode: string): void {
		const modes: readonly string[] = VALIDATION.UNUSED_ARGUMENT_MODES;
		if (!modes.includes(mode)) {
			throw new ValidationError(
				`Unused arguments mode must be one of: ${modes.join(", ")}`,
				"unusedArguments",
				{ provided: mode },
			);
		}
	}
}
