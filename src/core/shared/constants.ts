/**
 * Constants used throughout fmtkit
 *
 * This module contains all constant values including default configuration,
 * the placeholder alphabet, integer widths and warning messages.
 *
 * @module shared/constants
 */

import type { Conversion, LengthModifier } from "./types.js";

// ============================================================================
// DEFAULT FORMATTER CONFIGURATION
// ============================================================================

/**
 * Default configuration values for the Formatter
 *
 * These values are used when not explicitly provided in FormatterConfig.
 *
 * @example
 * ```typescript
 * import { DEFAULT_FORMATTER_CONFIG } from 'fmtkit';
 *
 * console.log(DEFAULT_FORMATTER_CONFIG.CACHE_SIZE); // 128
 * console.log(DEFAULT_FORMATTER_CONFIG.MAX_WIDTH); // 10000
 * ```
 */
export const DEFAULT_FORMATTER_CONFIG = {
	/** Reject fractional numbers for integer conversions */
	STRICT_INTEGERS: true,

	/** What to do with arguments no placeholder references */
	UNUSED_ARGUMENTS: "warn",

	/** Separator inserted by the `'` flag */
	GROUPING_SEPARATOR: ",",

	/** Largest width or precision a placeholder may ask for */
	MAX_WIDTH: 10000,

	/** Number of compiled templates kept per formatter */
	CACHE_SIZE: 128,
} as const;

// ============================================================================
// PLACEHOLDER ALPHABET
// ============================================================================

/** Conversion letters the parser accepts */
export const CONVERSIONS: ReadonlySet<string> = new Set<Conversion>([
	"d",
	"i",
	"u",
	"o",
	"x",
	"X",
	"f",
	"F",
	"e",
	"E",
	"g",
	"G",
	"a",
	"A",
	"s",
	"c",
]);

/** Conversions from C that have no meaning for JavaScript values */
export const UNSUPPORTED_CONVERSIONS: Readonly<Record<string, string>> = {
	n: "%n (write back the character count) is not supported",
	p: "%p (pointer address) is not supported",
};

/** Flag characters, in no particular order */
export const FLAG_CHARACTERS = "-+ 0#'";

export const INTEGER_CONVERSIONS: ReadonlySet<Conversion> = new Set<Conversion>([
	"d",
	"i",
	"u",
	"o",
	"x",
	"X",
]);

export const FLOAT_CONVERSIONS: ReadonlySet<Conversion> = new Set<Conversion>([
	"f",
	"F",
	"e",
	"E",
	"g",
	"G",
	"a",
	"A",
]);

// ============================================================================
// NUMERIC LIMITS
// ============================================================================

/**
 * Bit width each length modifier wraps integers to
 *
 * `L` only applies to floating point in C, so it leaves integers alone.
 */
export const LENGTH_BITS: Readonly<Record<LengthModifier, number | undefined>> = {
	hh: 8,
	h: 16,
	l: 64,
	ll: 64,
	q: 64,
	j: 64,
	z: 64,
	t: 64,
	L: undefined,
};

/** Width used for unsigned conversions of negative values without a modifier */
export const DEFAULT_INT_BITS = 32;

export const DEFAULT_FLOAT_PRECISION = 6;

/** Precision the template validator renders at when checking arguments */
export const MAX_CHECKED_PRECISION = 100;

// ============================================================================
// VALIDATION CONSTANTS
// ============================================================================

/**
 * Validation-related constants
 */
export const VALIDATION = {
	/** Minimum allowed cache size (0 disables the cache) */
	MIN_CACHE_SIZE: 0,

	/** Maximum allowed cache size */
	MAX_CACHE_SIZE: 10000,

	/** Minimum allowed width limit */
	MIN_MAX_WIDTH: 1,

	/** Maximum allowed width limit */
	MAX_MAX_WIDTH: 1000000,

	/** Accepted values for unusedArguments */
	UNUSED_ARGUMENT_MODES: ["ignore", "warn", "error"],
} as const;

// ============================================================================
// WARNING MESSAGES
// ============================================================================

/**
 * Standardized warning messages
 *
 * @example
 * ```typescript
 * onWarning(WARNING_MESSAGES.UNUSED_ARGUMENTS([3], 'total: %d'));
 * ```
 */
export const WARNING_MESSAGES = {
	UNUSED_ARGUMENTS: (positions: number[], template: string) =>
		`${positions.length === 1 ? "Argument" : "Arguments"} ${positions.join(", ")} not used by format "${template}"`,

	ZERO_FLAG_WITH_LEFT_ALIGN: (placeholder: string) =>
		`"0" flag is ignored with "-" in ${placeholder}`,

	ZERO_FLAG_WITH_PRECISION: (placeholder: string) =>
		`"0" flag is ignored with an integer precision in ${placeholder}`,

	ZERO_FLAG_WITH_TEXT: (placeholder: string) =>
		`"0" flag is ignored for text in ${placeholder}`,

	SPACE_FLAG_WITH_SIGN: (placeholder: string) =>
		`" " flag is ignored with "+" in ${placeholder}`,
} as const;
