/**
 * Core type definitions for fmtkit
 *
 * This module contains the shared types produced by the template parser
 * and consumed by the formatter and the conversions.
 *
 * @module shared/types
 */

// ============================================================================
// VALUES
// ============================================================================

/**
 * Record tagged with a `kind` discriminator
 *
 * Records whose kind has a registered display are rendered by it under `%s`.
 */
export interface KindRecord {
	kind: string;
	[field: string]: unknown;
}

/**
 * Any value that can be passed as a formatting argument
 */
export type FormatValue =
	| string
	| number
	| bigint
	| boolean
	| null
	| undefined
	| object;

// ============================================================================
// PLACEHOLDER GRAMMAR
// ============================================================================

/** Conversion letters understood by the parser */
export type Conversion =
	| "d"
	| "i"
	| "u"
	| "o"
	| "x"
	| "X"
	| "f"
	| "F"
	| "e"
	| "E"
	| "g"
	| "G"
	| "a"
	| "A"
	| "s"
	| "c";

/** Length modifiers; they only change how integers wrap */
export type LengthModifier = "hh" | "h" | "l" | "ll" | "L" | "q" | "j" | "z" | "t";

/**
 * Placeholder flags
 */
export interface PlaceholderFlags {
	/** `-`: pad on the right */
	leftAlign: boolean;

	/** `+`: always print a sign for signed conversions */
	sign: boolean;

	/** space: print a space where a plus sign would go */
	space: boolean;

	/** `0`: pad numbers with zeros after the sign */
	zeroPad: boolean;

	/** `#`: alternate form (radix prefix, kept decimal point) */
	alternate: boolean;

	/** `'`: group integer digits by thousands */
	grouping: boolean;
}

/**
 * Where a width or precision comes from
 *
 * - `none`: not given
 * - `fixed`: written in the template
 * - `next`: `*`, read from the next sequential argument
 * - `positional`: `*m$`, read from argument `m`
 */
export type Amount =
	| { source: "none" }
	| { source: "fixed"; value: number }
	| { source: "next" }
	| { source: "positional"; position: number };

/**
 * Parsed form of one `%...` placeholder
 */
export interface PlaceholderSpec {
	/** Explicit 1-based argument position (`%2$s`), if any */
	position?: number;
	flags: PlaceholderFlags;
	width: Amount;
	precision: Amount;
	length?: LengthModifier;
	conversion: Conversion;
}

// ============================================================================
// TOKENS
// ============================================================================

/**
 * Literal run of template text (`%%` already collapsed to `%`)
 */
export interface LiteralToken {
	type: "literal";
	text: string;
}

/**
 * Placeholder with its location in the template
 */
export interface PlaceholderToken {
	type: "placeholder";
	spec: PlaceholderSpec;

	/** Offset of the `%` */
	start: number;

	/** Offset just past the conversion letter */
	end: number;

	/** Placeholder text as written, e.g. `%-8.2f` */
	source: string;
}

export type Token = LiteralToken | PlaceholderToken;

// ============================================================================
// RENDERING
// ============================================================================

/**
 * Width and precision after `*` arguments have been resolved
 */
export interface ResolvedSpec {
	flags: PlaceholderFlags;
	width?: number;
	precision?: number;
	length?: LengthModifier;
	conversion: Conversion;
}

/**
 * Settings the conversions need from the formatter
 */
export interface ConversionContext {
	/** Reject fractional numbers for integer conversions */
	strictIntegers: boolean;

	/** Separator used by the `'` flag */
	groupingSeparator: string;

	/** Renders kind-tagged records for `%s` */
	display?: (record: KindRecord) => string | undefined;
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

/**
 * Type guard for kind-tagged records
 */
export function isKindRecord(value: unknown): value is KindRecord {
	return (
		typeof value === "object" &&
		value !== null &&
		!Array.isArray(value) &&
		"kind" in value &&
		typeof value.kind === "string"
	);
}

/**
 * Type guard for placeholder tokens
 */
export function isPlaceholderToken(token: Token): token is PlaceholderToken {
	return token.type === "placeholder";
}
