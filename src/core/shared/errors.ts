/**
 * Custom error classes for fmtkit
 *
 * Provides structured error handling with error codes and typed details.
 * All errors extend FormatError for consistent error handling.
 *
 * @module shared/errors
 *
 * @example Catching specific errors
 * ```typescript
 * try {
 *   sprintf('%d items', 'three');
 * } catch (error) {
 *   if (error instanceof ArgumentTypeError) {
 *     console.log('Bad value for', error.conversion);
 *   } else if (error instanceof FormatSyntaxError) {
 *     console.log('Broken template at', error.offset);
 *   }
 * }
 * ```
 */

// ============================================================================
// BASE ERROR
// ============================================================================

/**
 * Base error class for all fmtkit errors
 *
 * Provides structured error information with error codes and optional details.
 * All custom errors extend this class.
 */
export class FormatError extends Error {
	/** Error code for programmatic handling */
	public readonly code: string;

	/** Optional additional error details */
	public readonly details?: unknown;

	constructor(message: string, code: string, details?: unknown) {
		super(message);
		this.name = "FormatError";
		this.code = code;
		this.details = details;

		// Maintains proper stack trace for where our error was thrown (V8 only)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}
}

// ============================================================================
// TEMPLATE ERRORS
// ============================================================================

/**
 * Error thrown when a template contains a malformed placeholder
 *
 * @example
 * ```typescript
 * // Unknown conversion letter
 * throw new FormatSyntaxError('Unknown conversion "%k"', 'rate: %k', 6);
 * ```
 */
export class FormatSyntaxError extends FormatError {
	/** Template being parsed */
	public readonly template: string;

	/** Offset of the offending `%` in the template */
	public readonly offset: number;

	constructor(message: string, template: string, offset: number) {
		super(`${message} at offset ${offset}`, "FORMAT_SYNTAX", {
			template,
			offset,
		});
		this.name = "FormatSyntaxError";
		this.template = template;
		this.offset = offset;
	}
}

/**
 * Error thrown when a width or precision exceeds the configured limit
 */
export class FormatRangeError extends FormatError {
	/** Which part of the placeholder was out of range */
	public readonly field: "width" | "precision";

	constructor(field: "width" | "precision", provided: number, maximum: number) {
		super(
			`${field === "width" ? "Width" : "Precision"} ${provided} exceeds the maximum of ${maximum}`,
			"FORMAT_RANGE",
			{ field, provided, maximum },
		);
		this.name = "FormatRangeError";
		this.field = field;
	}
}

// ============================================================================
// ARGUMENT ERRORS
// ============================================================================

/**
 * Error thrown when a placeholder references an argument that was not supplied
 *
 * @example
 * ```typescript
 * // sprintf('%s and %s', 'tea') needs two arguments
 * throw new MissingArgumentError(2, 1);
 * ```
 */
export class MissingArgumentError extends FormatError {
	/** 1-based position of the missing argument */
	public readonly position: number;

	/** Number of arguments actually supplied */
	public readonly supplied: number;

	constructor(position: number, supplied: number) {
		super(
			`Argument ${position} is missing: only ${supplied} supplied`,
			"MISSING_ARGUMENT",
			{ position, supplied },
		);
		this.name = "MissingArgumentError";
		this.position = position;
		this.supplied = supplied;
	}
}

/**
 * Error thrown for arguments no placeholder used, when configured to be fatal
 */
export class UnusedArgumentError extends FormatError {
	/** 1-based positions of the unused arguments */
	public readonly positions: number[];

	constructor(positions: number[], template: string) {
		super(
			`${positions.length === 1 ? "Argument" : "Arguments"} ${positions.join(", ")} not used by format "${template}"`,
			"UNUSED_ARGUMENT",
			{ positions, template },
		);
		this.name = "UnusedArgumentError";
		this.positions = positions;
	}
}

/**
 * Error thrown when a value cannot be rendered by a conversion
 *
 * @example
 * ```typescript
 * // %d given a fractional number
 * throw new ArgumentTypeError('d', 1, 2.5, 'an integer');
 * ```
 */
export class ArgumentTypeError extends FormatError {
	/** Conversion letter (or `*` for a width/precision argument) */
	public readonly conversion: string;

	/** 1-based position of the argument */
	public readonly position: number;

	constructor(
		conversion: string,
		position: number,
		value: unknown,
		expected: string,
	) {
		super(
			`Invalid argument ${position} for "%${conversion}": expected ${expected}, got ${describeValue(value)}`,
			"ARGUMENT_TYPE",
			{ conversion, position, expected },
		);
		this.name = "ArgumentTypeError";
		this.conversion = conversion;
		this.position = position;
	}
}

/**
 * Error thrown when a JSON argument list cannot be used
 */
export class ArgumentParseError extends FormatError {
	constructor(message: string, details?: unknown) {
		super(message, "ARGUMENT_PARSE", details);
		this.name = "ArgumentParseError";
	}
}

// ============================================================================
// DISPLAY ERRORS
// ============================================================================

/**
 * Error thrown when a display is registered twice for the same kind
 */
export class DisplayRegistrationError extends FormatError {
	/** Kind that was already registered */
	public readonly kind: string;

	constructor(kind: string) {
		super(`Display for kind "${kind}" is already registered`, "DISPLAY_REGISTRATION", {
			kind,
		});
		this.name = "DisplayRegistrationError";
		this.kind = kind;
	}
}

/**
 * Error thrown when no display exists for a record kind
 */
export class DisplayNotFoundError extends FormatError {
	/** The kind that was requested */
	public readonly kind: string;

	/** Kinds that are registered */
	public readonly available: string[];

	constructor(kind: string, available: string[]) {
		super(
			`Display for kind "${kind}" not found. Available: ${available.length > 0 ? available.join(", ") : "(none)"}`,
			"DISPLAY_NOT_FOUND",
			{ kind, available },
		);
		this.name = "DisplayNotFoundError";
		this.kind = kind;
		this.available = available;
	}
}

/**
 * Error thrown when a display receives a value of the wrong kind
 *
 * @example
 * ```typescript
 * assertKind(boat, 'car'); // RecordKindError: expected a "car" record, got "boat"
 * ```
 */
export class RecordKindError extends FormatError {
	/** Kind the caller required */
	public readonly expected: string;

	/** Kind that was found, if the value carried one */
	public readonly actual?: string;

	constructor(expected: string, actual?: string) {
		super(
			actual === undefined
				? `Expected a "${expected}" record, got a value without a kind`
				: `Expected a "${expected}" record, got "${actual}"`,
			"RECORD_KIND",
			{ expected, actual },
		);
		this.name = "RecordKindError";
		this.expected = expected;
		if (actual !== undefined) {
			this.actual = actual;
		}
	}
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

/**
 * Error thrown when formatter configuration fails validation
 *
 * @example
 * ```typescript
 * throw new ValidationError('Cache size must be an integer', 'cacheSize', {
 *   provided: 1.5
 * });
 * ```
 */
export class ValidationError extends FormatError {
	/** The field that failed validation */
	public readonly field?: string;

	constructor(message: string, field?: string, details?: unknown) {
		super(
			message,
			"VALIDATION_ERROR",
			ValidationError.buildDetails(field, details),
		);
		this.name = "ValidationError";
		if (field !== undefined) {
			this.field = field;
		}
	}

	private static buildDetails(
		field?: string,
		details?: unknown,
	): Record<string, unknown> {
		const result: Record<string, unknown> = {};

		if (field !== undefined) {
			result.field = field;
		}

		if (details !== undefined && typeof details === "object" && details !== null) {
			Object.assign(result, details);
		}

		return result;
	}
}

// ============================================================================
// ERROR UTILITIES
// ============================================================================

/**
 * Type guard to check if an error is a FormatError
 *
 * @example
 * ```typescript
 * if (isFormatError(error)) {
 *   console.log('Error code:', error.code);
 * }
 * ```
 */
export function isFormatError(error: unknown): error is FormatError {
	return error instanceof FormatError;
}

/**
 * Gets error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	if (typeof error === "string") {
		return error;
	}
	return String(error);
}

function describeValue(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	if (typeof value === "string") return `string "${value}"`;
	if (typeof value === "number" || typeof value === "bigint") {
		return `${typeof value} ${String(value)}`;
	}
	return typeof value;
}
