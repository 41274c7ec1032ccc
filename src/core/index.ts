/**
 * @module fmtkit/core
 *
 * Core of the printf-style formatter.
 *
 * @example Basic Usage
 * ```typescript
 * import { Formatter } from 'fmtkit';
 *
 * const formatter = new Formatter({ unusedArguments: 'error' });
 * formatter.format('%-8s|%6.2f', 'latte', 3.5); // 'latte   |  3.50'
 * ```
 *
 * @example With displays
 * ```typescript
 * const displays = new DisplayRegistry();
 * displays.register('car', (record) => {
 *   assertKind(record, 'car');
 *   return `${String(record.make)} (${String(record.year)})`;
 * });
 *
 * new Formatter({ displays }).format('%s', { kind: 'car', make: 'Saab', year: 1987 });
 * // 'Saab (1987)'
 * ```
 */

// ============================================================================
// MAIN FORMATTER
// ============================================================================

export { Formatter } from "./engine/formatter.js";
export type { VectorArgument } from "./engine/formatter.js";
export { CompiledTemplate } from "./engine/compiled-template.js";
export type { CacheStats } from "./engine/template-cache.js";

// ============================================================================
// CONFIGURATION
// ============================================================================

export type {
	FormatterConfig,
	ResolvedFormatterConfig,
	UnusedArgumentMode,
	WarningHandler,
} from "./engine/formatter-config.js";

export { consoleWarning, resolveFormatterConfig } from "./engine/formatter-config.js";

// ============================================================================
// PARSER
// ============================================================================

export { parseTemplate } from "./parser/template-parser.js";
export type { ParsedTemplate } from "./parser/template-parser.js";

// ============================================================================
// DISPLAYS
// ============================================================================

export { DisplayRegistry, assertKind } from "./display/display-registry.js";
export type { Display } from "./display/display-registry.js";

// ============================================================================
// VALIDATION
// ============================================================================

export { ConfigValidator, TemplateValidator } from "./validation/index.js";
export type {
	TemplateCheckOptions,
	TemplateCheckResult,
	TemplateIssue,
} from "./validation/index.js";

// ============================================================================
// CORE TYPES
// ============================================================================

export type {
	Amount,
	Conversion,
	FormatValue,
	KindRecord,
	LengthModifier,
	LiteralToken,
	PlaceholderFlags,
	PlaceholderSpec,
	PlaceholderToken,
	Token,
} from "./shared/types.js";

export { isKindRecord, isPlaceholderToken } from "./shared/types.js";

// ============================================================================
// ERRORS
// ============================================================================

export {
	FormatError,
	FormatSyntaxError,
	FormatRangeError,
	MissingArgumentError,
	UnusedArgumentError,
	ArgumentTypeError,
	ArgumentParseError,
	DisplayRegistrationError,
	DisplayNotFoundError,
	RecordKindError,
	ValidationError,
	isFormatError,
	getErrorMessage,
} from "./shared/errors.js";

// ============================================================================
// CONSTANTS
// ============================================================================

export {
	DEFAULT_FORMATTER_CONFIG,
	VALIDATION,
	WARNING_MESSAGES,
} from "./shared/constants.js";
