/**
 * Formatter configuration types and defaults
 *
 * Provides the configuration interface for the Formatter with
 * sensible defaults.
 *
 * @module engine/formatter-config
 */

import type { DisplayRegistry } from "../display/display-registry.js";
import { DEFAULT_FORMATTER_CONFIG } from "../shared/constants.js";

/**
 * What to do with arguments that no placeholder references
 */
export type UnusedArgumentMode = "ignore" | "warn" | "error";

/**
 * Receives warnings raised while formatting
 */
export type WarningHandler = (message: string, details?: unknown) => void;

/**
 * Main configuration interface for the Formatter
 *
 * @example Basic configuration
 * ```typescript
 * const formatter = new Formatter({
 *   groupingSeparator: '.',
 *   unusedArguments: 'error'
 * });
 * ```
 *
 * @example With displays for kind-tagged records
 * ```typescript
 * const displays = new DisplayRegistry();
 * displays.register('car', (car) => `${car.make} ${car.model}`);
 *
 * const formatter = new Formatter({ displays });
 * formatter.format('Parked: %s', { kind: 'car', make: 'Volvo', model: '240' });
 * ```
 */
export interface FormatterConfig {
	/**
	 * Reject fractional numbers for `d i u o x X`
	 *
	 * When false, fractional numbers are truncated toward zero.
	 *
	 * @default true
	 */
	strictIntegers?: boolean;

	/**
	 * What to do with arguments no placeholder references
	 *
	 * @default "warn"
	 */
	unusedArguments?: UnusedArgumentMode;

	/**
	 * Separator inserted between digit groups by the `'` flag
	 *
	 * @default ","
	 */
	groupingSeparator?: string;

	/**
	 * Largest width or precision a placeholder may ask for
	 *
	 * @default 10000
	 * @minimum 1
	 * @maximum 1000000
	 */
	maxWidth?: number;

	/**
	 * Number of compiled templates kept in the formatter's LRU cache
	 *
	 * 0 disables caching.
	 *
	 * @default 128
	 */
	cacheSize?: number;

	/** Displays used by `%s` for kind-tagged records */
	displays?: DisplayRegistry;

	/**
	 * Warning sink
	 *
	 * @default console.warn
	 */
	onWarning?: WarningHandler;
}

/**
 * Fully resolved configuration
 */
export interface ResolvedFormatterConfig {
	strictIntegers: boolean;
	unusedArguments: UnusedArgumentMode;
	groupingSeparator: string;
	maxWidth: number;
	cacheSize: number;
	displays?: DisplayRegistry;
	onWarning: WarningHandler;
}

/**
 * Writes warnings to the console
 */
export const consoleWarning: WarningHandler = (message, details) => {
	if (details === undefined) {
		console.warn(`[fmtkit] ${message}`);
	} else {
		console.warn(`[fmtkit] ${message}`, details);
	}
};

/**
 * Merges user configuration over the defaults
 */
export function resolveFormatterConfig(
	config: FormatterConfig = {},
): ResolvedFormatterConfig {
	const resolved: ResolvedFormatterConfig = {
		strictIntegers: config.strictIntegers ?? DEFAULT_FORMATTER_CONFIG.STRICT_INTEGERS,
		unusedArguments:
			config.unusedArguments ?? DEFAULT_FORMATTER_CONFIG.UNUSED_ARGUMENTS,
		groupingSeparator:
			config.groupingSeparator ?? DEFAULT_FORMATTER_CONFIG.GROUPING_SEPARATOR,
		maxWidth: config.maxWidth ?? DEFAULT_FORMATTER_CONFIG.MAX_WIDTH,
		cacheSize: config.cacheSize ?? DEFAULT_FORMATTER_CONFIG.CACHE_SIZE,
		onWarning: config.onWarning ?? consoleWarning,
	};

	if (config.displays) {
		resolved.displays = config.displays;
	}

	return resolved;
}
