import { Formatter, type VectorArgument } from "./core/engine/formatter.js";
import type { FormatValue } from "./core/shared/types.js";

let defaultFormatter: Formatter | undefined;

/**
 * Shared formatter behind the top-level helpers, created on first use
 */
export function getDefaultFormatter(): Formatter {
	if (!defaultFormatter) {
		defaultFormatter = new Formatter();
	}
	return defaultFormatter;
}

/**
 * Formats arguments into a printf-style template
 *
 * @example
 * ```typescript
 * sprintf('%02d', 7);          // '07'
 * sprintf('%.3f', 1 / 6);      // '0.167'
 * sprintf('%1$s-%1$s', 'ab');  // 'ab-ab'
 * ```
 */
export function sprintf(template: string, ...args: FormatValue[]): string {
	return getDefaultFormatter().formatArray(template, args);
}

/**
 * Like sprintf, with the arguments as an array
 */
export function vsprintf(template: string, args: readonly FormatValue[]): string {
	return getDefaultFormatter().formatArray(template, args);
}

/**
 * Vectorised sprintf: array arguments are recycled to the longest length
 *
 * @example
 * ```typescript
 * sprintfEach('%s=%d', ['a', 'b', 'c'], [1, 2]); // ['a=1', 'b=2', 'c=1']
 * ```
 */
export function sprintfEach(
	templates: string | readonly string[],
	...args: VectorArgument[]
): string[] {
	return getDefaultFormatter().formatEach(templates, ...args);
}
