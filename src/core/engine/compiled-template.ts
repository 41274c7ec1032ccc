import type { ParsedTemplate } from "../parser/template-parser.js";
import type { FormatValue, PlaceholderToken, Token } from "../shared/types.js";
import type { Formatter } from "./formatter.js";

/**
 * Template parsed once and bound to the formatter that renders it
 */
export class CompiledTemplate {
	constructor(
		private readonly parsed: ParsedTemplate,
		private readonly formatter: Formatter,
	) {}

	get source(): string {
		return this.parsed.source;
	}

	get tokens(): readonly Token[] {
		return this.parsed.tokens;
	}

	get placeholders(): readonly PlaceholderToken[] {
		return this.parsed.placeholders;
	}

	/** Number of arguments a call to render needs */
	get argumentCount(): number {
		return this.parsed.argumentCount;
	}

	render(...args: FormatValue[]): string {
		return this.formatter.render(this.parsed, args);
	}

	renderArray(args: readonly FormatValue[]): string {
		return this.formatter.render(this.parsed, args);
	}
}
