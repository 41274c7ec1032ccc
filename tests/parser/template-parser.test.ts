import { describe, test, expect } from "vitest";
import { parseTemplate } from "../../src/core/parser/template-parser.js";
import { FormatSyntaxError } from "../../src/core/shared/errors.js";

// ============================================================================
// TOKENISING
// ============================================================================

describe("TemplateParser - Tokens", () => {
	test("should return a single literal for plain text", () => {
		const parsed = parseTemplate("plain text");

		expect(parsed.tokens).toEqual([{ type: "literal", text: "plain text" }]);
		expect(parsed.placeholders).toEqual([]);
		expect(parsed.argumentCount).toBe(0);
	});

	test("should return no tokens for an empty template", () => {
		expect(parseTemplate("").tokens).toEqual([]);
	});

	test("should collapse %% into a literal percent sign", () => {
		expect(parseTemplate("100%% sure").tokens).toEqual([
			{ type: "literal", text: "100% sure" },
		]);
	});

	test("should split literals and placeholders with offsets", () => {
		const parsed = parseTemplate("%s is %d");

		expect(parsed.tokens).toHaveLength(3);
		expect(parsed.tokens[1]).toEqual({ type: "literal", text: " is " });
		expect(parsed.placeholders.map((p) => [p.source, p.start, p.end])).toEqual([
			["%s", 0, 2],
			["%d", 6, 8],
		]);
	});

	test("should keep the source template", () => {
		expect(parseTemplate("x=%d").source).toBe("x=%d");
	});
});

// ============================================================================
// PLACEHOLDER GRAMMAR
// ============================================================================

describe("TemplateParser - Placeholder Grammar", () => {
	test("should parse position, flags, width, precision and length", () => {
		const [placeholder] = parseTemplate("%2$-+08.3lf").placeholders;

		expect(placeholder?.spec).toEqual({
			position: 2,
			flags: {
				leftAlign: true,
				sign: true,
				space: false,
				zeroPad: true,
				alternate: false,
				grouping: false,
			},
			width: { source: "fixed", value: 8 },
			precision: { source: "fixed", value: 3 },
			length: "l",
			conversion: "f",
		});
	});

	test("should read a leading zero as a flag, not a width digit", () => {
		const [placeholder] = parseTemplate("%05d").placeholders;

		expect(placeholder?.spec.flags.zeroPad).toBe(true);
		expect(placeholder?.spec.width).toEqual({ source: "fixed", value: 5 });
	});

	test("should parse space, alternate and grouping flags", () => {
		const [placeholder] = parseTemplate("% #'x").placeholders;

		expect(placeholder?.spec.flags).toMatchObject({
			space: true,
			alternate: true,
			grouping: true,
		});
	});

	test("should treat a bare dot as precision zero", () => {
		const [placeholder] = parseTemplate("%.f").placeholders;
		expect(placeholder?.spec.precision).toEqual({ source: "fixed", value: 0 });
	});

	test("should parse star width and precision", () => {
		const [placeholder] = parseTemplate("%*.*f").placeholders;

		expect(placeholder?.spec.width).toEqual({ source: "next" });
		expect(placeholder?.spec.precision).toEqual({ source: "next" });
	});

	test("should parse positional star width and precision", () => {
		const [placeholder] = parseTemplate("%1$*3$.*2$d").placeholders;

		expect(placeholder?.spec.position).toBe(1);
		expect(placeholder?.spec.width).toEqual({ source: "positional", position: 3 });
		expect(placeholder?.spec.precision).toEqual({
			source: "positional",
			position: 2,
		});
	});

	test.each([
		["%hhd", "hh"],
		["%hd", "h"],
		["%ld", "l"],
		["%lld", "ll"],
		["%zu", "z"],
		["%jd", "j"],
		["%Lf", "L"],
	])("should parse length modifier in %s", (template, length) => {
		expect(parseTemplate(template).placeholders[0]?.spec.length).toBe(length);
	});

	test("should leave position and length out when absent", () => {
		const [placeholder] = parseTemplate("%s").placeholders;

		expect(placeholder?.spec).not.toHaveProperty("position");
		expect(placeholder?.spec).not.toHaveProperty("length");
	});
});

// ============================================================================
// ARGUMENT COUNT
// ============================================================================

describe("TemplateParser - Argument Count", () => {
	test("should count one argument per sequential placeholder", () => {
		expect(parseTemplate("%s %d %f").argumentCount).toBe(3);
	});

	test("should count star amounts as arguments", () => {
		expect(parseTemplate("%*.*f").argumentCount).toBe(3);
	});

	test("should count a repeated position once", () => {
		expect(parseTemplate("%1$s %1$s").argumentCount).toBe(1);
	});

	test("should use the highest position", () => {
		expect(parseTemplate("%3$s").argumentCount).toBe(3);
		expect(parseTemplate("%1$*3$.*2$d").argumentCount).toBe(3);
	});

	test("should take the larger of sequential and positional counts", () => {
		expect(parseTemplate("%s %2$s %s").argumentCount).toBe(2);
		expect(parseTemplate("%s %s %s %1$s").argumentCount).toBe(3);
	});
});

// ============================================================================
// SYNTAX ERRORS
// ============================================================================

describe("TemplateParser - Syntax Errors", () => {
	test("should reject a percent sign at the end", () => {
		try {
			parseTemplate("50%");
			expect.fail("should have thrown");
		} catch (error) {
			expect(error).toBeInstanceOf(FormatSyntaxError);
			if (error instanceof FormatSyntaxError) {
				expect(error.offset).toBe(2);
				expect(error.template).toBe("50%");
				expect(error.code).toBe("FORMAT_SYNTAX");
				expect(error.message).toBe(
					"Incomplete placeholder at end of template at offset 2",
				);
			}
		}
	});

	test("should reject an incomplete placeholder after flags", () => {
		expect(() => parseTemplate("abc %-")).toThrow(
			"Incomplete placeholder at end of template at offset 4",
		);
	});

	test("should reject unknown conversions", () => {
		expect(() => parseTemplate("rate: %k")).toThrow(
			'Unknown conversion "%k" at offset 6',
		);
	});

	test("should reject %n and %p", () => {
		expect(() => parseTemplate("%n")).toThrow(/is not supported/);
		expect(() => parseTemplate("%p")).toThrow(/pointer address/);
	});

	test("should reject position zero", () => {
		expect(() => parseTemplate("%0$d")).toThrow(
			"Argument positions start at 1 at offset 0",
		);
		expect(() => parseTemplate("%*0$d")).toThrow(FormatSyntaxError);
	});

	test("should reject %% with flags or width", () => {
		expect(() => parseTemplate("%5%")).toThrow(FormatSyntaxError);
		expect(() => parseTemplate("%-%")).toThrow(FormatSyntaxError);
	});
});
