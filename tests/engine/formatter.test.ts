import { describe, test, expect, vi, beforeEach } from "vitest";
import { Formatter } from "../../src/core/engine/formatter.js";
import { DisplayRegistry, assertKind } from "../../src/core/display/display-registry.js";
import {
	ArgumentParseError,
	ArgumentTypeError,
	FormatRangeError,
	MissingArgumentError,
	UnusedArgumentError,
	ValidationError,
} from "../../src/core/shared/errors.js";

// ============================================================================
// ARGUMENT SELECTION
// ============================================================================

describe("Formatter - Arguments", () => {
	let formatter: Formatter;
	let onWarning: ReturnType<typeof vi.fn>;

	beforeEach(() => {
		onWarning = vi.fn();
		formatter = new Formatter({ onWarning });
	});

	test("should reuse a positional argument without consuming more", () => {
		expect(formatter.format("%1$s and %1$s", "tea")).toBe("tea and tea");
		expect(onWarning).not.toHaveBeenCalled();
	});

	test("should reorder positional arguments", () => {
		expect(formatter.format("%2$s %1$s", "a", "b")).toBe("b a");
	});

	test("should not advance the sequential counter on positional reads", () => {
		expect(formatter.format("%s %1$s %s", "x", "y")).toBe("x x y");
	});

	test("should read star width before the value", () => {
		expect(formatter.format("%*d", 5, 42)).toBe("   42");
		expect(formatter.format("%-*d|", 4, 7)).toBe("7   |");
	});

	test("should left-align on a negative star width", () => {
		expect(formatter.format("%*d|", -4, 7)).toBe("7   |");
	});

	test("should read star precision", () => {
		expect(formatter.format("%.*f", 2, 3.14159)).toBe("3.14");
		expect(formatter.format("%*.*f", 8, 2, 3.14159)).toBe("    3.14");
	});

	test("should treat a negative star precision as omitted", () => {
		expect(formatter.format("%.*f", -1, 1 / 6)).toBe("0.166667");
	});

	test("should read positional star amounts", () => {
		expect(formatter.format("%1$*2$d", 7, 3)).toBe("  7");
	});

	test("should reject star amounts that are not integers", () => {
		expect(() => formatter.format("%*d", "5", 1)).toThrow(ArgumentTypeError);
		expect(() => formatter.format("%*d", 2.5, 1)).toThrow(
			'Invalid argument 1 for "%*": expected an integer width or precision, got number 2.5',
		);
	});

	test("should accept bigint star amounts", () => {
		expect(formatter.format("%*d", 3n, 1)).toBe("  1");
	});

	test("should throw for a missing sequential argument", () => {
		try {
			formatter.format("%s %s", "a");
			expect.fail("should have thrown");
		} catch (error) {
			expect(error).toBeInstanceOf(MissingArgumentError);
			if (error instanceof MissingArgumentError) {
				expect(error.position).toBe(2);
				expect(error.supplied).toBe(1);
				expect(error.message).toBe("Argument 2 is missing: only 1 supplied");
			}
		}
	});

	test("should throw for a missing positional argument", () => {
		expect(() => formatter.format("%3$s", "a", "b")).toThrow(
			"Argument 3 is missing: only 2 supplied",
		);
	});

	test("should format templates without placeholders", () => {
		expect(formatter.format("no placeholders, 100%%")).toBe(
			"no placeholders, 100%",
		);
	});
});

// ============================================================================
// UNUSED ARGUMENTS
// ============================================================================

describe("Formatter - Unused Arguments", () => {
	test("should warn through onWarning by default", () => {
		const onWarning = vi.fn();
		const formatter = new Formatter({ onWarning });

		expect(formatter.format("%s", "a", "b")).toBe("a");
		expect(onWarning).toHaveBeenCalledWith(
			'Argument 2 not used by format "%s"',
			{ positions: [2] },
		);
	});

	test("should warn on the console without onWarning", () => {
		new Formatter().format("%s", "a", "b");

		expect(console.warn).toHaveBeenCalledWith(
			'[fmtkit] Argument 2 not used by format "%s"',
			{ positions: [2] },
		);
	});

	test("should throw in error mode", () => {
		const formatter = new Formatter({ unusedArguments: "error" });

		try {
			formatter.format("%s", "a", "b", "c");
			expect.fail("should have thrown");
		} catch (error) {
			expect(error).toBeInstanceOf(UnusedArgumentError);
			if (error instanceof UnusedArgumentError) {
				expect(error.positions).toEqual([2, 3]);
				expect(error.message).toBe('Arguments 2, 3 not used by format "%s"');
			}
		}
	});

	test("should stay silent in ignore mode", () => {
		const onWarning = vi.fn();
		const formatter = new Formatter({ unusedArguments: "ignore", onWarning });

		expect(formatter.format("%s", "a", "b")).toBe("a");
		expect(onWarning).not.toHaveBeenCalled();
	});

	test("should count star arguments as used", () => {
		const onWarning = vi.fn();
		new Formatter({ onWarning }).format("%*d", 3, 1);

		expect(onWarning).not.toHaveBeenCalled();
	});
});

// ============================================================================
// LIMITS AND CONFIGURATION
// ============================================================================

describe("Formatter - Limits", () => {
	test("should reject widths beyond maxWidth", () => {
		const formatter = new Formatter({ maxWidth: 10 });

		try {
			formatter.format("%20s", "x");
			expect.fail("should have thrown");
		} catch (error) {
			expect(error).toBeInstanceOf(FormatRangeError);
			if (error instanceof FormatRangeError) {
				expect(error.field).toBe("width");
				expect(error.message).toBe("Width 20 exceeds the maximum of 10");
			}
		}
	});

	test("should reject precisions and star widths beyond maxWidth", () => {
		const formatter = new Formatter({ maxWidth: 10 });

		expect(() => formatter.format("%.50f", 1)).toThrow(
			"Precision 50 exceeds the maximum of 10",
		);
		expect(() => formatter.format("%*d", -11, 1)).toThrow(FormatRangeError);
	});

	test("should allow widths up to maxWidth", () => {
		expect(new Formatter({ maxWidth: 10 }).format("%10s", "x")).toBe(
			"         x",
		);
	});

	test("should validate its configuration", () => {
		expect(() => new Formatter({ cacheSize: -1 })).toThrow(ValidationError);
	});
});

// ============================================================================
// COMPILED TEMPLATES AND CACHE
// ============================================================================

describe("Formatter - Compiled Templates", () => {
	test("should render a compiled template repeatedly", () => {
		const row = new Formatter().compile("%-6s|%5.2f");

		expect(row.argumentCount).toBe(2);
		expect(row.placeholders).toHaveLength(2);
		expect(row.source).toBe("%-6s|%5.2f");
		expect(row.render("mocha", 3.5)).toBe("mocha | 3.50");
		expect(row.renderArray(["tea", 1])).toBe("tea   | 1.00");
	});

	test("should format argument arrays", () => {
		expect(new Formatter().formatArray("%s-%s", ["a", "b"])).toBe("a-b");
	});

	test("should count cache hits and misses", () => {
		const formatter = new Formatter();
		formatter.format("%d", 1);
		formatter.format("%d", 2);
		formatter.compile("%d");

		expect(formatter.cacheStats()).toEqual({ size: 1, hits: 2, misses: 1 });

		formatter.clearCache();
		expect(formatter.cacheStats()).toEqual({ size: 0, hits: 0, misses: 0 });
	});

	test("should evict the least recently used template", () => {
		const formatter = new Formatter({ cacheSize: 2 });
		formatter.format("a");
		formatter.format("b");
		formatter.format("a");
		formatter.format("c");
		formatter.format("a");

		expect(formatter.cacheStats()).toEqual({ size: 2, hits: 2, misses: 3 });

		formatter.format("b");
		expect(formatter.cacheStats()).toEqual({ size: 2, hits: 2, misses: 4 });
	});

	test("should not cache when cacheSize is 0", () => {
		const formatter = new Formatter({ cacheSize: 0 });
		formatter.format("%d", 1);
		formatter.format("%d", 1);

		expect(formatter.cacheStats()).toEqual({ size: 0, hits: 0, misses: 2 });
	});
});

// ============================================================================
// VECTORISED FORMATTING
// ============================================================================

describe("Formatter - formatEach", () => {
	const formatter = new Formatter();

	test("should format one string per element", () => {
		expect(formatter.formatEach("file_%02d.csv", [1, 2, 3])).toEqual([
			"file_01.csv",
			"file_02.csv",
			"file_03.csv",
		]);
	});

	test("should recycle shorter vectors", () => {
		expect(formatter.formatEach("%s=%d", ["a", "b", "c"], [1, 2])).toEqual([
			"a=1",
			"b=2",
			"c=1",
		]);
	});

	test("should recycle templates", () => {
		expect(formatter.formatEach(["%d!", "[%d]"], [1, 2, 3])).toEqual([
			"1!",
			"[2]",
			"3!",
		]);
	});

	test("should repeat scalars", () => {
		expect(formatter.formatEach("%s-%s", "x", ["a", "b"])).toEqual([
			"x-a",
			"x-b",
		]);
	});

	test("should return nothing for an empty vector", () => {
		expect(formatter.formatEach("%d", [])).toEqual([]);
		expect(formatter.formatEach([], 1)).toEqual([]);
	});

	test("should format a template without arguments once", () => {
		expect(formatter.formatEach("hi")).toEqual(["hi"]);
	});
});

// ============================================================================
// JSON ARGUMENTS
// ============================================================================

describe("Formatter - formatFromJSON", () => {
	const formatter = new Formatter();

	test("should repair single-quoted JSON", () => {
		expect(formatter.formatFromJSON("%s x%d", "['latte', 2]")).toBe("latte x2");
	});

	test("should keep brackets inside single-quoted strings", () => {
		expect(formatter.formatFromJSON("%s|%d", "['a]b', 2]")).toBe("a]b|2");
	});

	test("should read JSON inside markdown fences", () => {
		expect(formatter.formatFromJSON("%s", '```json\n["mocha"]\n```')).toBe("mocha");
	});

	test("should complete truncated arrays", () => {
		expect(formatter.formatFromJSON("%.1f|%s", '[1.5, "a",')).toBe("1.5|a");
	});

	test("should wrap a scalar into a one-element list", () => {
		expect(formatter.formatFromJSON("%d", "42")).toBe("42");
	});

	test("should reject empty input", () => {
		expect(() => formatter.formatFromJSON("%s", "  ")).toThrow(ArgumentParseError);
	});
});

// ============================================================================
// DISPLAYS
// ============================================================================

describe("Formatter - Displays", () => {
	const displays = new DisplayRegistry();
	displays.register("car", (record) => {
		assertKind(record, "car");
		return `${String(record.make)} ${String(record.model)}`;
	});
	const formatter = new Formatter({ displays });

	test("should render kind-tagged records through their display", () => {
		expect(
			formatter.format("Parked: %s", { kind: "car", make: "Volvo", model: "240" }),
		).toBe("Parked: Volvo 240");
	});

	test("should apply precision and width to the displayed text", () => {
		const car = { kind: "car", make: "Volvo", model: "240" };

		expect(formatter.format("%.5s", car)).toBe("Volvo");
		expect(formatter.format("%-12s|", car)).toBe("Volvo 240   |");
	});

	test("should fall back to JSON for kinds without a display", () => {
		expect(formatter.format("%s", { kind: "boat", name: "Ebb" })).toBe(
			'{"kind":"boat","name":"Ebb"}',
		);
	});
});
