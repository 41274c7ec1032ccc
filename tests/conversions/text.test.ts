import { describe, test, expect } from "vitest";
import { sprintf } from "../../src/sprintf.js";
import { ArgumentTypeError } from "../../src/core/shared/errors.js";

class Temperature {
	constructor(private readonly celsius: number) {}

	toString(): string {
		return `${this.celsius}°C`;
	}
}

// ============================================================================
// %s
// ============================================================================

describe("Text Conversions - %s", () => {
	test("should pad and align strings", () => {
		expect(sprintf("%s", "latte")).toBe("latte");
		expect(sprintf("%10s|", "latte")).toBe("     latte|");
		expect(sprintf("%-10s|", "latte")).toBe("latte     |");
	});

	test("should truncate to the precision", () => {
		expect(sprintf("%.3s", "espresso")).toBe("esp");
		expect(sprintf("%5.1s", "abc")).toBe("    a");
		expect(sprintf("%.10s", "abc")).toBe("abc");
	});

	test("should count code points, not UTF-16 units", () => {
		expect(sprintf("%.2s", "😀😃😄")).toBe("😀😃");
		expect(sprintf("%4s", "é😀")).toBe("  é😀");
	});

	test("should ignore the zero flag", () => {
		expect(sprintf("%05s", "ab")).toBe("   ab");
	});

	test("should stringify primitives", () => {
		expect(sprintf("%s %s %s %s", 42, 1.5, true, 10n)).toBe("42 1.5 true 10");
	});

	test("should print null and undefined as (null)", () => {
		expect(sprintf("%s|%s", null, undefined)).toBe("(null)|(null)");
	});

	test("should use a custom toString", () => {
		expect(sprintf("Today: %s", new Temperature(21))).toBe("Today: 21°C");
	});

	test("should fall back to JSON for plain objects", () => {
		expect(sprintf("%s", { size: "tall" })).toBe('{"size":"tall"}');
	});

	test("should print objects JSON cannot hold generically", () => {
		const loop: Record<string, unknown> = { name: "loop" };
		loop.self = loop;

		expect(sprintf("%s", { count: 1n })).toBe("[object Object]");
		expect(sprintf("%s", loop)).toBe("[object Object]");
	});

	test("should print objects without a prototype as JSON", () => {
		const bare: Record<string, unknown> = Object.create(null);
		expect(sprintf("%s", bare)).toBe("{}");

		bare.size = "tall";
		expect(sprintf("%s", bare)).toBe('{"size":"tall"}');
	});

	test("should join arrays", () => {
		expect(sprintf("%s", [1, 2])).toBe("1,2");
	});
});

// ============================================================================
// %c
// ============================================================================

describe("Text Conversions - %c", () => {
	test("should print a code point", () => {
		expect(sprintf("%c", 65)).toBe("A");
		expect(sprintf("%c", 0x1f600)).toBe("😀");
	});

	test("should take the first code point of a string", () => {
		expect(sprintf("%c", "xyz")).toBe("x");
		expect(sprintf("%c", "😀!")).toBe("😀");
		expect(sprintf("[%c]", "")).toBe("[]");
	});

	test("should pad to width", () => {
		expect(sprintf("%3c", 66)).toBe("  B");
		expect(sprintf("%-3c|", 66)).toBe("B  |");
	});

	test("should reject values that are not code points", () => {
		expect(() => sprintf("%c", -1)).toThrow(ArgumentTypeError);
		expect(() => sprintf("%c", 1.5)).toThrow(ArgumentTypeError);
		expect(() => sprintf("%c", 0x110000)).toThrow(ArgumentTypeError);
		expect(() => sprintf("%c", true)).toThrow(ArgumentTypeError);
	});
});
