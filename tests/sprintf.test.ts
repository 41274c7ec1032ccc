import { describe, test, expect } from "vitest";
import {
	sprintf,
	vsprintf,
	sprintfEach,
	getDefaultFormatter,
} from "../src/sprintf.js";
import { Formatter } from "../src/core/engine/formatter.js";

describe("sprintf", () => {
	test("should zero pad integers", () => {
		expect(sprintf("%02d", 7)).toBe("07");
		expect(sprintf("%02d", 42)).toBe("42");
	});

	test("should round fixed notation", () => {
		expect(sprintf("%f", 1 / 6)).toBe("0.166667");
		expect(sprintf("%.3f", 1 / 6)).toBe("0.167");
	});

	test("should reuse positional arguments", () => {
		expect(sprintf("%1$s-%1$s", "ab")).toBe("ab-ab");
	});

	test("should combine conversions in one template", () => {
		expect(sprintf("%s: %5.1f°F (%+d)", "Oslo", 41.36, -3)).toBe(
			"Oslo:  41.4°F (-3)",
		);
	});
});

describe("vsprintf", () => {
	test("should take arguments as an array", () => {
		expect(vsprintf("%s has %d cups", ["Ada", 3])).toBe("Ada has 3 cups");
	});
});

describe("sprintfEach", () => {
	test("should recycle vectors", () => {
		expect(sprintfEach("%s=%d", ["a", "b", "c"], [1, 2])).toEqual([
			"a=1",
			"b=2",
			"c=1",
		]);
	});
});

describe("getDefaultFormatter", () => {
	test("should return one shared formatter", () => {
		const formatter = getDefaultFormatter();

		expect(formatter).toBeInstanceOf(Formatter);
		expect(getDefaultFormatter()).toBe(formatter);
	});
});
