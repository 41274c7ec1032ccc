/**
 * Fundamentals 04: Coffee Prices
 *
 * Learn:
 * - Aligning text and numbers in columns
 * - Thousands grouping with the ' flag
 * - Falling back when a lookup has no match
 *
 * Run: npm run guide:04
 */

import { Formatter } from "../../../src/index.js";
import { ConsoleUI } from "../../utils/console-ui.js";

// ============================================================================
// PRICES
// ============================================================================

type Size = "small" | "medium" | "large";

const BASE_PRICE: Record<string, number> = {
	espresso: 2.2,
	latte: 3.5,
	"flat white": 3.3,
	mocha: 3.9,
};

const SIZE_FACTOR: Record<Size, number> = {
	small: 1,
	medium: 1.25,
	large: 1.5,
};

function isSize(value: string): value is Size {
	return value in SIZE_FACTOR;
}

/**
 * Price for a size; unknown sizes fall back to small
 */
function priceFor(drink: string, size: string): number {
	const base = BASE_PRICE[drink] ?? 0;
	const factor = isSize(size) ? SIZE_FACTOR[size] : SIZE_FACTOR.small;
	return base * factor;
}

// ============================================================================
// MAIN
// ============================================================================

function main(): void {
	ConsoleUI.showHeader("Fundamentals 04: Coffee Prices");

	const formatter = new Formatter();

	ConsoleUI.showSection("Plain columns", "☕");
	const line = formatter.compile("%-12s %6.2f %6.2f %6.2f");
	for (const drink of Object.keys(BASE_PRICE)) {
		console.log(
			"  " +
				line.render(
					drink,
					priceFor(drink, "small"),
					priceFor(drink, "medium"),
					priceFor(drink, "large"),
				),
		);
	}

	ConsoleUI.showSection("Table", "📋");
	const money = formatter.compile("$%.2f");
	ConsoleUI.renderTable(
		["Drink", "Small", "Medium", "Large"],
		Object.keys(BASE_PRICE).map((drink) => [
			drink,
			money.render(priceFor(drink, "small")),
			money.render(priceFor(drink, "medium")),
			money.render(priceFor(drink, "large")),
		]),
	);

	ConsoleUI.showSection("Unknown size", "❓");
	console.log("  " + formatter.format("latte (%s): %.2f", "venti", priceFor("latte", "venti")));

	ConsoleUI.showSection("Yearly revenue", "📈");
	console.log("  " + formatter.format("%'.2f", 1284350.5));

	ConsoleUI.showSuccess("Prices listed", [
		"Column alignment",
		"Lookup fallback",
		"Thousands grouping",
	]);
}

main();
