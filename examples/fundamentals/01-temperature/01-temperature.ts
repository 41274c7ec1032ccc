/**
 * Fundamentals 01: Temperature Conversion
 *
 * Learn:
 * - Width and precision for floating point
 * - Sign flags
 * - Compiling a template once and rendering it many times
 *
 * Run: npm run guide:01
 */

import { Formatter, sprintf } from "../../../src/index.js";
import { ConsoleUI } from "../../utils/console-ui.js";

// ============================================================================
// CONVERSION
// ============================================================================

function toFahrenheit(celsius: number): number {
	return (celsius * 9) / 5 + 32;
}

// ============================================================================
// MAIN
// ============================================================================

function main(): void {
	ConsoleUI.showHeader("Fundamentals 01: Temperature Conversion");

	ConsoleUI.showSection("Single values", "🌡");
	const templates = ["%f", "%.1f", "%8.2f", "%+.1f", "%e", "%g"];
	for (const template of templates) {
		ConsoleUI.showFormatted(template, sprintf(template, toFahrenheit(21.5)));
	}

	ConsoleUI.showSection("Conversion table", "📋");
	const formatter = new Formatter();
	const row = formatter.compile("%+6.1f°C = %6.1f°F");
	for (let celsius = -20; celsius <= 40; celsius += 10) {
		console.log("  " + row.render(celsius, toFahrenheit(celsius)));
	}

	ConsoleUI.showSuccess("Temperatures formatted", [
		"Fixed, exponent and shortest float notation",
		"Width and precision",
		"Compiled templates",
	]);
}

main();
