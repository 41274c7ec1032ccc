/**
 * Fundamentals 05: Error Handling
 *
 * Demonstrates the typed errors and the template validator.
 *
 * Learn:
 * - Error codes on FormatError
 * - Unused argument modes
 * - Checking templates without throwing
 *
 * Run: npm run guide:05
 */

import {
	Formatter,
	TemplateValidator,
	isFormatError,
	getErrorMessage,
	type FormatValue,
} from "../../../src/index.js";
import { ConsoleUI } from "../../utils/console-ui.js";

// ============================================================================
// CASES
// ============================================================================

interface FailureCase {
	template: string;
	args: FormatValue[];
}

const failures: FailureCase[] = [
	{ template: "%d km", args: [] },
	{ template: "%d km", args: [12.5] },
	{ template: "%k", args: [1] },
	{ template: "%s", args: ["a", "b"] },
	{ template: "%*d", args: [20000, 1] },
];

// ============================================================================
// MAIN
// ============================================================================

function main(): void {
	ConsoleUI.showHeader("Fundamentals 05: Error Handling");

	const formatter = new Formatter({ unusedArguments: "error" });

	ConsoleUI.showSection("Typed errors", "⚠️");
	for (const { template, args } of failures) {
		try {
			formatter.formatArray(template, args);
		} catch (error) {
			const code = isFormatError(error) ? error.code : "UNKNOWN";
			console.log(`  ${template.padEnd(8)} ${code.padEnd(18)} ${getErrorMessage(error)}`);
		}
	}

	ConsoleUI.showSection("Lenient formatting", "🩹");
	const lenient = new Formatter({
		strictIntegers: false,
		unusedArguments: "warn",
		onWarning: (message) => console.log("  warning: " + message),
	});
	console.log("  " + lenient.format("%d km", 12.5, "extra"));

	ConsoleUI.showSection("Template check", "🔍");
	const result = TemplateValidator.check("%-05d|%s", [7]);
	console.log(`  valid: ${String(result.valid)}`);
	for (const issue of [...result.errors, ...result.warnings]) {
		console.log(`  ${issue.code}: ${issue.message}`);
	}

	ConsoleUI.showSuccess("Errors handled", [
		"Error codes",
		"Unused argument policies",
		"Non-throwing validation",
	]);
}

try {
	main();
} catch (error) {
	ConsoleUI.showError(error);
	process.exit(1);
}
