/**
 * Fundamentals 02: File Names
 *
 * Learn:
 * - Zero padding with %0Nd
 * - Vectorised formatting: array arguments are recycled
 * - Positional arguments
 *
 * Run: npm run guide:02
 */

import { sprintf, sprintfEach } from "../../../src/index.js";
import { ConsoleUI } from "../../utils/console-ui.js";

// ============================================================================
// MAIN
// ============================================================================

function main(): void {
	ConsoleUI.showHeader("Fundamentals 02: File Names");

	ConsoleUI.showSection("Numbered files", "📁");
	const indices = [1, 2, 3, 10, 11];
	for (const name of sprintfEach("scan_%03d.png", indices)) {
		console.log("  " + name);
	}

	ConsoleUI.showSection("Recycled arguments", "♻️");
	const names = sprintfEach("%s-%02d.%s", ["left", "right"], [1, 2, 3, 4], "csv");
	for (const name of names) {
		console.log("  " + name);
	}

	ConsoleUI.showSection("Positional arguments", "🔢");
	ConsoleUI.showFormatted(
		"%2$s/%1$s_%2$s.log",
		sprintf("%2$s/%1$s_%2$s.log", "server", "2024-03-01"),
	);

	ConsoleUI.showSuccess("File names generated", [
		"Zero padding",
		"Argument recycling",
		"Positional references",
	]);
}

main();
