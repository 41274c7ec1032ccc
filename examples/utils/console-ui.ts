import chalk from "chalk";
import boxen from "boxen";
import Table from "cli-table3";

/**
 * Console helpers shared by the examples
 */
export class ConsoleUI {
	/**
	 * Show a boxed title for an example
	 */
	public static showHeader(title: string): void {
		console.log(
			"\n" +
				boxen(chalk.bold.cyan(title), {
					padding: { top: 0, bottom: 0, left: 2, right: 2 },
					borderStyle: "double",
					borderColor: "cyan",
				}) +
				"\n",
		);
	}

	/**
	 * Show a section header
	 */
	public static showSection(title: string, icon?: string): void {
		const fullTitle = icon ? `${icon}  ${title}` : title;
		console.log("\n" + chalk.bold.cyan(fullTitle));
		console.log(chalk.dim("─".repeat(60)));
	}

	/**
	 * Print a template next to what it produced
	 */
	public static showFormatted(template: string, output: string): void {
		console.log(`  ${chalk.yellow(template.padEnd(28))} ${chalk.dim("→")} ${chalk.white(output)}`);
	}

	/**
	 * Render rows as a table
	 */
	public static renderTable(head: string[], rows: string[][]): void {
		const table = new Table({
			head: head.map((column) => chalk.bold.cyan(column)),
			style: {
				head: [],
				border: ["cyan"],
			},
		});

		for (const row of rows) {
			table.push(row);
		}

		console.log(table.toString());
	}

	/**
	 * Show success message with features
	 */
	public static showSuccess(message: string, features?: string[]): void {
		let content = chalk.green.bold("✓ ") + chalk.white(message);

		if (features && features.length > 0) {
			const featureList = features.map(f => chalk.cyan("  • " + f)).join("\n");
			content += "\n\n" + chalk.dim("This example demonstrated:") + "\n" + featureList;
		}

		console.log(
			boxen(content, {
				padding: 1,
				margin: 1,
				borderStyle: "round",
				borderColor: "green",
			})
		);
	}

	/**
	 * Show error message
	 */
	public static showError(error: unknown): void {
		const message = error instanceof Error ? error.message : String(error);

		console.error("\n" + boxen(
			chalk.red.bold("❌ Error\n\n") + chalk.white(message),
			{
				padding: 1,
				margin: 1,
				borderStyle: "round",
				borderColor: "red",
			}
		));
	}
}
