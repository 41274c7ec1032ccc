/**
 * Fundamentals 03: Car Display
 *
 * Learn:
 * - Registering a display for a record kind
 * - Guarding a display with assertKind
 * - Mixing records and numbers in one template
 *
 * Run: npm run guide:03
 */

import {
	DisplayRegistry,
	Formatter,
	assertKind,
	getErrorMessage,
	type KindRecord,
} from "../../../src/index.js";
import { ConsoleUI } from "../../utils/console-ui.js";

// ============================================================================
// RECORDS
// ============================================================================

interface Car extends KindRecord {
	kind: "car";
	make: string;
	model: string;
	year: number;
	miles: number;
	gallons: number;
}

const cars: Car[] = [
	{ kind: "car", make: "Volvo", model: "240", year: 1988, miles: 412.5, gallons: 17.2 },
	{ kind: "car", make: "Honda", model: "Civic", year: 2004, miles: 355, gallons: 10.1 },
];

function mileage(car: Car): number {
	return car.miles / car.gallons;
}

// ============================================================================
// MAIN
// ============================================================================

function main(): void {
	ConsoleUI.showHeader("Fundamentals 03: Car Display");

	const displays = new DisplayRegistry();
	displays.register("car", (record) => {
		assertKind(record, "car");
		return `${String(record.year)} ${String(record.make)} ${String(record.model)}`;
	});

	const formatter = new Formatter({ displays });

	ConsoleUI.showSection("Mileage", "🚗");
	for (const car of cars) {
		console.log("  " + formatter.format("%-18s %5.1f mpg", car, mileage(car)));
	}

	ConsoleUI.showSection("Class guard", "🛑");
	const showCar = displays.get("car");
	try {
		showCar({ kind: "boat", name: "Dinghy" });
	} catch (error) {
		console.log("  " + getErrorMessage(error));
	}
	try {
		displays.render({ kind: "boat", name: "Dinghy" });
	} catch (error) {
		console.log("  " + getErrorMessage(error));
	}

	ConsoleUI.showSuccess("Cars displayed", [
		"Display registry",
		"Kind guards",
		"Records as %s arguments",
	]);
}

main();
