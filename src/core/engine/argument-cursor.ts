/**
 * Argument cursor
 *
 * Hands out arguments to placeholders. Sequential reads advance a counter;
 * positional reads (`%2$s`, `*3$`) leave it alone, so one argument can be
 * referenced any number of times.
 *
 * @module engine/argument-cursor
 */

import { ArgumentTypeError, MissingArgumentError } from "../shared/errors.js";
import type { Amount, FormatValue } from "../shared/types.js";

/**
 * Argument and its 1-based position
 */
export interface ArgumentRead {
	value: FormatValue;
	position: number;
}

export class ArgumentCursor {
	private nextSequential = 0;
	private readonly used: boolean[];

	constructor(private readonly args: readonly FormatValue[]) {
		this.used = args.map(() => false);
	}

	/**
	 * Reads the next sequential argument
	 *
	 * @throws {MissingArgumentError} If the arguments are exhausted
	 */
	next(): ArgumentRead {
		this.nextSequential++;
		return this.at(this.nextSequential);
	}

	/**
	 * Reads argument `position` (1-based)
	 *
	 * @throws {MissingArgumentError} If there is no such argument
	 */
	at(position: number): ArgumentRead {
		if (position > this.args.length) {
			throw new MissingArgumentError(position, this.args.length);
		}
		this.used[position - 1] = true;
		return { value: this.args[position - 1], position };
	}

	/**
	 * Resolves a width or precision to a number
	 *
	 * @returns The amount, or undefined when the placeholder gave none
	 * @throws {ArgumentTypeError} If a `*` argument is not an integer
	 */
	amount(amount: Amount): number | undefined {
		switch (amount.source) {
			case "none":
				return undefined;
			case "fixed":
				return amount.value;
			case "next":
				return toAmount(this.next());
			case "positional":
				return toAmount(this.at(amount.position));
		}
	}

	/**
	 * 1-based positions of arguments never read
	 */
	unused(): number[] {
		const positions: number[] = [];
		this.used.forEach((wasUsed, index) => {
			if (!wasUsed) {
				positions.push(index + 1);
			}
		});
		return positions;
	}
}

function toAmount({ value, position }: ArgumentRead): number {
	if (typeof value === "number" && Number.isInteger(value)) {
		return value;
	}
	if (
		typeof value === "bigint" &&
		value >= BigInt(Number.MIN_SAFE_INTEGER) &&
		value <= BigInt(Number.MAX_SAFE_INTEGER)
	) {
		return Number(value);
	}
	throw new ArgumentTypeError("*", position, value, "an integer width or precision");
}
