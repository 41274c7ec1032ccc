import {
	DisplayNotFoundError,
	DisplayRegistrationError,
	RecordKindError,
} from "../shared/errors.js";
import { type KindRecord, isKindRecord } from "../shared/types.js";

/**
 * Turns a kind-tagged record into text
 */
export type Display<T extends KindRecord = KindRecord> = (record: T) => string;

export class DisplayRegistry {
	private readonly displays = new Map<string, Display>();

	register(kind: string, display: Display): void {
		if (this.displays.has(kind)) {
			throw new DisplayRegistrationError(kind);
		}
		this.displays.set(kind, display);
	}

	get(kind: string): Display {
		const display = this.displays.get(kind);
		if (!display) {
			throw new DisplayNotFoundError(kind, this.list());
		}
		return display;
	}

	has(kind: string): boolean {
		return this.displays.has(kind);
	}

	list(): string[] {
		return Array.from(this.displays.keys());
	}

	render(record: KindRecord): string {
		return this.get(record.kind)(record);
	}

	/**
	 * Like render, but undefined for kinds without a display
	 */
	tryRender(record: KindRecord): string | undefined {
		const display = this.displays.get(record.kind);
		return display ? display(record) : undefined;
	}
}

/**
 * Guards a display against records of another kind
 *
 * @throws {RecordKindError} If the value is not a record of the given kind
 */
export function assertKind(value: unknown, kind: string): asserts value is KindRecord {
	if (!isKindRecord(value)) {
		throw new RecordKindError(kind);
	}
	if (value.kind !== kind) {
		throw new RecordKindError(kind, value.kind);
	}
}
