/**
 * LRU cache of parsed templates
 *
 * @module engine/template-cache
 */

import { type ParsedTemplate, parseTemplate } from "../parser/template-parser.js";

export interface CacheStats {
	size: number;
	hits: number;
	misses: number;
}

export class TemplateCache {
	// Map iteration order doubles as recency order: oldest first
	private readonly entries = new Map<string, ParsedTemplate>();
	private hits = 0;
	private misses = 0;

	constructor(private readonly capacity: number) {}

	/**
	 * Returns the parsed template, parsing and caching it on a miss
	 *
	 * @throws {FormatSyntaxError} If the template is malformed
	 */
	get(template: string): ParsedTemplate {
		const cached = this.entries.get(template);
		if (cached) {
			this.hits++;
			this.entries.delete(template);
			this.entries.set(template, cached);
			return cached;
		}

		this.misses++;
		const parsed = parseTemplate(template);

		if (this.capacity > 0) {
			if (this.entries.size >= this.capacity) {
				const oldest = this.entries.keys().next();
				if (!oldest.done) {
					this.entries.delete(oldest.value);
				}
			}
			this.entries.set(template, parsed);
		}

		return parsed;
	}

	clear(): void {
		this.entries.clear();
		this.hits = 0;
		this.misses = 0;
	}

	stats(): CacheStats {
		return { size: this.entries.size, hits: this.hits, misses: this.misses };
	}
}
