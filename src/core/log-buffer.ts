export const DEFAULT_LOG_CAPACITY = 500;

/**
 * Append-only, bounded list of progress lines shared between background work
 * and the renderer. Once full, the oldest line is dropped for every append.
 */
export class LogBuffer {
	private readonly entries: string[] = [];
	private appended = 0;

	constructor(private readonly capacity = DEFAULT_LOG_CAPACITY) {}

	append(line: string): void {
		this.entries.push(line);
		this.appended++;
		if (this.entries.length > this.capacity) {
			this.entries.splice(0, this.entries.length - this.capacity);
		}
	}

	/** Copy of the buffered lines, optionally only the last `limit`. */
	lines(limit?: number): string[] {
		if (limit === undefined) return [...this.entries];
		if (limit <= 0) return [];
		return this.entries.slice(-limit);
	}

	get size(): number {
		return this.entries.length;
	}

	/** Count of appends so far; keeps growing after the buffer is full. */
	get revision(): number {
		return this.appended;
	}
}
