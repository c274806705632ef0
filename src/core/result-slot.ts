/**
 * Single-slot handoff for a completed result. A value can be sent only while
 * the slot is empty, and each value is taken exactly once.
 */
export class ResultSlot<T> {
	private pending: {value: T} | null = null;

	send(value: T): boolean {
		if (this.pending) return false;
		this.pending = {value};
		return true;
	}

	take(): T | undefined {
		const pending = this.pending;
		this.pending = null;
		return pending?.value;
	}

	get isFull(): boolean {
		return this.pending !== null;
	}
}
