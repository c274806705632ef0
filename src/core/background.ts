import type {DebugLogger} from './types.js';

/**
 * Registry of detached background units (scans, retention cleanup, store
 * updates). Units are never joined by the session: a failure is logged and
 * dropped, and quitting does not wait for them. `settled()` exists for callers
 * that do want to observe completion.
 */
export class BackgroundTasks {
	private readonly pending = new Set<Promise<void>>();

	constructor(private readonly logger: DebugLogger) {}

	detach(label: string, task: () => Promise<void>): void {
		const unit: Promise<void> = Promise.resolve()
			.then(task)
			.catch((error: unknown) => {
				this.logger.error(`${label} failed`, error);
			})
			.finally(() => {
				this.pending.delete(unit);
			});
		this.pending.add(unit);
	}

	get size(): number {
		return this.pending.size;
	}

	async settled(): Promise<void> {
		while (this.pending.size > 0) {
			await Promise.all([...this.pending]);
		}
	}
}
