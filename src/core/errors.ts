export type StoreErrorCode = 'STORE_OPEN_ERROR' | 'STORE_QUERY_ERROR';

export class StoreError extends Error {
	constructor(
		message: string,
		public readonly code: StoreErrorCode,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = 'StoreError';
	}
}

export const toErrorMessage = (error: unknown): string =>
	String(error instanceof Error ? error.message : error);
