import {deletePaths} from './delete.js';
import {noopLogger} from './logger.js';
import type {ArtifactStore, DebugLogger, DeleteResult} from './types.js';

export type DirectoryRemover = (
	targetPaths: readonly string[],
) => Promise<DeleteResult[]>;

export interface RetentionCleanupResult {
	stalePaths: string[];
	removedPaths: string[];
}

/**
 * Deletes artifacts whose newest build event is older than `retentionDays`,
 * first from disk and then from the store. Runs unsynchronized with the
 * session: the artifact list only catches up on the next history reload.
 * A failing stale-path query ends the cleanup with nothing done; it runs
 * again after the next scan.
 */
export const runRetentionCleanup = async (
	store: ArtifactStore,
	retentionDays: number,
	{
		removeDirectories = deletePaths,
		logger = noopLogger,
	}: {removeDirectories?: DirectoryRemover; logger?: DebugLogger} = {},
): Promise<RetentionCleanupResult> => {
	let stalePaths: string[];
	try {
		stalePaths = await store.staleArtifactPaths(retentionDays);
	} catch (error) {
		logger.warn(
			'Retention cleanup skipped: stale artifact query failed',
			error,
		);
		return {stalePaths: [], removedPaths: []};
	}

	const results = await removeDirectories(stalePaths);
	for (const result of results) {
		if (!result.ok) {
			logger.warn(
				`Retention cleanup could not remove ${result.path}`,
				result.error,
			);
		}
	}

	try {
		await store.deleteBuildsOlderThan(retentionDays);
	} catch (error) {
		logger.warn('Retention cleanup could not prune old build events', error);
	}

	return {
		stalePaths,
		removedPaths: results
			.filter(result => result.ok)
			.map(result => result.path),
	};
};
