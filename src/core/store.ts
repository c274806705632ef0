import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import {StoreError, toErrorMessage} from './errors.js';
import type {
	ArtifactSize,
	ArtifactStore,
	BuildEvent,
	NewBuildEvent,
} from './types.js';

export const MEMORY_DATABASE = ':memory:';
export const RECENT_ARTIFACT_LIMIT = 50;
export const RECENT_BUILD_LIMIT = 10;

const DAY_MS = 86_400_000;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS builds (
	id INTEGER PRIMARY KEY AUTOINCREMENT,
	project_path TEXT NOT NULL,
	language TEXT NOT NULL,
	artifact_path TEXT NOT NULL,
	size_bytes INTEGER NOT NULL DEFAULT 0,
	build_time INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS builds_artifact_path_idx ON builds (artifact_path);
CREATE INDEX IF NOT EXISTS builds_build_time_idx ON builds (build_time);
`;

interface BuildRow {
	project_path: string;
	language: string;
	build_time: number;
}

interface PathRow {
	artifact_path: string;
}

interface SizeRow {
	artifact_path: string;
	size: number;
}

interface CountRow {
	total: number;
}

export interface SqliteStoreOptions {
	now?: () => Date;
}

const openDatabase = (location: string): Database.Database => {
	try {
		if (location !== MEMORY_DATABASE) {
			fs.mkdirSync(path.dirname(location), {recursive: true});
		}
		const db = new Database(location);
		if (location !== MEMORY_DATABASE) {
			db.pragma('journal_mode = WAL');
		}
		db.exec(SCHEMA);
		return db;
	} catch (error) {
		throw new StoreError(
			`Cannot open artifact database at ${location}: ${toErrorMessage(error)}`,
			'STORE_OPEN_ERROR',
			error,
		);
	}
};

const query = <T>(operation: string, run: () => T): T => {
	try {
		return run();
	} catch (error) {
		throw new StoreError(
			`${operation} failed: ${toErrorMessage(error)}`,
			'STORE_QUERY_ERROR',
			error,
		);
	}
};

/**
 * Artifact store backed by a single SQLite table of build events. Every
 * method is asynchronous so callers can treat the store as remote.
 */
export const createSqliteArtifactStore = (
	location: string,
	{now = () => new Date()}: SqliteStoreOptions = {},
): ArtifactStore => {
	const db = openDatabase(location);
	const cutoffFor = (retentionDays: number): number =>
		now().getTime() - retentionDays * DAY_MS;

	const insertBuild = db.prepare<[string, string, string, number, number]>(
		'INSERT INTO builds (project_path, language, artifact_path, size_bytes, build_time) VALUES (?, ?, ?, ?, ?)',
	);
	const selectRecentPaths = db.prepare<[number], PathRow>(
		'SELECT artifact_path FROM builds GROUP BY artifact_path ORDER BY MAX(build_time) DESC, MAX(id) DESC LIMIT ?',
	);
	const selectRecentBuilds = db.prepare<[number], BuildRow>(
		'SELECT project_path, language, build_time FROM builds ORDER BY build_time DESC, id DESC LIMIT ?',
	);
	const selectCount = db.prepare<[], CountRow>(
		'SELECT COUNT(*) AS total FROM builds',
	);
	const selectSizes = db.prepare<[], SizeRow>(
		'SELECT artifact_path, MAX(size_bytes) AS size FROM builds GROUP BY artifact_path ORDER BY size DESC, artifact_path ASC',
	);
	const deleteByPath = db.prepare<[string]>(
		'DELETE FROM builds WHERE artifact_path = ?',
	);
	const deleteEverything = db.prepare('DELETE FROM builds');
	const selectStalePaths = db.prepare<[number], PathRow>(
		'SELECT artifact_path FROM builds GROUP BY artifact_path HAVING MAX(build_time) < ? ORDER BY artifact_path ASC',
	);
	const deleteOlderThan = db.prepare<[number]>(
		'DELETE FROM builds WHERE build_time < ?',
	);

	return {
		async recordBuild(event: NewBuildEvent) {
			const builtAt = event.builtAt ?? now();
			query('recordBuild', () =>
				insertBuild.run(
					event.projectPath,
					event.language,
					event.artifactPath,
					Math.max(0, Math.floor(event.sizeBytes)),
					builtAt.getTime(),
				),
			);
		},

		async recentArtifactPaths(limit = RECENT_ARTIFACT_LIMIT) {
			return query('recentArtifactPaths', () =>
				selectRecentPaths.all(limit).map(row => row.artifact_path),
			);
		},

		async recentBuilds(limit = RECENT_BUILD_LIMIT): Promise<BuildEvent[]> {
			return query('recentBuilds', () =>
				selectRecentBuilds.all(limit).map(row => ({
					projectPath: row.project_path,
					language: row.language,
					builtAt: new Date(row.build_time),
				})),
			);
		},

		async countBuilds() {
			return query('countBuilds', () => selectCount.get()?.total ?? 0);
		},

		async artifactSizes(): Promise<ArtifactSize[]> {
			return query('artifactSizes', () =>
				selectSizes.all().map(row => ({
					path: row.artifact_path,
					sizeBytes: row.size,
				})),
			);
		},

		async deleteArtifact(artifactPath: string) {
			query('deleteArtifact', () => deleteByPath.run(artifactPath));
		},

		async deleteAll() {
			query('deleteAll', () => deleteEverything.run());
		},

		async staleArtifactPaths(retentionDays: number) {
			return query('staleArtifactPaths', () =>
				selectStalePaths
					.all(cutoffFor(retentionDays))
					.map(row => row.artifact_path),
			);
		},

		async deleteBuildsOlderThan(retentionDays: number) {
			query('deleteBuildsOlderThan', () =>
				deleteOlderThan.run(cutoffFor(retentionDays)),
			);
		},

		close() {
			if (db.open) db.close();
		},
	};
};
