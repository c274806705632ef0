import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {afterEach, expect, test} from 'vitest';
import {runRetentionCleanup} from '../../src/core/retention.js';
import {MEMORY_DATABASE, createSqliteArtifactStore} from '../../src/core/store.js';
import type {ArtifactStore, DebugLogger, DeleteResult} from '../../src/core/types.js';

const DAY_MS = 86_400_000;
const NOW = new Date('2026-06-01T12:00:00.000Z');
const daysAgo = (days: number) => new Date(NOW.getTime() - days * DAY_MS);

let store: ArtifactStore;

const openStore = () => {
	store = createSqliteArtifactStore(MEMORY_DATABASE, {now: () => NOW});
	return store;
};

afterEach(() => {
	store.close();
});

const record = async (artifactPath: string, builtAt: Date) =>
	store.recordBuild({
		projectPath: path.dirname(artifactPath),
		language: 'JavaScript',
		artifactPath,
		sizeBytes: 1,
		builtAt,
	});

const recordingLogger = () => {
	const warnings: string[] = [];
	const logger: DebugLogger = {
		debug() {},
		warn(message) {
			warnings.push(message);
		},
		error() {},
	};
	return {logger, warnings};
};

test('runRetentionCleanup deletes stale directories and prunes old events', async () => {
	openStore();
	const root = await fs.mkdtemp(path.join(os.tmpdir(), 'buildsweep-retention-'));
	const stale = path.join(root, 'old', 'node_modules');
	const fresh = path.join(root, 'new', 'node_modules');
	await fs.mkdir(stale, {recursive: true});
	await fs.mkdir(fresh, {recursive: true});
	await record(stale, daysAgo(45));
	await record(fresh, daysAgo(3));

	const result = await runRetentionCleanup(store, 30);

	expect(result).toEqual({stalePaths: [stale], removedPaths: [stale]});
	await expect(fs.access(stale)).rejects.toThrow();
	await fs.access(fresh);
	expect(await store.recentArtifactPaths()).toEqual([fresh]);
});

test('runRetentionCleanup logs directories it cannot remove', async () => {
	openStore();
	await record('/w/a/target', daysAgo(60));
	await record('/w/b/target', daysAgo(60));
	const {logger, warnings} = recordingLogger();
	const seen: string[][] = [];

	const result = await runRetentionCleanup(store, 30, {
		logger,
		removeDirectories: async targetPaths => {
			seen.push([...targetPaths]);
			return targetPaths.map(
				(targetPath): DeleteResult =>
					targetPath === '/w/a/target'
						? {path: targetPath, ok: false, error: new Error('EPERM')}
						: {path: targetPath, ok: true},
			);
		},
	});

	expect(seen).toEqual([['/w/a/target', '/w/b/target']]);
	expect(result.removedPaths).toEqual(['/w/b/target']);
	expect(warnings).toEqual(['Retention cleanup could not remove /w/a/target']);
	expect(await store.countBuilds()).toBe(0);
});

test('runRetentionCleanup does nothing when the stale query fails', async () => {
	openStore().close();
	const {logger, warnings} = recordingLogger();
	let removeCalls = 0;

	const result = await runRetentionCleanup(store, 30, {
		logger,
		removeDirectories: async () => {
			removeCalls++;
			return [];
		},
	});

	expect(result).toEqual({stalePaths: [], removedPaths: []});
	expect(removeCalls).toBe(0);
	expect(warnings).toEqual([
		'Retention cleanup skipped: stale artifact query failed',
	]);
});
