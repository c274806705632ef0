import path from 'node:path';
import {DEFAULT_MAX_SCAN_DEPTH, DEFAULT_SCAN_PATHS} from './config.js';
import {toErrorMessage} from './errors.js';
import {detectLanguage, projectPathOf} from './language.js';
import type {LogBuffer} from './log-buffer.js';
import {noopLogger} from './logger.js';
import type {ResultSlot} from './result-slot.js';
import {measureDirectorySize} from './stats.js';
import type {
	ArtifactStore,
	DebugLogger,
	DirectoryWalker,
	PathWatcher,
	WalkEntry,
} from './types.js';
import {walkDirectories} from './walk.js';

export const ARTIFACT_DIRECTORY_NAMES: ReadonlySet<string> = new Set([
	// Rust
	'target',
	// C/C++
	'build',
	'.build',
	'cmake-build-debug',
	'cmake-build-release',
	'Debug',
	'Release',
	// JavaScript/TypeScript
	'node_modules',
	'dist',
	'.next',
	'.parcel-cache',
	'.cache',
	// Python
	'__pycache__',
	'.eggs',
	'eggs',
	// Java/Gradle
	'.gradle',
	// PHP/Composer
	'vendor',
	// Ruby
	'.bundle',
	// General build outputs
	'out',
	'.output',
	'.nyc_output',
]);

export interface ScanRequest {
	scanPaths: readonly string[];
	excludedPaths: readonly string[];
	maxDepth?: number;
}

export interface ScanPipelineDeps {
	store: ArtifactStore;
	watcher: PathWatcher;
	logs: LogBuffer;
	results: ResultSlot<string[]>;
	walk?: DirectoryWalker;
	detectLanguage?: (projectPath: string) => Promise<string>;
	measureSize?: (artifactPath: string) => Promise<number>;
	logger?: DebugLogger;
}

export const isArtifactDirectory = (entry: Pick<WalkEntry, 'name'>): boolean =>
	ARTIFACT_DIRECTORY_NAMES.has(entry.name);

export const isExcludedPath = (
	candidatePath: string,
	excludedPaths: readonly string[],
): boolean =>
	excludedPaths.some(
		excluded => excluded.length > 0 && candidatePath.includes(excluded),
	);

const registerArtifact = async (
	artifactPath: string,
	deps: Required<Omit<ScanPipelineDeps, 'logs' | 'results' | 'walk'>>,
): Promise<void> => {
	const projectPath = projectPathOf(artifactPath);
	const [language, sizeBytes] = await Promise.all([
		deps.detectLanguage(projectPath),
		deps.measureSize(artifactPath),
	]);

	try {
		await deps.store.recordBuild({
			projectPath,
			language,
			artifactPath,
			sizeBytes,
		});
	} catch (error) {
		deps.logger.debug(`Could not record ${artifactPath}`, error);
	}

	try {
		deps.watcher.watch(artifactPath);
	} catch (error) {
		deps.logger.debug(`Could not watch ${artifactPath}`, error);
	}
};

/**
 * One scan over every configured root. Progress goes to the shared log
 * buffer and the matched paths are handed to the result slot exactly once,
 * even when the walk is cut short. Matched and excluded directories are not
 * descended into: everything below them would match or be excluded too.
 */
export const runScanPipeline = async (
	request: ScanRequest,
	{
		logs,
		results,
		walk = walkDirectories,
		store,
		watcher,
		detectLanguage: detect = detectLanguage,
		measureSize = measureDirectorySize,
		logger = noopLogger,
	}: ScanPipelineDeps,
): Promise<string[]> => {
	const scanPaths =
		request.scanPaths.length > 0 ? request.scanPaths : DEFAULT_SCAN_PATHS;
	const maxDepth = request.maxDepth ?? DEFAULT_MAX_SCAN_DEPTH;
	const isExcluded = (entry: WalkEntry) =>
		isExcludedPath(entry.path, request.excludedPaths);
	const registerDeps = {
		store,
		watcher,
		detectLanguage: detect,
		measureSize,
		logger,
	};
	const artifacts: string[] = [];

	logs.append('Starting scan...');
	try {
		for (const scanPath of scanPaths) {
			logs.append(`Scanning path: ${scanPath}`);
			let count = 0;
			const entries = walk(path.resolve(scanPath), {
				maxDepth,
				descend: entry => !isArtifactDirectory(entry) && !isExcluded(entry),
			});
			for await (const entry of entries) {
				if (!isArtifactDirectory(entry) || isExcluded(entry)) continue;
				artifacts.push(entry.path);
				count++;
				await registerArtifact(entry.path, registerDeps);
			}

			logs.append(`Scan complete for ${scanPath}. Found ${count} artifacts.`);
		}
	} catch (error) {
		logger.error('Scan interrupted', error);
		logs.append(`Scan interrupted: ${toErrorMessage(error)}`);
	}

	logs.append(`Total scan complete. Found ${artifacts.length} artifacts.`);
	if (!results.send([...artifacts])) {
		logger.warn('Scan result dropped: an undelivered result is still pending');
	}

	return artifacts;
};
