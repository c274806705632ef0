import fs from 'node:fs';
import type {FSWatcher} from 'node:fs';
import {noopLogger} from './logger.js';
import type {DebugLogger, PathWatcher} from './types.js';

export type ChangeListener = (artifactPath: string, fileName: string) => void;

export interface BuildWatcherOptions {
	logger?: DebugLogger;
	onChange?: ChangeListener;
}

/**
 * Watches discovered artifact directories for writes, which usually means a
 * build ran. Registering the same path twice keeps the first watcher.
 */
export const createBuildWatcher = ({
	logger = noopLogger,
	onChange,
}: BuildWatcherOptions = {}): PathWatcher => {
	const watchers = new Map<string, FSWatcher>();

	return {
		watch(targetPath) {
			if (watchers.has(targetPath)) return;

			const watcher = fs.watch(targetPath, {persistent: false});
			watcher.on('change', (_event, fileName) => {
				const name = String(fileName ?? '');
				logger.debug(`Change detected in ${targetPath}`, name);
				onChange?.(targetPath, name);
			});
			watcher.on('error', error => {
				logger.warn(`Stopped watching ${targetPath}`, error);
				watcher.close();
				watchers.delete(targetPath);
			});
			watchers.set(targetPath, watcher);
		},

		close() {
			for (const watcher of watchers.values()) {
				watcher.close();
			}
			watchers.clear();
		},
	};
};
