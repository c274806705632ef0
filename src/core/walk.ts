import fs from 'node:fs/promises';
import type {Dirent} from 'node:fs';
import path from 'node:path';
import type {WalkEntry, WalkOptions} from './types.js';

const walkFrom = async function* (
	directory: string,
	depth: number,
	options: WalkOptions,
): AsyncGenerator<WalkEntry> {
	let entries: Dirent[];
	try {
		entries = await fs.readdir(directory, {withFileTypes: true});
	} catch {
		return;
	}

	for (const dirent of entries) {
		// Symlinked directories are reported by readdir as links and never followed.
		if (!dirent.isDirectory()) continue;

		const entry: WalkEntry = {
			path: path.join(directory, dirent.name),
			name: dirent.name,
			depth,
		};
		yield entry;

		if (depth >= options.maxDepth) continue;
		if (options.descend && !options.descend(entry)) continue;
		yield* walkFrom(entry.path, depth + 1, options);
	}
};

/**
 * Lazily yields every directory below `root`, depth first. The root itself
 * sits at depth 0 and is not yielded; its children are depth 1. Unreadable
 * directories are skipped.
 */
export const walkDirectories = (
	root: string,
	options: WalkOptions,
): AsyncGenerator<WalkEntry> => walkFrom(root, 1, options);
