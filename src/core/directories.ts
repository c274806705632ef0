import fs from 'node:fs';
import path from 'node:path';

export const PARENT_ENTRY = '..';

export type DirectoryLister = (directory: string) => string[];

/**
 * Entries shown by the directory browser: the parent link first, then the
 * subdirectory names in name order. An unreadable directory lists only the
 * parent link.
 */
export const listDirectoryEntries: DirectoryLister = directory => {
	let names: string[];
	try {
		names = fs
			.readdirSync(directory, {withFileTypes: true})
			.filter(dirent => dirent.isDirectory())
			.map(dirent => dirent.name);
	} catch {
		return [PARENT_ENTRY];
	}

	names.sort((left, right) => (left < right ? -1 : left > right ? 1 : 0));
	return [PARENT_ENTRY, ...names];
};

export const resolveEntry = (directory: string, entry: string): string =>
	entry === PARENT_ENTRY
		? path.dirname(directory)
		: path.join(directory, entry);
