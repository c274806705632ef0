import fs from 'node:fs/promises';
import type {Dirent, Stats} from 'node:fs';
import path from 'node:path';

/**
 * Total bytes of the regular files below `targetPath`. Symlinks count as
 * their own size and are not followed; unreadable entries count as zero.
 */
export const measureDirectorySize = async (
	targetPath: string,
): Promise<number> => {
	let stat: Stats;
	try {
		stat = await fs.lstat(targetPath);
	} catch {
		return 0;
	}

	if (!stat.isDirectory()) return stat.size;

	let entries: Dirent[];
	try {
		entries = await fs.readdir(targetPath, {withFileTypes: true});
	} catch {
		return 0;
	}

	const sizes = await Promise.all(
		entries.map(async entry =>
			measureDirectorySize(path.join(targetPath, entry.name)),
		),
	);
	return sizes.reduce((total, size) => total + size, 0);
};
