import fs from 'node:fs/promises';
import type {DeleteResult, PrivilegedRemover} from './types.js';

export const deletePath = async (targetPath: string): Promise<DeleteResult> => {
	try {
		await fs.rm(targetPath, {recursive: true, force: true});
		return {path: targetPath, ok: true};
	} catch (error) {
		return {path: targetPath, ok: false, error};
	}
};

export const deletePaths = async (
	targetPaths: readonly string[],
): Promise<DeleteResult[]> =>
	Promise.all(targetPaths.map(async targetPath => deletePath(targetPath)));

/**
 * Runs the privileged remover over every path in order, one blocking call
 * at a time.
 */
export const removePathsWithPrivilege = (
	targetPaths: readonly string[],
	remover: PrivilegedRemover,
	password?: string,
): DeleteResult[] =>
	targetPaths.map(targetPath =>
		remover.remove(targetPath, password)
			? {path: targetPath, ok: true}
			: {
					path: targetPath,
					ok: false,
					error: new Error(`Privileged removal failed for ${targetPath}`),
				},
	);

export const failedPaths = (results: readonly DeleteResult[]): string[] =>
	results.filter(result => !result.ok).map(result => result.path);
