import {spawnSync} from 'node:child_process';
import type {PrivilegedRemover} from './types.js';

export const PRIVILEGED_REMOVAL_TIMEOUT_MS = 60_000;

export const buildRemovalArgs = (
	targetPath: string,
	withPassword: boolean,
): string[] =>
	withPassword
		? ['-S', '-p', '', 'rm', '-rf', '--', targetPath]
		: ['-n', 'rm', '-rf', '--', targetPath];

/**
 * Removes directory trees through `sudo`. Without a password, `sudo -n`
 * fails instead of prompting. With one, the password travels over the
 * child's stdin and never appears in its argument list. Both calls block
 * until sudo exits and report only success or failure.
 */
export const createSudoRemover = ({
	command = 'sudo',
	timeoutMs = PRIVILEGED_REMOVAL_TIMEOUT_MS,
}: {command?: string; timeoutMs?: number} = {}): PrivilegedRemover => ({
	remove(targetPath, password) {
		const withPassword = password !== undefined;
		const result = spawnSync(
			command,
			buildRemovalArgs(targetPath, withPassword),
			{
				input: withPassword ? `${password}\n` : undefined,
				stdio: [withPassword ? 'pipe' : 'ignore', 'ignore', 'ignore'],
				timeout: timeoutMs,
			},
		);
		return !result.error && result.status === 0;
	},
});
