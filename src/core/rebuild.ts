import {spawn} from 'node:child_process';
import fs from 'node:fs';
import path from 'node:path';

export interface BuildCommand {
	label: string;
	command: string;
	args: string[];
}

const BUILD_SYSTEMS: ReadonlyArray<{marker: string; build: BuildCommand}> = [
	{
		marker: 'Cargo.toml',
		build: {label: 'cargo build', command: 'cargo', args: ['build']},
	},
	{
		marker: 'package.json',
		build: {label: 'npm run build', command: 'npm', args: ['run', 'build']},
	},
];

export const projectRootOf = (artifactPath: string): string =>
	path.dirname(artifactPath);

export const detectBuildCommand = (projectRoot: string): BuildCommand | null =>
	BUILD_SYSTEMS.find(system =>
		fs.existsSync(path.join(projectRoot, system.marker)),
	)?.build ?? null;

export type RebuildLauncher = (
	projectRoot: string,
	build: BuildCommand,
	onError: (error: Error) => void,
) => void;

// Fire and forget: output is discarded and the child outlives the session.
export const launchDetachedBuild: RebuildLauncher = (
	projectRoot,
	build,
	onError,
) => {
	const child = spawn(build.command, build.args, {
		cwd: projectRoot,
		detached: true,
		stdio: 'ignore',
	});
	child.on('error', onError);
	child.unref();
};

export type RebuildOutcome =
	| {started: true; projectRoot: string; build: BuildCommand}
	| {started: false; projectRoot: string};

export const rebuildArtifactProject = (
	artifactPath: string,
	launch: RebuildLauncher,
	onError: (error: Error) => void,
): RebuildOutcome => {
	const projectRoot = projectRootOf(artifactPath);
	const build = detectBuildCommand(projectRoot);
	if (!build) return {started: false, projectRoot};

	launch(projectRoot, build, onError);
	return {started: true, projectRoot, build};
};
