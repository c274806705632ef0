import fs from 'node:fs/promises';
import path from 'node:path';

export const UNKNOWN_LANGUAGE = 'Unknown';

// First marker found wins, so more specific toolchains come first.
const LANGUAGE_MARKERS: ReadonlyArray<{file: string; language: string}> = [
	{file: 'Cargo.toml', language: 'Rust'},
	{file: 'tsconfig.json', language: 'TypeScript'},
	{file: 'package.json', language: 'JavaScript'},
	{file: 'pyproject.toml', language: 'Python'},
	{file: 'setup.py', language: 'Python'},
	{file: 'requirements.txt', language: 'Python'},
	{file: 'go.mod', language: 'Go'},
	{file: 'pom.xml', language: 'Java'},
	{file: 'build.gradle', language: 'Java'},
	{file: 'build.gradle.kts', language: 'Kotlin'},
	{file: 'composer.json', language: 'PHP'},
	{file: 'Gemfile', language: 'Ruby'},
	{file: 'CMakeLists.txt', language: 'C/C++'},
	{file: 'Makefile', language: 'C/C++'},
];

export const detectLanguage = async (projectPath: string): Promise<string> => {
	let names: Set<string>;
	try {
		names = new Set(await fs.readdir(projectPath));
	} catch {
		return UNKNOWN_LANGUAGE;
	}

	return (
		LANGUAGE_MARKERS.find(marker => names.has(marker.file))?.language ??
		UNKNOWN_LANGUAGE
	);
};

export const projectPathOf = (artifactPath: string): string =>
	path.dirname(artifactPath);
