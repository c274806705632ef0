import fs from 'node:fs';
import path from 'node:path';
import {toErrorMessage} from './errors.js';
import type {DebugLogger} from './types.js';

type Level = 'DEBUG' | 'WARN' | 'ERROR';

export const noopLogger: DebugLogger = {
	debug() {},
	warn() {},
	error() {},
};

const formatDetails = (details: unknown): string => {
	if (details === undefined) return '';
	if (details instanceof Error) return ` (${toErrorMessage(details)})`;
	if (typeof details === 'string') return ` (${details})`;
	try {
		return ` ${JSON.stringify(details)}`;
	} catch {
		return ` ${String(details)}`;
	}
};

export const formatLogLine = (
	level: Level,
	message: string,
	details: unknown,
	now = new Date(),
): string => `${now.toISOString()} ${level} ${message}${formatDetails(details)}`;

// The terminal belongs to the renderer, so diagnostics only ever go to a file.
export const createDebugLogger = ({
	enabled,
	filePath,
}: {
	enabled: boolean;
	filePath: string;
}): DebugLogger => {
	if (!enabled) return noopLogger;

	let writable = true;
	const write = (level: Level, message: string, details: unknown) => {
		if (!writable) return;
		try {
			fs.mkdirSync(path.dirname(filePath), {recursive: true});
			fs.appendFileSync(
				filePath,
				`${formatLogLine(level, message, details)}\n`,
				'utf8',
			);
		} catch {
			writable = false;
		}
	};

	return {
		debug: (message, details) => write('DEBUG', message, details),
		warn: (message, details) => write('WARN', message, details),
		error: (message, details) => write('ERROR', message, details),
	};
};
