import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import type {ConfigStore, SweepConfig} from './types.js';

export const APP_DIRECTORY_NAME = 'buildsweep';
export const DEFAULT_SCAN_PATHS = ['.'];
export const DEFAULT_RETENTION_DAYS = 30;
export const DEFAULT_MAX_SCAN_DEPTH = 3;

export const resolveConfigDirectory = (
	env: NodeJS.ProcessEnv = process.env,
): string => {
	const xdgConfigHome = env.XDG_CONFIG_HOME?.trim();
	const base =
		xdgConfigHome && path.isAbsolute(xdgConfigHome)
			? xdgConfigHome
			: path.join(os.homedir(), '.config');
	return path.join(base, APP_DIRECTORY_NAME);
};

export const defaultConfigPath = (configDirectory = resolveConfigDirectory()) =>
	path.join(configDirectory, 'config.json');

export const createDefaultConfig = (
	configDirectory = resolveConfigDirectory(),
): SweepConfig => ({
	scanPaths: [...DEFAULT_SCAN_PATHS],
	excludedPaths: [],
	retentionDays: DEFAULT_RETENTION_DAYS,
	databasePath: path.join(configDirectory, `${APP_DIRECTORY_NAME}.db`),
	debugLogs: false,
	automaticRemoval: false,
	maxScanDepth: DEFAULT_MAX_SCAN_DEPTH,
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
	Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const parseBoolean = (value: unknown, fallback: boolean): boolean =>
	typeof value === 'boolean' ? value : fallback;

const parseNonNegativeInteger = (value: unknown, fallback: number): number =>
	typeof value === 'number' && Number.isInteger(value) && value >= 0
		? value
		: fallback;

const normalizeStringList = (value: unknown): string[] => {
	if (!Array.isArray(value)) return [];

	const unique = new Set<string>();
	for (const entry of value) {
		if (typeof entry !== 'string') continue;
		const trimmed = entry.trim();
		if (trimmed) unique.add(trimmed);
	}

	return [...unique];
};

/**
 * Parses the "Retention Days" input. Anything but a plain non-negative
 * integer yields null so the previous value stays in place.
 */
export const parseRetentionDays = (value: string): number | null => {
	const trimmed = value.trim();
	if (!/^\d+$/.test(trimmed)) return null;
	const days = Number(trimmed);
	return Number.isSafeInteger(days) ? days : null;
};

export const normalizeConfig = (
	value: unknown,
	defaults: SweepConfig = createDefaultConfig(),
): SweepConfig => {
	const raw = isRecord(value) ? value : {};
	const scanPaths = normalizeStringList(raw.scanPaths);
	const databasePath =
		typeof raw.databasePath === 'string' && raw.databasePath.trim()
			? raw.databasePath.trim()
			: defaults.databasePath;

	return {
		scanPaths: scanPaths.length > 0 ? scanPaths : [...defaults.scanPaths],
		excludedPaths: normalizeStringList(raw.excludedPaths),
		retentionDays: parseNonNegativeInteger(
			raw.retentionDays,
			defaults.retentionDays,
		),
		databasePath,
		debugLogs: parseBoolean(raw.debugLogs, defaults.debugLogs),
		automaticRemoval: parseBoolean(
			raw.automaticRemoval,
			defaults.automaticRemoval,
		),
		maxScanDepth: parseNonNegativeInteger(
			raw.maxScanDepth,
			defaults.maxScanDepth,
		),
	};
};

const readJson = async (filePath: string): Promise<Record<string, unknown>> => {
	let content: string;
	try {
		content = await fs.readFile(filePath, 'utf8');
	} catch (error) {
		if (isRecord(error) && error.code === 'ENOENT') return {};
		throw error;
	}

	const parsed: unknown = JSON.parse(content);
	return isRecord(parsed) ? parsed : {};
};

export const loadConfig = async (
	filePath = defaultConfigPath(),
): Promise<SweepConfig> =>
	normalizeConfig(
		await readJson(filePath),
		createDefaultConfig(path.dirname(filePath)),
	);

export const saveConfig = async (
	config: SweepConfig,
	filePath = defaultConfigPath(),
): Promise<void> => {
	await fs.mkdir(path.dirname(filePath), {recursive: true});
	await fs.writeFile(filePath, `${JSON.stringify(config, null, 2)}\n`, 'utf8');
};

export const createFileConfigStore = (
	filePath = defaultConfigPath(),
): ConfigStore => ({
	load: async () => loadConfig(filePath),
	save: async config => saveConfig(config, filePath),
});

/**
 * Wraps a store so that saves keep the database path and debug flag it was
 * loaded with. Command-line overrides of those apply to one session only.
 */
export const keepSessionOverridesLocal = (
	store: ConfigStore,
	persisted: SweepConfig,
): ConfigStore => ({
	load: async () => store.load(),
	save: async config =>
		store.save({
			...config,
			databasePath: persisted.databasePath,
			debugLogs: persisted.debugLogs,
		}),
});
