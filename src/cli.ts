#!/usr/bin/env node

import path from 'node:path';
import process from 'node:process';
import meow from 'meow';
import {
	createFileConfigStore,
	defaultConfigPath,
	keepSessionOverridesLocal,
} from './core/config.js';
import {toErrorMessage} from './core/errors.js';
import {LogBuffer} from './core/log-buffer.js';
import {createDebugLogger} from './core/logger.js';
import {createSudoRemover} from './core/privileged.js';
import {createSqliteArtifactStore} from './core/store.js';
import type {PathWatcher, SweepConfig} from './core/types.js';
import {createBuildWatcher} from './core/watcher.js';
import {runInteractiveApp} from './index.js';
import {SessionController} from './ui/state/controller.js';

const cli = meow(
	`
	Usage
	  $ buildsweep [options]

	Description
	  Find build output directories (target, node_modules, dist, __pycache__, ...)
	  across your project trees, track them in a local history database and
	  delete, rebuild or exclude them from an interactive dashboard.

	Options
	  --config=<file>    Configuration file (default: $XDG_CONFIG_HOME/buildsweep/config.json)
	  --database=<file>  Artifact database for this session
	  --no-scan          Do not scan on startup; press s to scan
	  --debug            Write diagnostics to debug.log next to the configuration

	Examples
	  $ buildsweep
	  $ buildsweep --no-scan
	  $ buildsweep --config=./buildsweep.json --debug
	`,
	{
		importMeta: import.meta,
		flags: {
			config: {
				type: 'string',
			},
			database: {
				type: 'string',
			},
			scan: {
				type: 'boolean',
				default: true,
			},
			debug: {
				type: 'boolean',
				default: false,
			},
		},
	},
);

const openSession = async (configPath: string, databaseFlag?: string) => {
	const fileStore = createFileConfigStore(configPath);
	const persisted = await fileStore.load();
	const config: SweepConfig = {
		...persisted,
		databasePath: databaseFlag
			? path.resolve(databaseFlag)
			: persisted.databasePath,
		debugLogs: cli.flags.debug || persisted.debugLogs,
	};
	const store = createSqliteArtifactStore(config.databasePath);
	return {
		configStore: keepSessionOverridesLocal(fileStore, persisted),
		config,
		store,
	};
};

const main = async (): Promise<void> => {
	const configPath = cli.flags.config
		? path.resolve(cli.flags.config)
		: defaultConfigPath();

	let session: Awaited<ReturnType<typeof openSession>>;
	try {
		session = await openSession(configPath, cli.flags.database);
	} catch (error) {
		process.stderr.write(`buildsweep: ${toErrorMessage(error)}\n`);
		process.exitCode = 1;
		return;
	}

	const {configStore, config, store} = session;

	const logger = createDebugLogger({
		enabled: config.debugLogs,
		filePath: path.join(path.dirname(configPath), 'debug.log'),
	});
	const logs = new LogBuffer();
	const watcher: PathWatcher = createBuildWatcher({
		logger,
		onChange: artifactPath => {
			logs.append(`Build activity in ${artifactPath}`);
		},
	});

	const controller = new SessionController({
		config,
		configStore,
		store,
		watcher,
		remover: createSudoRemover(),
		logger,
		logs,
		autoScan: cli.flags.scan,
	});
	await controller.load();

	try {
		await runInteractiveApp({controller});
	} finally {
		watcher.close();
		store.close();
	}

	// Detached scans and store updates are not waited for.
	process.exit();
};

await main();
