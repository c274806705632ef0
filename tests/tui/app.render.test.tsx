import {render} from 'ink-testing-library';
import {afterEach, expect, test, vi} from 'vitest';
import App from '../../src/app.js';
import {createDefaultConfig} from '../../src/core/config.js';
import {MEMORY_DATABASE, createSqliteArtifactStore} from '../../src/core/store.js';
import type {ArtifactStore} from '../../src/core/types.js';
import {SessionController} from '../../src/ui/state/controller.js';

const ESCAPE = '\u001B';

const stores: ArtifactStore[] = [];

afterEach(() => {
	for (const store of stores.splice(0)) store.close();
});

const createController = async (artifactPaths: string[] = []) => {
	const store = createSqliteArtifactStore(MEMORY_DATABASE);
	stores.push(store);
	const base = Date.now() - artifactPaths.length * 1000;
	for (const [index, artifactPath] of artifactPaths.entries()) {
		await store.recordBuild({
			projectPath: '/work/app',
			language: 'Rust',
			artifactPath,
			sizeBytes: 2048,
			builtAt: new Date(base + index * 1000),
		});
	}

	const controller = new SessionController({
		config: {
			...createDefaultConfig('/tmp/buildsweep-tui'),
			scanPaths: ['/work'],
		},
		configStore: {
			load: async () => createDefaultConfig('/tmp/buildsweep-tui'),
			save: async () => {},
		},
		store,
		watcher: {watch() {}, close() {}},
		remover: {remove: () => true},
		autoScan: false,
	});
	await controller.load();
	return controller;
};

const frameOf = (lastFrame: () => string | undefined) => lastFrame() ?? '';

test('App renders the dashboard panels in an empty state', async () => {
	const controller = await createController();
	const {lastFrame, unmount} = render(
		<App controller={controller} pollIntervalMs={10} />,
	);

	try {
		await vi.waitFor(() => {
			const frame = frameOf(lastFrame);
			expect(frame).toContain('buildsweep - build artifact cleanup');
			expect(frame).toContain('Artifacts (0)');
			expect(frame).toContain('No artifacts yet.');
			expect(frame).toContain('No builds recorded.');
			expect(frame).toContain('Retention Days: 30');
			expect(frame).toContain('Scans: Idle');
		});
	} finally {
		unmount();
	}
});

test('App lists stored artifacts relative to the first scan path', async () => {
	const controller = await createController([
		'/work/app/target',
		'/work/app/node_modules',
	]);
	const {lastFrame, unmount} = render(
		<App controller={controller} pollIntervalMs={10} />,
	);

	try {
		await vi.waitFor(() => {
			const frame = frameOf(lastFrame);
			expect(frame).toContain('Artifacts (2)');
			expect(frame).toContain('app/node_modules');
			expect(frame).toContain('app/target');
			expect(frame).toContain('Total Builds: 2');
		});
	} finally {
		unmount();
	}
});

test('App opens the logs popup on l and closes it on escape', async () => {
	const controller = await createController();
	controller.logs.append('Build activity in /work/app/target');
	const {lastFrame, stdin, unmount} = render(
		<App controller={controller} pollIntervalMs={10} />,
	);

	try {
		await vi.waitFor(() => {
			stdin.write('l');
			expect(controller.getSnapshot().popup.kind).toBe('logs');
		});
		await vi.waitFor(() => {
			expect(frameOf(lastFrame)).toContain('Build activity in /work/app/target');
		});
		expect(frameOf(lastFrame)).not.toContain('Artifacts (0)');

		stdin.write(ESCAPE);
		await vi.waitFor(() => {
			expect(frameOf(lastFrame)).toContain('Artifacts (0)');
		});
	} finally {
		unmount();
	}
});

test('App redraws the open logs popup when new lines arrive', async () => {
	const controller = await createController();
	const {lastFrame, stdin, unmount} = render(
		<App controller={controller} pollIntervalMs={10} />,
	);

	try {
		await vi.waitFor(() => {
			stdin.write('l');
			expect(controller.getSnapshot().popup.kind).toBe('logs');
		});
		controller.logs.append('Scanning path: /work');
		await vi.waitFor(() => {
			expect(frameOf(lastFrame)).toContain('Scanning path: /work');
		});
	} finally {
		unmount();
	}
});

test('App shows the settings popup on e', async () => {
	const controller = await createController();
	const {lastFrame, stdin, unmount} = render(
		<App controller={controller} pollIntervalMs={10} />,
	);

	try {
		await vi.waitFor(() => {
			stdin.write('e');
			expect(controller.getSnapshot().popup.kind).toBe('settings');
		});
		await vi.waitFor(() => {
			const frame = frameOf(lastFrame);
			expect(frame).toContain('Settings (Up/Down Enter Esc)');
			expect(frame).toContain('> Retention Days');
		});
	} finally {
		unmount();
	}
});

test('App quits on q', async () => {
	const controller = await createController();
	const {stdin, unmount} = render(
		<App controller={controller} pollIntervalMs={10} />,
	);

	try {
		await vi.waitFor(() => {
			stdin.write('q');
			expect(controller.getSnapshot().shouldQuit).toBe(true);
		});
	} finally {
		unmount();
	}
});
