import path from 'node:path';
import {BackgroundTasks} from '../../core/background.js';
import {parseRetentionDays} from '../../core/config.js';
import {listDirectoryEntries} from '../../core/directories.js';
import type {DirectoryLister} from '../../core/directories.js';
import {failedPaths, removePathsWithPrivilege} from '../../core/delete.js';
import {toErrorMessage} from '../../core/errors.js';
import {LogBuffer} from '../../core/log-buffer.js';
import {noopLogger} from '../../core/logger.js';
import {
	launchDetachedBuild,
	projectRootOf,
	rebuildArtifactProject,
} from '../../core/rebuild.js';
import type {RebuildLauncher} from '../../core/rebuild.js';
import {ResultSlot} from '../../core/result-slot.js';
import {runRetentionCleanup} from '../../core/retention.js';
import type {DirectoryRemover} from '../../core/retention.js';
import {runScanPipeline} from '../../core/scanner.js';
import type {ScanPipelineDeps} from '../../core/scanner.js';
import {RECENT_ARTIFACT_LIMIT, RECENT_BUILD_LIMIT} from '../../core/store.js';
import type {
	ArtifactSize,
	ArtifactStore,
	BuildEvent,
	ConfigStore,
	DebugLogger,
	PanelId,
	PathWatcher,
	PendingAction,
	PrivilegedRemover,
	SweepConfig,
} from '../../core/types.js';
import type {ConfirmAction, KeyPress, PopupState} from '../types.js';
import {
	CREDENTIAL_TITLE,
	RETENTION_DAYS_TITLE,
	SCAN_PATH_TITLE,
} from './events.js';
import type {PopupCommand} from './events.js';
import {isChar} from './keys.js';
import {
	NO_POPUP,
	confirmPopup,
	dirBrowsePopup,
	handlePopupKey,
	infoPopup,
	inputPopup,
	progressPopup,
} from './popup.js';
import {clampIndex} from './selectors.js';

export const PANEL_ORDER: readonly PanelId[] = [
	'artifacts',
	'history',
	'chart',
	'settings',
	'summary',
];

export const POLL_INTERVAL_MS = 100;

export const AUTOMATIC_REMOVAL_WARNING = [
	'AUTOMATIC REMOVAL WILL DELETE OLD ARTIFACTS',
	'',
	'Please verify your build directories in the list above.',
	'Any directory matching a common build path whose last build is older',
	'than the retention period will be permanently deleted.',
	'',
	'Enable automatic removal? (Enter: Yes, Esc: No)',
].join('\n');

export interface SessionState {
	artifacts: string[];
	selected: number;
	focusedPanel: PanelId;
	scanning: boolean;
	scanned: boolean;
	automaticRemoval: boolean;
	pendingAction: PendingAction | null;
	pendingFailedPaths: string[];
	history: BuildEvent[];
	historyError: boolean;
	totalBuilds: number;
	chartData: ArtifactSize[];
	chartSelected: number;
	popup: PopupState;
	config: SweepConfig;
	/** Log buffer revision last seen by a step; open log views redraw on change. */
	logRevision: number;
	shouldQuit: boolean;
}

export interface SessionControllerOptions {
	config: SweepConfig;
	configStore: ConfigStore;
	store: ArtifactStore;
	watcher: PathWatcher;
	remover: PrivilegedRemover;
	logger?: DebugLogger;
	logs?: LogBuffer;
	listDirectories?: DirectoryLister;
	launchRebuild?: RebuildLauncher;
	removeDirectories?: DirectoryRemover;
	scan?: Pick<ScanPipelineDeps, 'walk' | 'detectLanguage' | 'measureSize'>;
	/** Start a scan on the first loop iteration. Defaults to true. */
	autoScan?: boolean;
}

export const createInitialSessionState = (
	config: SweepConfig,
): SessionState => ({
	artifacts: [],
	selected: 0,
	focusedPanel: 'artifacts',
	scanning: false,
	scanned: false,
	automaticRemoval: config.automaticRemoval,
	pendingAction: null,
	pendingFailedPaths: [],
	history: [],
	historyError: false,
	totalBuilds: 0,
	chartData: [],
	chartSelected: 0,
	popup: NO_POPUP,
	config,
	logRevision: 0,
	shouldQuit: false,
});

/**
 * Owns the session state. Every mutation happens inside a step, and steps
 * are serialized on one promise chain, so background work never writes the
 * state directly: it reports through the log buffer and the result slot,
 * or queues its follow-up behind the running step.
 */
export class SessionController {
	readonly logs: LogBuffer;
	readonly scanResults = new ResultSlot<string[]>();
	readonly background: BackgroundTasks;

	private state: SessionState;
	private readonly listeners = new Set<() => void>();
	private queue: Promise<void> = Promise.resolve();
	private pendingDeletePath: string | null = null;
	private deferredNotice: string | null = null;
	private readonly logger: DebugLogger;
	private readonly listDirectories: DirectoryLister;
	private readonly launchRebuild: RebuildLauncher;
	private readonly autoScan: boolean;

	constructor(private readonly options: SessionControllerOptions) {
		this.logger = options.logger ?? noopLogger;
		this.logs = options.logs ?? new LogBuffer();
		this.background = new BackgroundTasks(this.logger);
		this.listDirectories = options.listDirectories ?? listDirectoryEntries;
		this.launchRebuild = options.launchRebuild ?? launchDetachedBuild;
		this.autoScan = options.autoScan ?? true;
		this.state = createInitialSessionState(options.config);
	}

	subscribe = (listener: () => void): (() => void) => {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	};

	getSnapshot = (): SessionState => this.state;

	/** Loads the most recent artifacts and the history panels from the store. */
	async load(): Promise<void> {
		const artifacts = await this.fallback(
			'load recent artifacts',
			async () => this.options.store.recentArtifactPaths(RECENT_ARTIFACT_LIMIT),
			[],
		);
		this.update({artifacts, selected: 0});
		await this.reloadHistory();
	}

	/** Queues one loop iteration, optionally carrying a key press. */
	submit(key?: KeyPress): Promise<void> {
		return this.enqueue(async () => this.step(key));
	}

	async step(key?: KeyPress): Promise<void> {
		try {
			if (this.autoScan && !this.state.scanned && !this.state.scanning) {
				this.triggerScan();
			}

			await this.drainScanResult();
			if (key) await this.handleKey(key);
			if (this.logs.revision !== this.state.logRevision) {
				this.update({logRevision: this.logs.revision});
			}
		} catch (error) {
			this.logger.error('Session step failed', error);
			this.update({
				popup: infoPopup(`Unexpected error: ${toErrorMessage(error)}`),
			});
		}
	}

	triggerScan(): void {
		if (this.state.scanning) return;

		const {config} = this.state;
		this.update({scanning: true, popup: {kind: 'scanning'}});
		this.background.detach('Scan', async () => {
			await runScanPipeline(
				{
					scanPaths: config.scanPaths,
					excludedPaths: config.excludedPaths,
					maxDepth: config.maxScanDepth,
				},
				{
					...this.options.scan,
					store: this.options.store,
					watcher: this.options.watcher,
					logs: this.logs,
					results: this.scanResults,
					logger: this.logger,
				},
			);
		});
	}

	async reloadHistory(): Promise<void> {
		const {store} = this.options;
		let history: BuildEvent[] = [];
		let historyError = false;
		try {
			history = await store.recentBuilds(RECENT_BUILD_LIMIT);
		} catch (error) {
			this.logger.debug('Could not load build history', error);
			historyError = true;
		}

		const totalBuilds = await this.fallback(
			'count builds',
			async () => store.countBuilds(),
			0,
		);
		const sizes = await this.fallback(
			'load artifact sizes',
			async () => store.artifactSizes(),
			[],
		);
		const known = new Set(this.state.artifacts);
		const chartData = sizes.filter(entry => known.has(entry.path));

		this.update({
			history,
			historyError,
			totalBuilds,
			chartData,
			chartSelected: clampIndex(this.state.chartSelected, chartData.length),
		});
	}

	private enqueue(task: () => Promise<void>): Promise<void> {
		const next = this.queue.then(task);
		this.queue = next.catch((error: unknown) => {
			this.logger.error('Queued task failed', error);
		});
		return next;
	}

	private update(patch: Partial<SessionState>): void {
		this.state = {...this.state, ...patch};
		for (const listener of this.listeners) {
			listener();
		}
	}

	private async fallback<T>(
		label: string,
		run: () => Promise<T>,
		value: T,
	): Promise<T> {
		try {
			return await run();
		} catch (error) {
			this.logger.debug(`Could not ${label}`, error);
			return value;
		}
	}

	private async saveConfig(patch: Partial<SweepConfig>): Promise<void> {
		const config = {...this.state.config, ...patch};
		this.update({config});
		try {
			await this.options.configStore.save(config);
		} catch (error) {
			this.logger.debug('Could not save configuration', error);
		}
	}

	private selectedArtifact(): string | undefined {
		return this.state.artifacts[this.state.selected];
	}

	private removeArtifactAt(index: number): void {
		const artifacts = this.state.artifacts.filter(
			(_artifact, position) => position !== index,
		);
		this.update({
			artifacts,
			selected: clampIndex(this.state.selected, artifacts.length),
		});
	}

	private async drainScanResult(): Promise<void> {
		const artifacts = this.scanResults.take();
		if (artifacts === undefined) return;

		const notice = `Scan complete. Found ${artifacts.length} artifacts.`;
		// An open input keeps the keyboard; the notice waits until it closes.
		const inputOpen = this.state.popup.kind === 'input';
		this.deferredNotice = inputOpen ? notice : null;
		this.update({
			artifacts,
			selected: clampIndex(this.state.selected, artifacts.length),
			scanning: false,
			scanned: true,
			...(inputOpen ? {} : {popup: infoPopup(notice)}),
		});
		await this.reloadHistory();

		if (this.state.automaticRemoval) {
			const {retentionDays} = this.state.config;
			this.background.detach('Retention cleanup', async () => {
				await runRetentionCleanup(this.options.store, retentionDays, {
					removeDirectories: this.options.removeDirectories,
					logger: this.logger,
				});
			});
		}
	}

	private async handleKey(key: KeyPress): Promise<void> {
		const {popup} = this.state;
		if (popup.kind === 'none') {
			await this.handleMainKey(key);
			return;
		}

		const transition = handlePopupKey(popup, key, this.listDirectories);
		const credentialDismissed =
			popup.kind === 'input' &&
			popup.title === CREDENTIAL_TITLE &&
			key.name === 'escape';
		this.update(
			credentialDismissed
				? {popup: transition.popup, pendingAction: null}
				: {popup: transition.popup},
		);
		if (credentialDismissed) this.pendingDeletePath = null;
		const notice = this.deferredNotice;
		if (transition.popup.kind !== 'input') this.deferredNotice = null;
		if (transition.command) await this.dispatch(transition.command);
		if (
			notice !== null &&
			transition.popup.kind !== 'input' &&
			this.state.popup.kind === 'none'
		) {
			this.update({popup: infoPopup(notice)});
		}

		// Text typed into an input never quits.
		if (popup.kind !== 'input' && isChar(key, 'q')) this.quit();
	}

	private async handleMainKey(key: KeyPress): Promise<void> {
		switch (key.name) {
			case 'tab':
				this.cycleFocus();
				return;
			case 'enter':
				this.openFocusedPanel();
				return;
			case 'up':
			case 'pageup':
				this.moveSelection(-1);
				return;
			case 'down':
			case 'pagedown':
				this.moveSelection(1);
				return;
			case 'char':
				if (!key.ctrl) await this.handleMainChar(key.char);
				return;
			default:
				return;
		}
	}

	private async handleMainChar(char: string): Promise<void> {
		switch (char) {
			case 'q':
				this.quit();
				return;
			case 's':
				this.triggerScan();
				return;
			case 'd':
				this.update({
					popup: confirmPopup('Delete this artifact?', {kind: 'delete'}),
				});
				return;
			case 'x':
			case 'X':
				if (
					this.state.focusedPanel === 'artifacts' &&
					this.selectedArtifact() !== undefined
				) {
					this.update({
						popup: confirmPopup('Exclude this path from scanning?', {
							kind: 'exclude',
						}),
					});
				}
				return;
			case 'r':
				this.rebuildSelected();
				return;
			case 'h':
				await this.reloadHistory();
				return;
			case 'e':
				this.update({popup: {kind: 'settings', selected: 0}});
				return;
			case 'l':
				this.update({popup: {kind: 'logs'}});
				return;
			case 'D':
				this.update({popup: {kind: 'clear-all-confirmation'}});
				return;
			default:
				return;
		}
	}

	private quit(): void {
		this.update({shouldQuit: true});
	}

	private cycleFocus(): void {
		const index = PANEL_ORDER.indexOf(this.state.focusedPanel);
		this.update({
			focusedPanel: PANEL_ORDER[(index + 1) % PANEL_ORDER.length],
		});
	}

	private openFocusedPanel(): void {
		if (this.state.focusedPanel === 'artifacts') {
			this.update({popup: {kind: 'artifact-actions', selected: 0}});
		} else if (this.state.focusedPanel === 'settings') {
			this.update({popup: {kind: 'settings', selected: 0}});
		}
	}

	private moveSelection(delta: number): void {
		const {focusedPanel, selected, artifacts, chartSelected, chartData} =
			this.state;
		if (focusedPanel === 'artifacts') {
			this.update({selected: clampIndex(selected + delta, artifacts.length)});
		} else if (focusedPanel === 'chart') {
			this.update({
				chartSelected: clampIndex(chartSelected + delta, chartData.length),
			});
		}
	}

	private async dispatch(command: PopupCommand): Promise<void> {
		switch (command.type) {
			case 'open-input': {
				const initial =
					command.title === RETENTION_DAYS_TITLE
						? String(this.state.config.retentionDays)
						: command.initial;
				this.update({popup: inputPopup(command.title, initial)});
				return;
			}
			case 'open-dir-browse': {
				const [firstScanPath] = this.state.config.scanPaths;
				const start = firstScanPath ? path.resolve(firstScanPath) : '/';
				this.update({popup: dirBrowsePopup(start, this.listDirectories)});
				return;
			}
			case 'toggle-removal':
				if (this.state.automaticRemoval) {
					this.update({automaticRemoval: false});
					await this.saveConfig({automaticRemoval: false});
				} else {
					this.update({
						popup: confirmPopup(AUTOMATIC_REMOVAL_WARNING, {
							kind: 'enable-automatic-removal',
						}),
					});
				}
				return;
			case 'set-value':
				await this.setValue(command.key, command.value);
				return;
			case 'delete-artifact':
				this.update({
					popup: confirmPopup('Delete this artifact?', {kind: 'delete'}),
				});
				return;
			case 'rebuild-artifact':
				this.update({
					popup: confirmPopup('Rebuild this project?', {kind: 'rebuild'}),
				});
				return;
			case 'clear-all-builds':
				await this.clearAllBuilds();
				return;
			case 'confirm-action':
				await this.confirm(command.action);
				return;
			case 'open-excluded-paths':
				this.update({
					popup: {
						kind: 'excluded-paths',
						paths: [...this.state.config.excludedPaths],
						selected: 0,
					},
				});
				return;
		}
	}

	private async setValue(key: string, value: string): Promise<void> {
		if (key === RETENTION_DAYS_TITLE) {
			const retentionDays = parseRetentionDays(value);
			if (retentionDays === null) return;
			await this.saveConfig({retentionDays});
			return;
		}

		if (key === SCAN_PATH_TITLE) {
			await this.saveConfig({scanPaths: [value]});
			return;
		}

		if (key === CREDENTIAL_TITLE) {
			this.resumePendingAction(value);
		}
	}

	private async confirm(action: ConfirmAction): Promise<void> {
		switch (action.kind) {
			case 'delete':
				this.update({popup: progressPopup('Deleting artifact...')});
				this.deleteSelected();
				return;
			case 'rebuild':
				this.rebuildSelected();
				this.update({popup: progressPopup('Rebuilding project...')});
				return;
			case 'exclude': {
				const target = this.selectedArtifact();
				if (target === undefined) return;
				this.removeArtifactAt(this.state.selected);
				await this.saveConfig({
					excludedPaths: [...this.state.config.excludedPaths, target],
				});
				this.update({popup: infoPopup('Path added to exclusion list.')});
				return;
			}
			case 'enable-automatic-removal':
				this.update({automaticRemoval: true});
				await this.saveConfig({automaticRemoval: true});
				this.update({
					popup: infoPopup(
						'Automatic removal enabled. Old artifacts will be cleaned up after scans.',
					),
				});
				return;
			case 'remove-excluded': {
				const message = 'Removed from exclusion list. Rescanning...';
				const restored = action.path;
				await this.saveConfig({
					excludedPaths: this.state.config.excludedPaths.filter(
						excluded => excluded !== restored,
					),
				});
				this.update({popup: infoPopup(message)});
				this.logs.append(message);
				if (!this.state.scanning) this.triggerScan();
				return;
			}
		}
	}

	private rebuildSelected(): void {
		const target = this.selectedArtifact();
		if (target === undefined) return;

		const projectRoot = projectRootOf(target);
		const outcome = rebuildArtifactProject(
			target,
			this.launchRebuild,
			error => {
				this.logs.append(`Rebuild failed for ${projectRoot}: ${error.message}`);
			},
		);
		this.logs.append(
			outcome.started
				? `Rebuild started for ${outcome.projectRoot}: ${outcome.build.label}`
				: `No build system detected for ${outcome.projectRoot}`,
		);
	}

	private forgetDeletedArtifact(target: string, message: string): void {
		const index = this.state.artifacts.indexOf(target);
		if (index !== -1) this.removeArtifactAt(index);
		this.update({popup: infoPopup(message)});
		this.background.detach('Store delete', async () =>
			this.options.store.deleteArtifact(target),
		);
	}

	private deleteSelected(): void {
		const target = this.selectedArtifact();
		if (target === undefined) {
			this.update({popup: NO_POPUP});
			return;
		}

		if (this.options.remover.remove(target)) {
			this.forgetDeletedArtifact(target, 'Artifact deleted.');
			return;
		}

		this.pendingDeletePath = target;
		this.update({pendingAction: 'delete', popup: inputPopup(CREDENTIAL_TITLE)});
	}

	private async clearAllBuilds(): Promise<void> {
		this.update({pendingFailedPaths: []});
		const failures = failedPaths(
			removePathsWithPrivilege(this.state.artifacts, this.options.remover),
		);

		if (failures.length === 0) {
			this.update({artifacts: [], selected: 0});
			await this.fallback(
				'clear the artifact store',
				async () => this.options.store.deleteAll(),
				undefined,
			);
			await this.reloadHistory();
			this.update({popup: infoPopup('All builds cleared.')});
			return;
		}

		this.update({
			pendingFailedPaths: failures,
			pendingAction: 'clear-all',
			popup: inputPopup(CREDENTIAL_TITLE),
		});
	}

	private resumePendingAction(password: string): void {
		const {pendingAction} = this.state;
		this.update({pendingAction: null});

		if (pendingAction === 'delete') {
			this.retryDelete(password);
		} else if (pendingAction === 'clear-all') {
			this.retryClearAll(password);
		}
	}

	private retryDelete(password: string): void {
		const target = this.pendingDeletePath ?? this.selectedArtifact();
		this.pendingDeletePath = null;
		if (target === undefined) return;

		if (this.options.remover.remove(target, password)) {
			this.forgetDeletedArtifact(target, 'Artifact deleted successfully.');
		} else {
			this.update({
				popup: infoPopup(
					'Deletion failed - please check permissions or try again.',
				),
			});
		}
	}

	private retryClearAll(password: string): void {
		const stillFailing = failedPaths(
			removePathsWithPrivilege(
				this.state.pendingFailedPaths,
				this.options.remover,
				password,
			),
		);

		if (stillFailing.length > 0) {
			this.update({
				pendingFailedPaths: stillFailing,
				popup: infoPopup('Some deletions failed - please check permissions.'),
			});
			return;
		}

		this.update({
			pendingFailedPaths: [],
			artifacts: [],
			selected: 0,
			popup: infoPopup('All builds cleared successfully.'),
		});
		this.background.detach('Store clear', async () => {
			await this.options.store.deleteAll();
			await this.enqueue(async () => this.reloadHistory());
		});
	}
}
