export type PanelId = 'artifacts' | 'history' | 'chart' | 'settings' | 'summary';
export type PendingAction = 'delete' | 'clear-all';

export interface SweepConfig {
	scanPaths: string[];
	excludedPaths: string[];
	retentionDays: number;
	databasePath: string;
	debugLogs: boolean;
	automaticRemoval: boolean;
	maxScanDepth: number;
}

export interface ConfigStore {
	load: () => Promise<SweepConfig>;
	save: (config: SweepConfig) => Promise<void>;
}

export interface NewBuildEvent {
	projectPath: string;
	language: string;
	artifactPath: string;
	sizeBytes: number;
	builtAt?: Date;
}

export interface BuildEvent {
	projectPath: string;
	language: string;
	builtAt: Date;
}

export interface ArtifactSize {
	path: string;
	sizeBytes: number;
}

export interface ArtifactStore {
	recordBuild: (event: NewBuildEvent) => Promise<void>;
	recentArtifactPaths: (limit?: number) => Promise<string[]>;
	recentBuilds: (limit?: number) => Promise<BuildEvent[]>;
	countBuilds: () => Promise<number>;
	artifactSizes: () => Promise<ArtifactSize[]>;
	deleteArtifact: (artifactPath: string) => Promise<void>;
	deleteAll: () => Promise<void>;
	staleArtifactPaths: (retentionDays: number) => Promise<string[]>;
	deleteBuildsOlderThan: (retentionDays: number) => Promise<void>;
	close: () => void;
}

export interface PathWatcher {
	watch: (targetPath: string) => void;
	close: () => void;
}

export interface PrivilegedRemover {
	remove: (targetPath: string, password?: string) => boolean;
}

export interface DebugLogger {
	debug: (message: string, details?: unknown) => void;
	warn: (message: string, details?: unknown) => void;
	error: (message: string, details?: unknown) => void;
}

export type DeleteResult =
	| {path: string; ok: true}
	| {path: string; ok: false; error: unknown};

export interface WalkEntry {
	path: string;
	name: string;
	depth: number;
}

export interface WalkOptions {
	maxDepth: number;
	descend?: (entry: WalkEntry) => boolean;
}

export type DirectoryWalker = (
	root: string,
	options: WalkOptions,
) => AsyncIterable<WalkEntry>;
