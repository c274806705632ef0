import path from 'node:path';
import {formatTimestamp, human} from '../../core/format.js';
import type {ArtifactSize, BuildEvent, SweepConfig} from '../../core/types.js';
import type {ChartBar, ShortcutHint} from '../types.js';

export const HISTORY_ERROR_LINE = 'Failed to load history';
export const CHART_LABEL_WIDTH = 15;

export const clampIndex = (nextIndex: number, totalItems: number): number => {
	if (totalItems <= 0) return 0;
	return Math.max(0, Math.min(totalItems - 1, nextIndex));
};

export const buildViewWindow = (
	cursorIndex: number,
	height: number,
	total: number,
): {start: number; end: number} => {
	const half = Math.floor(height / 2);
	let start = Math.max(0, cursorIndex - half);
	const end = start + height;
	if (end > total) {
		start = Math.max(0, total - height);
	}
	return {
		start,
		end: Math.min(start + height, total),
	};
};

/** Artifact path shown relative to the first scan root when it sits below it. */
export const relativeArtifactPath = (
	artifactPath: string,
	scanPath: string | undefined,
): string => {
	if (!scanPath) return artifactPath;
	const root = path.resolve(scanPath);
	if (!artifactPath.startsWith(`${root}${path.sep}`)) return artifactPath;
	return artifactPath.slice(root.length + 1);
};

export const artifactColor = (artifactPath: string): string => {
	if (artifactPath.includes('target')) return 'green';
	if (artifactPath.includes('node_modules')) return 'blue';
	if (artifactPath.includes('__pycache__')) return 'yellow';
	if (artifactPath.includes('build')) return 'red';
	return 'white';
};

export const historyLines = (
	history: readonly BuildEvent[],
	historyError: boolean,
): string[] => {
	if (historyError) return [HISTORY_ERROR_LINE];
	return history.map(
		event =>
			`${event.projectPath} - ${event.language} - ${formatTimestamp(event.builtAt)}`,
	);
};

export const settingsLines = (
	config: SweepConfig,
	automaticRemoval: boolean,
): string[] => [
	`DB: ${config.databasePath}`,
	`Paths: ${config.scanPaths.join(',')}`,
	`Retention Days: ${config.retentionDays}`,
	`Automatic Removal: ${automaticRemoval ? 'Enabled' : 'Disabled'}`,
	`Excluded Paths: ${config.excludedPaths.length}`,
];

export const summaryLines = ({
	totalBuilds,
	artifactCount,
	scanning,
}: {
	totalBuilds: number;
	artifactCount: number;
	scanning: boolean;
}): string[] => [
	`Total Builds: ${totalBuilds}`,
	`Artifacts: ${artifactCount}`,
	`Scans: ${scanning ? 'Running' : 'Idle'}`,
	'Watcher: Running',
];

const shortLabel = (label: string): string =>
	label.length > CHART_LABEL_WIDTH ? `${label.slice(0, 12)}...` : label;

/**
 * Horizontal bars scaled against the largest artifact. `width` is the space
 * left for the bar itself; it never drops below 10 cells.
 */
export const buildChartBars = (
	chartData: readonly ArtifactSize[],
	width: number,
	scanPath: string | undefined,
): ChartBar[] => {
	const maxSize = Math.max(0, ...chartData.map(entry => entry.sizeBytes));
	const available = Math.max(10, Math.floor(width));

	return chartData.map(entry => ({
		label: shortLabel(relativeArtifactPath(entry.path, scanPath)).padEnd(
			CHART_LABEL_WIDTH,
		),
		bar:
			maxSize > 0
				? '█'.repeat(Math.floor((entry.sizeBytes * available) / maxSize))
				: '',
		sizeLabel: human(entry.sizeBytes),
	}));
};

export const MAIN_SHORTCUTS: ShortcutHint[][] = [
	[
		{key: 'tab', label: 'focus'},
		{key: 'enter', label: 'open'},
		{key: 'up/down', label: 'move'},
	],
	[
		{key: 's', label: 'scan'},
		{key: 'd', label: 'delete'},
		{key: 'x', label: 'exclude'},
		{key: 'r', label: 'rebuild'},
	],
	[
		{key: 'e', label: 'settings'},
		{key: 'l', label: 'logs'},
		{key: 'h', label: 'history'},
		{key: 'D', label: 'clear all'},
		{key: 'q', label: 'quit'},
	],
];
