import {useApp, useInput, useStdout} from 'ink';
import {useEffect, useMemo, useSyncExternalStore} from 'react';
import {Footer} from './ui/footer.js';
import {Header} from './ui/header.js';
import {LayoutShell} from './ui/layout-shell.js';
import {PopupOverlay} from './ui/overlays/popup-overlay.js';
import {ArtifactsPane} from './ui/panes/artifacts-pane.js';
import {ChartPane} from './ui/panes/chart-pane.js';
import {HistoryPane} from './ui/panes/history-pane.js';
import {TextPane} from './ui/panes/text-pane.js';
import {POLL_INTERVAL_MS} from './ui/state/controller.js';
import type {SessionController} from './ui/state/controller.js';
import {toKeyPress} from './ui/state/keys.js';
import {
	CHART_LABEL_WIDTH,
	MAIN_SHORTCUTS,
	buildChartBars,
	historyLines,
	settingsLines,
	summaryLines,
} from './ui/state/selectors.js';

interface AppProps {
	controller: SessionController;
	pollIntervalMs?: number;
}

const DEFAULT_WIDTH = 100;
const DEFAULT_HEIGHT = 30;

export default function App({
	controller,
	pollIntervalMs = POLL_INTERVAL_MS,
}: AppProps) {
	const state = useSyncExternalStore(
		controller.subscribe,
		controller.getSnapshot,
	);
	const {exit} = useApp();
	const {stdout} = useStdout();
	const terminalWidth = stdout.columns || DEFAULT_WIDTH;
	// One row short of the terminal keeps Ink from clearing the screen per frame.
	const terminalHeight = Math.max(12, (stdout.rows || DEFAULT_HEIGHT) - 1);
	const panelRows = Math.max(3, Math.floor((terminalHeight - 8) / 2) - 3);
	const columnWidth = Math.floor(terminalWidth / 3);
	const [scanPath] = state.config.scanPaths;

	useInput((input, key) => {
		void controller.submit(toKeyPress(input, key));
	});

	useEffect(() => {
		const timer = setInterval(() => {
			void controller.submit();
		}, pollIntervalMs);
		return () => {
			clearInterval(timer);
		};
	}, [controller, pollIntervalMs]);

	useEffect(() => {
		if (state.shouldQuit) exit();
	}, [exit, state.shouldQuit]);

	const chartBars = useMemo(
		() =>
			buildChartBars(
				state.chartData,
				columnWidth - CHART_LABEL_WIDTH - 16,
				scanPath,
			),
		[columnWidth, scanPath, state.chartData],
	);

	const overlay =
		state.popup.kind === 'none' ? null : (
			<PopupOverlay
				popup={state.popup}
				logLines={controller.logs.lines()}
				width={Math.max(40, Math.min(90, terminalWidth - 4))}
				listHeight={Math.max(5, terminalHeight - 14)}
			/>
		);

	return (
		<LayoutShell
			terminalWidth={terminalWidth}
			terminalHeight={terminalHeight}
			header={<Header />}
			topRow={
				<>
					<ArtifactsPane
						artifacts={state.artifacts}
						selected={state.selected}
						focused={state.focusedPanel === 'artifacts'}
						scanPath={scanPath}
						height={panelRows}
					/>
					<HistoryPane
						lines={historyLines(state.history, state.historyError)}
						focused={state.focusedPanel === 'history'}
					/>
					<ChartPane
						bars={chartBars}
						selected={state.chartSelected}
						focused={state.focusedPanel === 'chart'}
						height={panelRows}
					/>
				</>
			}
			bottomRow={
				<>
					<TextPane
						title="Settings"
						lines={settingsLines(state.config, state.automaticRemoval)}
						focused={state.focusedPanel === 'settings'}
					/>
					<TextPane
						title="Summary"
						lines={summaryLines({
							totalBuilds: state.totalBuilds,
							artifactCount: state.artifacts.length,
							scanning: state.scanning,
						})}
						focused={state.focusedPanel === 'summary'}
					/>
				</>
			}
			footer={<Footer shortcuts={MAIN_SHORTCUTS} />}
			overlay={overlay}
		/>
	);
}
