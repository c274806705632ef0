import {Text} from 'ink';
import type {ChartBar} from '../types.js';
import {buildViewWindow} from '../state/selectors.js';
import {Panel} from './panel.js';

const BAR_COLORS = ['red', 'green', 'blue', 'yellow', 'magenta', 'cyan', 'white'];

interface ChartPaneProps {
	bars: ChartBar[];
	selected: number;
	focused: boolean;
	height: number;
}

export function ChartPane({bars, selected, focused, height}: ChartPaneProps) {
	const {start, end} = buildViewWindow(selected, height, bars.length);

	return (
		<Panel title="Charts" focused={focused}>
			{bars.length === 0 ? (
				<Text color="gray">No data</Text>
			) : (
				bars.slice(start, end).map((bar, offset) => {
					const index = start + offset;
					const highlighted = focused && index === selected;
					return (
						<Text
							key={`${index}:${bar.label}`}
							color={
								highlighted ? 'white' : BAR_COLORS[index % BAR_COLORS.length]
							}
							backgroundColor={highlighted ? 'blue' : undefined}
							bold={highlighted}
							wrap="truncate-end"
						>
							{bar.label} {bar.bar} {bar.sizeLabel}
						</Text>
					);
				})
			)}
		</Panel>
	);
}
