import {Text} from 'ink';
import {Panel} from './panel.js';

interface HistoryPaneProps {
	lines: string[];
	focused: boolean;
}

export function HistoryPane({lines, focused}: HistoryPaneProps) {
	return (
		<Panel title="History" focused={focused}>
			{lines.length === 0 ? (
				<Text color="gray">No builds recorded.</Text>
			) : (
				lines.map((line, index) => (
					<Text key={`${index}:${line}`} wrap="truncate-end">
						{line}
					</Text>
				))
			)}
		</Panel>
	);
}
