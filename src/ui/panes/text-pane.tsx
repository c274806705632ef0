import {Text} from 'ink';
import {Panel} from './panel.js';

interface TextPaneProps {
	title: string;
	lines: string[];
	focused: boolean;
}

export function TextPane({title, lines, focused}: TextPaneProps) {
	return (
		<Panel title={title} focused={focused}>
			{lines.map(line => (
				<Text key={line} wrap="truncate-end">
					{line}
				</Text>
			))}
		</Panel>
	);
}
