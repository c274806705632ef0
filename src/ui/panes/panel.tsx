import {Box, Text} from 'ink';
import type {ReactNode} from 'react';

interface PanelProps {
	title: string;
	focused: boolean;
	children: ReactNode;
}

export function Panel({title, focused, children}: PanelProps) {
	return (
		<Box
			borderStyle="round"
			borderColor={focused ? 'yellow' : 'gray'}
			paddingX={1}
			flexDirection="column"
			flexGrow={1}
			flexBasis={0}
			overflow="hidden"
		>
			<Text color={focused ? 'yellow' : 'cyan'} bold>
				{title}
			</Text>
			{children}
		</Box>
	);
}
