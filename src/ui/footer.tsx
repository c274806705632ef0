import {Box, Text} from 'ink';
import type {ShortcutHint} from './types.js';

interface FooterProps {
	shortcuts: ShortcutHint[][];
}

export function Footer({shortcuts}: FooterProps) {
	return (
		<Box
			borderStyle="round"
			borderColor="gray"
			paddingX={1}
			width="100%"
			flexWrap="wrap"
		>
			{shortcuts.map((group, groupIndex) => (
				<Box key={`group-${groupIndex}`} marginRight={2}>
					{group.map((shortcut, shortcutIndex) => (
						<Text key={shortcut.key}>
							{shortcutIndex > 0 ? <Text color="gray"> | </Text> : null}
							<Text color="cyan" bold>
								{shortcut.key}
							</Text>{' '}
							<Text color="gray">{shortcut.label}</Text>
						</Text>
					))}
				</Box>
			))}
		</Box>
	);
}
