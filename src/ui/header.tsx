import {Box, Text} from 'ink';

export function Header() {
	return (
		<Box borderStyle="round" borderColor="cyan" paddingX={1} justifyContent="center">
			<Text color="cyan" bold>
				buildsweep - build artifact cleanup
			</Text>
		</Box>
	);
}
