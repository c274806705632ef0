import {Box} from 'ink';
import type {ReactNode} from 'react';

interface LayoutShellProps {
	terminalWidth: number;
	terminalHeight: number;
	header: ReactNode;
	topRow: ReactNode;
	bottomRow: ReactNode;
	footer: ReactNode;
	overlay?: ReactNode;
}

// Ink cannot paint over cells it already drew, so an open popup takes the
// place of the panel grid instead of floating above it.
export function LayoutShell({
	terminalWidth,
	terminalHeight,
	header,
	topRow,
	bottomRow,
	footer,
	overlay,
}: LayoutShellProps) {
	return (
		<Box width={terminalWidth} height={terminalHeight} flexDirection="column">
			{header}

			{overlay ? (
				<Box flexGrow={1} justifyContent="center" alignItems="center">
					{overlay}
				</Box>
			) : (
				<Box flexGrow={1} flexDirection="column">
					<Box flexGrow={1} flexBasis={0} flexDirection="row" gap={1}>
						{topRow}
					</Box>
					<Box flexGrow={1} flexBasis={0} flexDirection="row" gap={1}>
						{bottomRow}
					</Box>
				</Box>
			)}

			{footer}
		</Box>
	);
}
