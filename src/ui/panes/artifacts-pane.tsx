import {Text} from 'ink';
import {
	artifactColor,
	buildViewWindow,
	relativeArtifactPath,
} from '../state/selectors.js';
import {Panel} from './panel.js';

interface ArtifactsPaneProps {
	artifacts: string[];
	selected: number;
	focused: boolean;
	scanPath: string | undefined;
	height: number;
}

export function ArtifactsPane({
	artifacts,
	selected,
	focused,
	scanPath,
	height,
}: ArtifactsPaneProps) {
	const {start, end} = buildViewWindow(selected, height, artifacts.length);

	return (
		<Panel title={`Artifacts (${artifacts.length})`} focused={focused}>
			{artifacts.length === 0 ? (
				<Text color="gray">No artifacts yet. Press s to scan.</Text>
			) : (
				artifacts.slice(start, end).map((artifact, offset) => {
					const index = start + offset;
					const highlighted = focused && index === selected;
					return (
						<Text
							key={`${index}:${artifact}`}
							color={highlighted ? 'black' : artifactColor(artifact)}
							backgroundColor={highlighted ? 'blue' : undefined}
							wrap="truncate-end"
						>
							{relativeArtifactPath(artifact, scanPath)}
						</Text>
					);
				})
			)}
		</Panel>
	);
}
