import {Box, Text} from 'ink';
import type {ReactNode} from 'react';
import type {PopupState} from '../types.js';
import {CREDENTIAL_TITLE} from '../state/events.js';
import {ARTIFACT_ACTIONS, SETTINGS_OPTIONS} from '../state/popup.js';
import {buildViewWindow} from '../state/selectors.js';

export const POPUP_LOG_LINES = 20;

const CLEAR_ALL_WARNING = [
	'CLEAR ALL BUILDS - PERMANENT DELETION',
	'',
	'This will delete ALL artifacts from the filesystem.',
	'This action cannot be undone.',
	'',
	'Are you absolutely sure? (y: Confirm, n: Cancel)',
].join('\n');

interface PopupOverlayProps {
	popup: PopupState;
	logLines: string[];
	width: number;
	listHeight: number;
}

interface ModalProps {
	title: string;
	color: string;
	width: number;
	children: ReactNode;
}

function Modal({title, color, width, children}: ModalProps) {
	return (
		<Box
			width={width}
			borderStyle="double"
			borderColor={color}
			paddingX={2}
			paddingY={1}
			flexDirection="column"
		>
			<Box marginBottom={1}>
				<Text color={color} bold>
					{title}
				</Text>
			</Box>
			{children}
		</Box>
	);
}

function OptionList({
	options,
	selected,
	color,
}: {
	options: readonly string[];
	selected: number;
	color: string;
}) {
	return (
		<>
			{options.map((option, index) => (
				<Text
					key={`${index}:${option}`}
					color={index === selected ? color : undefined}
					bold={index === selected}
					wrap="truncate-end"
				>
					{index === selected ? '> ' : '  '}
					{option}
				</Text>
			))}
		</>
	);
}

function LogLines({lines}: {lines: string[]}) {
	return (
		<>
			{lines.map((line, index) => (
				<Text key={`${index}:${line}`} wrap="truncate-end">
					{line}
				</Text>
			))}
		</>
	);
}

export function PopupOverlay({
	popup,
	logLines,
	width,
	listHeight,
}: PopupOverlayProps) {
	const recentLogs = logLines.slice(-POPUP_LOG_LINES);

	switch (popup.kind) {
		case 'none':
			return null;

		case 'settings':
			return (
				<Modal title="Settings (Up/Down Enter Esc)" color="cyan" width={width}>
					<OptionList
						options={SETTINGS_OPTIONS}
						selected={popup.selected}
						color="cyan"
					/>
				</Modal>
			);

		case 'input': {
			const shown =
				popup.title === CREDENTIAL_TITLE
					? '*'.repeat(popup.value.length)
					: popup.value;
			return (
				<Modal
					title="Edit (Enter: Apply, Esc: Cancel)"
					color="cyan"
					width={width}
				>
					<Text>
						{popup.title}: {shown}
					</Text>
				</Modal>
			);
		}

		case 'dir-browse': {
			const {start, end} = buildViewWindow(
				popup.selected,
				listHeight,
				popup.entries.length,
			);
			return (
				<Modal title={`Browse: ${popup.path}`} color="cyan" width={width}>
					<Text color="gray">
						Up/Down Nav, Enter: Open, s: Select, Space: Select Current, Esc:
						Cancel
					</Text>
					<OptionList
						options={popup.entries.slice(start, end)}
						selected={popup.selected - start}
						color="blue"
					/>
				</Modal>
			);
		}

		case 'logs':
			return (
				<Modal title="Logs" color="white" width={width}>
					{recentLogs.length === 0 ? (
						<Text color="gray">No log entries yet.</Text>
					) : (
						<LogLines lines={recentLogs} />
					)}
				</Modal>
			);

		case 'scanning':
			return (
				<Modal title="Scanning for new artifacts" color="cyan" width={width}>
					<Text color="gray">Press any key to close</Text>
					<LogLines lines={recentLogs} />
				</Modal>
			);

		case 'artifact-actions':
			return (
				<Modal title="SELECT ACTION" color="red" width={width}>
					<OptionList
						options={ARTIFACT_ACTIONS}
						selected={popup.selected}
						color="red"
					/>
				</Modal>
			);

		case 'clear-all-confirmation':
			return (
				<Modal title="CLEAR ALL BUILDS" color="red" width={width}>
					<Text color="red">{CLEAR_ALL_WARNING}</Text>
				</Modal>
			);

		case 'confirm-action':
			return (
				<Modal title="CONFIRM ACTION" color="yellow" width={width}>
					<Text>{popup.message}</Text>
					<Box marginTop={1}>
						<Text color="gray">Enter: Confirm | Esc: Cancel</Text>
					</Box>
				</Modal>
			);

		case 'progress':
			return (
				<Modal title="Progress" color="white" width={width}>
					<Text>{popup.message}</Text>
					<Box marginTop={1}>
						<Text color="gray">Press Esc to close.</Text>
					</Box>
				</Modal>
			);

		case 'info':
			return (
				<Modal title="Info" color="green" width={width}>
					<Text>{popup.message}</Text>
				</Modal>
			);

		case 'excluded-paths':
			return (
				<Modal
					title="Excluded Paths (Up/Down, Enter to remove, Esc)"
					color="yellow"
					width={width}
				>
					{popup.paths.length === 0 ? (
						<Text color="gray">(No excluded paths yet)</Text>
					) : (
						<OptionList
							options={popup.paths}
							selected={popup.selected}
							color="yellow"
						/>
					)}
				</Modal>
			);
	}
}
