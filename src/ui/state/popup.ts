import {
	PARENT_ENTRY,
	listDirectoryEntries,
	resolveEntry,
} from '../../core/directories.js';
import type {DirectoryLister} from '../../core/directories.js';
import type {ConfirmAction, KeyPress, PopupState} from '../types.js';
import {RETENTION_DAYS_TITLE, SCAN_PATH_TITLE} from './events.js';
import type {PopupCommand} from './events.js';
import {isChar} from './keys.js';

export const SETTINGS_OPTIONS = [
	'Retention Days',
	'Scan Path',
	'Automatic Removal',
	'Excluded Paths',
] as const;

export const ARTIFACT_ACTIONS = ['Delete', 'Rebuild'] as const;

export interface PopupTransition {
	popup: PopupState;
	command: PopupCommand | null;
}

export const NO_POPUP: PopupState = {kind: 'none'};

export const infoPopup = (message: string): PopupState => ({
	kind: 'info',
	message,
});

export const progressPopup = (message: string): PopupState => ({
	kind: 'progress',
	message,
});

export const inputPopup = (title: string, value = ''): PopupState => ({
	kind: 'input',
	title,
	value,
});

export const confirmPopup = (
	message: string,
	action: ConfirmAction,
): PopupState => ({kind: 'confirm-action', message, action});

export const dirBrowsePopup = (
	directory: string,
	listDirectories: DirectoryLister = listDirectoryEntries,
): PopupState => ({
	kind: 'dir-browse',
	path: directory,
	entries: listDirectories(directory),
	selected: 0,
});

export const removeExcludedMessage = (excludedPath: string): string =>
	`Remove '${excludedPath}' from exclusion list?`;

const wrap = (index: number, delta: number, total: number): number =>
	total <= 0 ? 0 : (((index + delta) % total) + total) % total;

const clamp = (index: number, total: number): number =>
	total <= 0 ? 0 : Math.max(0, Math.min(total - 1, index));

const verticalDelta = (key: KeyPress): number => {
	if (key.name === 'up') return -1;
	if (key.name === 'down') return 1;
	return 0;
};

const stay = (popup: PopupState): PopupTransition => ({popup, command: null});
const close = (command: PopupCommand | null = null): PopupTransition => ({
	popup: NO_POPUP,
	command,
});

const settingsCommand = (selected: number): PopupCommand | null => {
	switch (selected) {
		case 0:
			return {type: 'open-input', title: RETENTION_DAYS_TITLE, initial: ''};
		case 1:
			return {type: 'open-dir-browse'};
		case 2:
			return {type: 'toggle-removal'};
		case 3:
			return {type: 'open-excluded-paths'};
		default:
			return null;
	}
};

/**
 * Applies one key press to the active popup. Returns the popup that should
 * be shown next and, at most, one command for the session controller. The
 * directory lister is only consulted while browsing.
 */
export const handlePopupKey = (
	popup: PopupState,
	key: KeyPress,
	listDirectories: DirectoryLister = listDirectoryEntries,
): PopupTransition => {
	const delta = verticalDelta(key);

	switch (popup.kind) {
		case 'none':
			return stay(popup);

		case 'settings':
			if (delta !== 0) {
				return stay({
					...popup,
					selected: wrap(popup.selected, delta, SETTINGS_OPTIONS.length),
				});
			}
			if (key.name === 'enter') return close(settingsCommand(popup.selected));
			if (key.name === 'escape') return close();
			return stay(popup);

		case 'input':
			if (key.name === 'char' && !key.ctrl) {
				return stay({...popup, value: popup.value + key.char});
			}
			if (key.name === 'backspace') {
				return stay({...popup, value: popup.value.slice(0, -1)});
			}
			if (key.name === 'enter') {
				return close({type: 'set-value', key: popup.title, value: popup.value});
			}
			if (key.name === 'escape') return close();
			return stay(popup);

		case 'dir-browse': {
			if (delta !== 0) {
				return stay({
					...popup,
					selected: clamp(popup.selected + delta, popup.entries.length),
				});
			}
			const entry = popup.entries[popup.selected] ?? PARENT_ENTRY;
			if (key.name === 'enter') {
				return stay(
					dirBrowsePopup(resolveEntry(popup.path, entry), listDirectories),
				);
			}
			if (isChar(key, 's')) {
				return close({
					type: 'set-value',
					key: SCAN_PATH_TITLE,
					value: resolveEntry(popup.path, entry),
				});
			}
			if (isChar(key, ' ')) {
				return close({
					type: 'set-value',
					key: SCAN_PATH_TITLE,
					value: popup.path,
				});
			}
			if (key.name === 'escape') return close();
			return stay(popup);
		}

		case 'logs':
		case 'progress':
			return key.name === 'escape' ? close() : stay(popup);

		case 'scanning':
		case 'info':
			return close();

		case 'artifact-actions':
			if (delta !== 0) {
				return stay({
					...popup,
					selected: wrap(popup.selected, delta, ARTIFACT_ACTIONS.length),
				});
			}
			if (key.name === 'enter') {
				return close(
					popup.selected === 0
						? {type: 'delete-artifact'}
						: {type: 'rebuild-artifact'},
				);
			}
			if (key.name === 'escape') return close();
			return stay(popup);

		case 'clear-all-confirmation':
			if (isChar(key, 'y', 'Y')) return close({type: 'clear-all-builds'});
			if (isChar(key, 'n', 'N') || key.name === 'escape') return close();
			return stay(popup);

		case 'confirm-action':
			if (key.name === 'enter') {
				return close({type: 'confirm-action', action: popup.action});
			}
			if (key.name === 'escape') return close();
			return stay(popup);

		case 'excluded-paths': {
			if (delta !== 0) {
				return stay({
					...popup,
					selected: wrap(popup.selected, delta, popup.paths.length),
				});
			}
			const excludedPath = popup.paths[popup.selected];
			if (key.name === 'enter' && excludedPath !== undefined) {
				return stay(
					confirmPopup(removeExcludedMessage(excludedPath), {
						kind: 'remove-excluded',
						path: excludedPath,
					}),
				);
			}
			if (key.name === 'escape') return close();
			return stay(popup);
		}
	}
};
