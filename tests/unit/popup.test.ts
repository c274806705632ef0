import {describe, expect, test} from 'vitest';
import {charKey} from '../../src/ui/state/keys.js';
import {
	AUTOMATIC_REMOVAL_WARNING,
	PANEL_ORDER,
} from '../../src/ui/state/controller.js';
import {
	NO_POPUP,
	confirmPopup,
	handlePopupKey,
	inputPopup,
} from '../../src/ui/state/popup.js';
import type {PopupCommand} from '../../src/ui/state/events.js';
import type {KeyPress, PopupState} from '../../src/ui/types.js';

const UP: KeyPress = {name: 'up'};
const DOWN: KeyPress = {name: 'down'};
const ENTER: KeyPress = {name: 'enter'};
const ESCAPE: KeyPress = {name: 'escape'};
const BACKSPACE: KeyPress = {name: 'backspace'};

const press = (popup: PopupState, ...keys: KeyPress[]) => {
	let current = popup;
	let command: PopupCommand | null = null;
	for (const key of keys) {
		const transition = handlePopupKey(current, key, () => ['..']);
		current = transition.popup;
		command = transition.command;
	}
	return {popup: current, command};
};

describe('settings popup', () => {
	const settings: PopupState = {kind: 'settings', selected: 0};

	test('wraps over the four options', () => {
		expect(press(settings, UP).popup).toEqual({kind: 'settings', selected: 3});
		expect(press(settings, DOWN, DOWN, DOWN, DOWN).popup).toEqual({
			kind: 'settings',
			selected: 0,
		});
	});

	test('enter emits the command for the selected option and closes', () => {
		expect(press(settings, ENTER)).toEqual({
			popup: NO_POPUP,
			command: {type: 'open-input', title: 'Retention Days', initial: ''},
		});
		expect(press(settings, DOWN, ENTER).command).toEqual({
			type: 'open-dir-browse',
		});
		expect(press(settings, DOWN, DOWN, ENTER).command).toEqual({
			type: 'toggle-removal',
		});
		expect(press(settings, UP, ENTER).command).toEqual({
			type: 'open-excluded-paths',
		});
	});

	test('escape closes without a command', () => {
		expect(press(settings, ESCAPE)).toEqual({popup: NO_POPUP, command: null});
	});
});

describe('input popup', () => {
	test('appends printable characters and pops on backspace', () => {
		const {popup} = press(
			inputPopup('Retention Days', '3'),
			charKey('0'),
			charKey('5'),
			BACKSPACE,
		);
		expect(popup).toEqual({kind: 'input', title: 'Retention Days', value: '30'});
	});

	test('backspace on an empty value keeps it empty', () => {
		expect(press(inputPopup('Scan Path'), BACKSPACE).popup).toEqual({
			kind: 'input',
			title: 'Scan Path',
			value: '',
		});
	});

	test('enter submits the value under the popup title', () => {
		expect(press(inputPopup('Enter sudo password', 'pw'), ENTER)).toEqual({
			popup: NO_POPUP,
			command: {type: 'set-value', key: 'Enter sudo password', value: 'pw'},
		});
	});

	test('escape discards the value', () => {
		expect(press(inputPopup('Retention Days', '12'), ESCAPE)).toEqual({
			popup: NO_POPUP,
			command: null,
		});
	});

	test('q is typed, not treated as quit', () => {
		expect(press(inputPopup('Scan Path', '/tm'), charKey('q')).popup).toEqual({
			kind: 'input',
			title: 'Scan Path',
			value: '/tmq',
		});
	});
});

describe('directory browser', () => {
	const tree: Record<string, string[]> = {
		'/work': ['..', 'alpha', 'beta'],
		'/work/beta': ['..', 'src'],
		'/': ['..', 'work'],
	};
	const lister = (directory: string) => tree[directory] ?? ['..'];
	const browse: PopupState = {
		kind: 'dir-browse',
		path: '/work',
		entries: tree['/work'] ?? [],
		selected: 0,
	};

	test('moves within the entries without wrapping', () => {
		expect(handlePopupKey(browse, UP, lister).popup).toEqual(browse);
		const last = handlePopupKey(
			{...browse, selected: 2},
			DOWN,
			lister,
		).popup;
		expect(last).toEqual({...browse, selected: 2});
	});

	test('enter descends into a directory and resets the selection', () => {
		const {popup, command} = handlePopupKey(
			{...browse, selected: 2},
			ENTER,
			lister,
		);
		expect(command).toBeNull();
		expect(popup).toEqual({
			kind: 'dir-browse',
			path: '/work/beta',
			entries: ['..', 'src'],
			selected: 0,
		});
	});

	test('enter on the parent entry goes up', () => {
		expect(handlePopupKey(browse, ENTER, lister).popup).toEqual({
			kind: 'dir-browse',
			path: '/',
			entries: ['..', 'work'],
			selected: 0,
		});
	});

	test('s selects the highlighted directory as the scan path', () => {
		expect(handlePopupKey({...browse, selected: 1}, charKey('s'), lister)).toEqual(
			{
				popup: NO_POPUP,
				command: {type: 'set-value', key: 'Scan Path', value: '/work/alpha'},
			},
		);
		expect(handlePopupKey(browse, charKey('s'), lister).command).toEqual({
			type: 'set-value',
			key: 'Scan Path',
			value: '/',
		});
	});

	test('space selects the directory being browsed', () => {
		expect(handlePopupKey({...browse, selected: 2}, charKey(' '), lister)).toEqual(
			{
				popup: NO_POPUP,
				command: {type: 'set-value', key: 'Scan Path', value: '/work'},
			},
		);
	});

	test('escape closes', () => {
		expect(handlePopupKey(browse, ESCAPE, lister)).toEqual({
			popup: NO_POPUP,
			command: null,
		});
	});
});

describe('read-only popups', () => {
	test('logs and progress only close on escape', () => {
		expect(press({kind: 'logs'}, charKey('x')).popup).toEqual({kind: 'logs'});
		expect(press({kind: 'logs'}, ESCAPE).popup).toEqual(NO_POPUP);
		const progress: PopupState = {kind: 'progress', message: 'Working'};
		expect(press(progress, ENTER).popup).toEqual(progress);
		expect(press(progress, ESCAPE).popup).toEqual(NO_POPUP);
	});

	test('scanning and info close on any key with no command', () => {
		expect(press({kind: 'scanning'}, charKey('z'))).toEqual({
			popup: NO_POPUP,
			command: null,
		});
		expect(press({kind: 'info', message: 'Done'}, DOWN)).toEqual({
			popup: NO_POPUP,
			command: null,
		});
	});

	test('dismissing an info popup twice is a no-op', () => {
		const once = press({kind: 'info', message: 'Done'}, ENTER);
		expect(press(once.popup, ENTER)).toEqual({popup: NO_POPUP, command: null});
	});

	test('no popup ignores every key', () => {
		expect(press(NO_POPUP, charKey('y'), ENTER)).toEqual({
			popup: NO_POPUP,
			command: null,
		});
	});
});

describe('artifact actions and confirmations', () => {
	test('artifact actions wrap between delete and rebuild', () => {
		const actions: PopupState = {kind: 'artifact-actions', selected: 0};
		expect(press(actions, ENTER).command).toEqual({type: 'delete-artifact'});
		expect(press(actions, UP, ENTER).command).toEqual({type: 'rebuild-artifact'});
		expect(press(actions, DOWN, DOWN).popup).toEqual(actions);
		expect(press(actions, ESCAPE)).toEqual({popup: NO_POPUP, command: null});
	});

	test('clear-all confirmation accepts y or Y and rejects n, N or escape', () => {
		const confirmation: PopupState = {kind: 'clear-all-confirmation'};
		for (const key of [charKey('y'), charKey('Y')]) {
			expect(press(confirmation, key)).toEqual({
				popup: NO_POPUP,
				command: {type: 'clear-all-builds'},
			});
		}
		for (const key of [charKey('n'), charKey('N'), ESCAPE]) {
			expect(press(confirmation, key)).toEqual({popup: NO_POPUP, command: null});
		}
		expect(press(confirmation, ENTER).popup).toEqual(confirmation);
	});

	test('confirm action forwards its action on enter', () => {
		const confirm = confirmPopup(AUTOMATIC_REMOVAL_WARNING, {
			kind: 'enable-automatic-removal',
		});
		expect(press(confirm, ENTER)).toEqual({
			popup: NO_POPUP,
			command: {
				type: 'confirm-action',
				action: {kind: 'enable-automatic-removal'},
			},
		});
		expect(press(confirm, ESCAPE)).toEqual({popup: NO_POPUP, command: null});
	});
});

describe('excluded paths popup', () => {
	const excluded: PopupState = {
		kind: 'excluded-paths',
		paths: ['/work/vendor', '/work/out'],
		selected: 0,
	};

	test('wraps the selection', () => {
		expect(press(excluded, UP).popup).toEqual({...excluded, selected: 1});
	});

	test('enter asks to confirm removing the highlighted path', () => {
		expect(press(excluded, DOWN, ENTER)).toEqual({
			popup: {
				kind: 'confirm-action',
				message: "Remove '/work/out' from exclusion list?",
				action: {kind: 'remove-excluded', path: '/work/out'},
			},
			command: null,
		});
	});

	test('an empty list ignores navigation and enter', () => {
		const empty: PopupState = {kind: 'excluded-paths', paths: [], selected: 0};
		expect(press(empty, DOWN, ENTER).popup).toEqual(empty);
		expect(press(empty, ESCAPE).popup).toEqual(NO_POPUP);
	});
});

test('panels cycle in a fixed order', () => {
	expect(PANEL_ORDER).toEqual([
		'artifacts',
		'history',
		'chart',
		'settings',
		'summary',
	]);
});
