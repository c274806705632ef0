export type ConfirmAction =
	| {kind: 'delete'}
	| {kind: 'rebuild'}
	| {kind: 'exclude'}
	| {kind: 'enable-automatic-removal'}
	| {kind: 'remove-excluded'; path: string};

export type PopupState =
	| {kind: 'none'}
	| {kind: 'settings'; selected: number}
	| {kind: 'input'; title: string; value: string}
	| {kind: 'dir-browse'; path: string; entries: string[]; selected: number}
	| {kind: 'logs'}
	| {kind: 'scanning'}
	| {kind: 'artifact-actions'; selected: number}
	| {kind: 'clear-all-confirmation'}
	| {kind: 'confirm-action'; message: string; action: ConfirmAction}
	| {kind: 'progress'; message: string}
	| {kind: 'info'; message: string}
	| {kind: 'excluded-paths'; paths: string[]; selected: number};

export type PopupKind = PopupState['kind'];

export type KeyName =
	| 'up'
	| 'down'
	| 'pageup'
	| 'pagedown'
	| 'enter'
	| 'escape'
	| 'backspace'
	| 'tab'
	| 'other';

export type KeyPress =
	| {name: KeyName; ctrl?: boolean}
	| {name: 'char'; char: string; ctrl?: boolean};

export interface ShortcutHint {
	key: string;
	label: string;
}

export interface ChartBar {
	label: string;
	bar: string;
	sizeLabel: string;
}
