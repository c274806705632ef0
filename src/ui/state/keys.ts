import type {Key} from 'ink';
import type {KeyPress} from '../types.js';

export const toKeyPress = (input: string, key: Key): KeyPress => {
	const ctrl = key.ctrl;
	if (key.upArrow) return {name: 'up', ctrl};
	if (key.downArrow) return {name: 'down', ctrl};
	if (key.pageUp) return {name: 'pageup', ctrl};
	if (key.pageDown) return {name: 'pagedown', ctrl};
	if (key.return) return {name: 'enter', ctrl};
	if (key.escape) return {name: 'escape', ctrl};
	// Most terminals send DEL for the backspace key, which Ink reports as delete.
	if (key.backspace || key.delete) return {name: 'backspace', ctrl};
	if (key.tab) return {name: 'tab', ctrl};
	if (input.length > 0) return {name: 'char', char: input, ctrl};
	return {name: 'other', ctrl};
};

export const isChar = (key: KeyPress, ...chars: string[]): boolean =>
	key.name === 'char' && chars.includes(key.char);

export const charKey = (char: string): KeyPress => ({name: 'char', char});
