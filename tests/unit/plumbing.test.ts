import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {expect, test, vi} from 'vitest';
import {BackgroundTasks} from '../../src/core/background.js';
import {LogBuffer} from '../../src/core/log-buffer.js';
import {
	createDebugLogger,
	formatLogLine,
	noopLogger,
} from '../../src/core/logger.js';
import {ResultSlot} from '../../src/core/result-slot.js';

test('LogBuffer keeps lines in order and drops the oldest past capacity', () => {
	const logs = new LogBuffer(3);
	for (const line of ['one', 'two', 'three', 'four']) logs.append(line);

	expect(logs.lines()).toEqual(['two', 'three', 'four']);
	expect(logs.lines(2)).toEqual(['three', 'four']);
	expect(logs.lines(0)).toEqual([]);
	expect(logs.size).toBe(3);
});

test('LogBuffer.revision counts every append, even past capacity', () => {
	const logs = new LogBuffer(2);
	expect(logs.revision).toBe(0);
	for (const line of ['one', 'two', 'three']) logs.append(line);

	expect(logs.revision).toBe(3);
	expect(logs.size).toBe(2);
});

test('LogBuffer.lines returns a copy', () => {
	const logs = new LogBuffer();
	logs.append('first');
	logs.lines().push('mutated');

	expect(logs.lines()).toEqual(['first']);
});

test('ResultSlot hands over one value at a time, exactly once', () => {
	const slot = new ResultSlot<string[]>();
	expect(slot.take()).toBeUndefined();

	expect(slot.send(['/a'])).toBe(true);
	expect(slot.isFull).toBe(true);
	expect(slot.send(['/b'])).toBe(false);

	expect(slot.take()).toEqual(['/a']);
	expect(slot.take()).toBeUndefined();
	expect(slot.send([])).toBe(true);
	expect(slot.take()).toEqual([]);
});

test('BackgroundTasks logs failures and tracks pending units', async () => {
	const error = vi.fn();
	const tasks = new BackgroundTasks({...noopLogger, error});
	let finished = false;

	tasks.detach('Works', async () => {
		finished = true;
	});
	tasks.detach('Breaks', async () => {
		throw new Error('boom');
	});
	expect(tasks.size).toBe(2);

	await tasks.settled();

	expect(finished).toBe(true);
	expect(tasks.size).toBe(0);
	expect(error).toHaveBeenCalledTimes(1);
	expect(error).toHaveBeenCalledWith('Breaks failed', new Error('boom'));
});

test('BackgroundTasks.settled waits for units detached while settling', async () => {
	const tasks = new BackgroundTasks(noopLogger);
	const order: string[] = [];

	tasks.detach('Outer', async () => {
		order.push('outer');
		tasks.detach('Inner', async () => {
			order.push('inner');
		});
	});
	await tasks.settled();

	expect(order).toEqual(['outer', 'inner']);
});

test('formatLogLine prefixes the timestamp and level', () => {
	const now = new Date('2026-01-02T03:04:05.000Z');
	expect(formatLogLine('WARN', 'Stopped', new Error('gone'), now)).toBe(
		'2026-01-02T03:04:05.000Z WARN Stopped (gone)',
	);
	expect(formatLogLine('DEBUG', 'Counted', {total: 2}, now)).toBe(
		'2026-01-02T03:04:05.000Z DEBUG Counted {"total":2}',
	);
	expect(formatLogLine('ERROR', 'Plain', undefined, now)).toBe(
		'2026-01-02T03:04:05.000Z ERROR Plain',
	);
});

test('createDebugLogger appends to its file only when enabled', async () => {
	const directory = await fs.mkdtemp(path.join(os.tmpdir(), 'buildsweep-log-'));
	const filePath = path.join(directory, 'logs', 'debug.log');

	createDebugLogger({enabled: false, filePath}).warn('ignored');
	await expect(fs.access(filePath)).rejects.toThrow();

	const logger = createDebugLogger({enabled: true, filePath});
	logger.debug('first');
	logger.error('second', 'detail');

	const lines = (await fs.readFile(filePath, 'utf8')).trimEnd().split('\n');
	expect(lines).toHaveLength(2);
	expect(lines[0]?.endsWith(' DEBUG first')).toBe(true);
	expect(lines[1]?.endsWith(' ERROR second (detail)')).toBe(true);
});
