import {describe, test, assert, expect, vi, afterEach} from 'vitest';

import {Logger, LogLevel, type LogConsole} from '$lib/log.js';

const create_console = () => {
	const c = {error: vi.fn(), warn: vi.fn(), log: vi.fn()};
	return c satisfies LogConsole;
};

describe('Logger', () => {
	afterEach(() => {
		Logger.level = 'info';
	});

	test('prefixes messages with the label', () => {
		const c = create_console();
		const log = new Logger('test', 'debug', c);
		log.error('a', 1);
		log.warn('b');
		log.info('c');
		log.debug('d');
		expect(c.error.mock.calls).toEqual([['[test]', 'a', 1]]);
		expect(c.warn.mock.calls).toEqual([['[test]', 'b']]);
		expect(c.log.mock.calls).toEqual([['[test]', 'c'], ['[test]', 'd']]);
	});

	test('no prefix without a label', () => {
		const c = create_console();
		const log = new Logger(undefined, 'info', c);
		log.info('hello');
		expect(c.log).toHaveBeenCalledWith('hello');
	});

	test('instance level filters verbose messages', () => {
		const c = create_console();
		const log = new Logger('test', 'warn', c);
		log.info('hidden');
		log.debug('hidden');
		log.warn('shown');
		expect(c.log).not.toHaveBeenCalled();
		expect(c.warn).toHaveBeenCalledTimes(1);
	});

	test('off silences errors', () => {
		const c = create_console();
		const log = new Logger('test', 'off', c);
		log.error('hidden');
		expect(c.error).not.toHaveBeenCalled();
	});

	test('follows the static level when unset', () => {
		const c = create_console();
		const log = new Logger('test', undefined, c);
		log.debug('hidden');
		assert.ok(!log.enabled('debug'));
		Logger.level = 'debug';
		log.debug('shown');
		expect(c.log.mock.calls).toEqual([['[test]', 'shown']]);
	});

	test('LogLevel validates level names', () => {
		assert.strictEqual(LogLevel.parse('warn'), 'warn');
		assert.ok(!LogLevel.safeParse('verbose').success);
	});
});
