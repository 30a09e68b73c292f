import { describe, expect, test, vi } from 'vitest';
import { createConsoleLogger, formatLogLine, type LogLevel, silentLogger } from '../src/logger.js';

function capture() {
	const lines: [LogLevel, string][] = [];
	return { lines, sink: (level: LogLevel, line: string) => lines.push([level, line]) };
}

describe('formatLogLine', () => {
	test('appends context as key=value pairs', () => {
		expect(
			formatLogLine('scheduling complete', { status: 'available', slots: 3 }, 'quorum'),
		).toBe('[quorum] scheduling complete status=available slots=3');
	});

	test('quotes strings with whitespace and formats dates and errors', () => {
		expect(
			formatLogLine('lookup failed', {
				note: 'two words',
				at: new Date('2025-01-06T09:00:00Z'),
				error: new Error('timeout'),
				ids: ['a', 'b'],
			}),
		).toBe('lookup failed note="two words" at=2025-01-06T09:00:00.000Z error="timeout" ids=["a","b"]');
	});
});

describe('createConsoleLogger', () => {
	test('drops messages below the threshold', () => {
		const { lines, sink } = capture();
		const logger = createConsoleLogger({ level: 'warn', sink });

		logger.debug('debug');
		logger.info('info');
		logger.warn('warn');
		logger.error('error');

		expect(lines).toEqual([
			['warn', 'warn'],
			['error', 'error'],
		]);
	});

	test('defaults to info', () => {
		const { lines, sink } = capture();
		const logger = createConsoleLogger({ sink });

		logger.debug('hidden');
		logger.info('shown', { n: 1 });

		expect(lines).toEqual([['info', 'shown n=1']]);
	});

	test('writes to the console method of the level', () => {
		const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

		createConsoleLogger({ prefix: 'quorum' }).warn('careful');

		expect(warn).toHaveBeenCalledWith('[quorum] careful');
		warn.mockRestore();
	});
});

describe('silentLogger', () => {
	test('accepts every level without output', () => {
		const info = vi.spyOn(console, 'info').mockImplementation(() => {});

		silentLogger.info('nothing');

		expect(info).not.toHaveBeenCalled();
		info.mockRestore();
	});
});
