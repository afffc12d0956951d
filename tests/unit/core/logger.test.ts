/**
 * Logger tests
 */

import { LogLevel, Logger, getLogger, parseLogLevel, setGlobalLogLevel } from '../../../src/core/logger.js';
import type { LogContext } from '../../../src/core/logger.js';

describe('Logger', () => {
	it('should only emit messages at or above its level', () => {
		const logger = new Logger('test', LogLevel.WARN);
		const output = jest.fn();
		logger.addOutput(output);

		logger.info('ignored');
		logger.warn('kept');
		logger.error('also kept');

		expect(output).toHaveBeenCalledTimes(2);
		expect(output).toHaveBeenNthCalledWith(1, LogLevel.WARN, 'kept', undefined);
		expect(output).toHaveBeenNthCalledWith(2, LogLevel.ERROR, 'also kept', undefined);
	});

	it('should normalize context into JSON-friendly values', () => {
		const logger = new Logger('test', LogLevel.DEBUG);
		const contexts: Array<LogContext | undefined> = [];
		logger.addOutput((_level, _message, context) => contexts.push(context));

		const error = new Error('boom');
		logger.debug('scored', { words: 9, nested: { tags: ['p', 'li'] }, error, at: undefined });

		expect(contexts).toEqual([{ words: 9, nested: { tags: ['p', 'li'] }, error, at: undefined }]);
		expect(contexts[0]?.error).toBe(error);
	});

	it('should write to stderr with a prefix', () => {
		const logger = new Logger('stderr-test');
		logger.info('started');

		expect(console.error).toHaveBeenCalledWith(
			expect.stringMatching(/^\[.+\] \[INFO\] \[stderr-test\]$/),
			'started',
			''
		);
	});

	it('should name child loggers after their parent', () => {
		const child = new Logger('handlers', LogLevel.ERROR).child('readability');
		expect(child.getName()).toBe('handlers:readability');
		expect(child.getLevel()).toBe(LogLevel.ERROR);
	});

	it('should cache loggers by name', () => {
		expect(getLogger('cached')).toBe(getLogger('cached'));
	});

	it('should apply a global level to existing loggers', () => {
		const logger = getLogger('global-level');
		const previous = logger.getLevel();

		setGlobalLogLevel(LogLevel.ERROR);
		expect(logger.getLevel()).toBe(LogLevel.ERROR);
		expect(getLogger('created-after').getLevel()).toBe(LogLevel.ERROR);

		setGlobalLogLevel(previous);
	});

	it('should parse level names', () => {
		expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
		expect(parseLogLevel(' WARN ')).toBe(LogLevel.WARN);
		expect(parseLogLevel('verbose')).toBeUndefined();
		expect(parseLogLevel(undefined)).toBeUndefined();
	});
});
