/**
 * Centralized logging system
 *
 * Everything is written to stderr: stdout belongs to the MCP transport.
 */

import type { LogContext } from '../types/index.js';
import { toLogContext } from '../types/index.js';

export type { LogContext } from '../types/index.js';

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	FATAL = 4,
}

export type LogOutput = (level: LogLevel, message: string, context?: LogContext) => void;

const LEVELS_BY_NAME: Readonly<Record<string, LogLevel>> = {
	DEBUG: LogLevel.DEBUG,
	INFO: LogLevel.INFO,
	WARN: LogLevel.WARN,
	ERROR: LogLevel.ERROR,
	FATAL: LogLevel.FATAL,
};

/**
 * Parse a level name such as `warn` or `DEBUG`. Unknown names yield undefined.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
	if (!value) return undefined;
	return LEVELS_BY_NAME[value.trim().toUpperCase()];
}

const isDevelopment = (): boolean => process.env.NODE_ENV === 'development';

export class Logger {
	private level: LogLevel;
	private readonly name: string;
	private readonly outputs: LogOutput[] = [];

	constructor(name: string, level: LogLevel = LogLevel.INFO) {
		this.name = name;
		this.level = level;

		// Default console output
		this.addOutput((level, message, context) => {
			const timestamp = new Date().toISOString();
			const prefix = `[${timestamp}] [${LogLevel[level]}] [${this.name}]`;

			switch (level) {
				case LogLevel.DEBUG:
					if (isDevelopment()) {
						console.error(prefix, message, context || '');
					}
					break;
				case LogLevel.INFO:
					console.error(prefix, message, context || '');
					break;
				case LogLevel.WARN:
					console.warn(prefix, message, context || '');
					break;
				case LogLevel.ERROR:
				case LogLevel.FATAL:
					console.error(prefix, message, context || '');
					break;
			}
		});
	}

	getName(): string {
		return this.name;
	}

	getLevel(): LogLevel {
		return this.level;
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	addOutput(output: LogOutput): void {
		this.outputs.push(output);
	}

	private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
		if (level < this.level) return;

		const safeContext = context ? toLogContext(context) : undefined;
		for (const output of this.outputs) {
			output(level, message, safeContext);
		}
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.log(LogLevel.DEBUG, message, context);
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log(LogLevel.INFO, message, context);
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log(LogLevel.WARN, message, context);
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.log(LogLevel.ERROR, message, context);
	}

	fatal(message: string, context?: Record<string, unknown>): void {
		this.log(LogLevel.FATAL, message, context);
	}

	child(name: string): Logger {
		return new Logger(`${this.name}:${name}`, this.level);
	}
}

// Logger factory
class LoggerFactory {
	private loggers = new Map<string, Logger>();
	private defaultLevel = LogLevel.INFO;

	constructor() {
		const envLevel = parseLogLevel(process.env.LOG_LEVEL);
		if (envLevel !== undefined) {
			this.defaultLevel = envLevel;
		}
	}

	getLogger(name: string): Logger {
		let logger = this.loggers.get(name);
		if (!logger) {
			logger = new Logger(name, this.defaultLevel);
			this.loggers.set(name, logger);
		}
		return logger;
	}

	setGlobalLevel(level: LogLevel): void {
		this.defaultLevel = level;
		for (const logger of this.loggers.values()) {
			logger.setLevel(level);
		}
	}
}

// Global factory instance
const factory = new LoggerFactory();

export function getLogger(name: string): Logger {
	return factory.getLogger(name);
}

export function setGlobalLogLevel(level: LogLevel): void {
	factory.setGlobalLevel(level);
}

// Pre-configured loggers
export const Loggers = {
	main: getLogger('main'),
	handlers: getLogger('handlers'),
	readability: getLogger('readability'),
} as const;
