/**
 * Minimal structured logging for the scheduling engine.
 *
 * The engine never writes anywhere on its own: callers pass a Logger
 * (their own, or one from createConsoleLogger) and the default is silent.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
	debug(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	error(message: string, context?: LogContext): void;
}

export interface ConsoleLoggerOptions {
	/** Minimum level to emit; defaults to "info" */
	level?: LogLevel;
	/** Prepended to every line as `[prefix]` */
	prefix?: string;
	/** Receives formatted lines; defaults to the matching console method */
	sink?: (level: LogLevel, line: string) => void;
}

// Log level weights for filtering
const LEVEL_WEIGHTS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

function formatValue(value: unknown): string {
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (value instanceof Error) {
		return JSON.stringify(value.message);
	}
	if (typeof value === 'string') {
		return /\s/.test(value) ? JSON.stringify(value) : value;
	}
	return JSON.stringify(value) ?? String(value);
}

/**
 * Formats a message and its context as `message key=value key=value`.
 */
export function formatLogLine(message: string, context?: LogContext, prefix?: string): string {
	const parts: string[] = [];
	if (prefix) {
		parts.push(`[${prefix}]`);
	}
	parts.push(message);
	if (context) {
		for (const [key, value] of Object.entries(context)) {
			parts.push(`${key}=${formatValue(value)}`);
		}
	}
	return parts.join(' ');
}

function writeToConsole(level: LogLevel, line: string): void {
	switch (level) {
		case 'debug':
			console.debug(line);
			break;
		case 'info':
			console.info(line);
			break;
		case 'warn':
			console.warn(line);
			break;
		case 'error':
			console.error(line);
			break;
	}
}

/**
 * Creates a level-filtered logger that writes one line per call.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ level: 'debug', prefix: 'scheduler' });
 * logger.warn('calendar lookup failed', { participant: 'jane@company.com' });
 * // [scheduler] calendar lookup failed participant=jane@company.com
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
	const threshold = LEVEL_WEIGHTS[options.level ?? 'info'];
	const sink = options.sink ?? writeToConsole;

	const write = (level: LogLevel, message: string, context?: LogContext): void => {
		if (LEVEL_WEIGHTS[level] < threshold) return;
		sink(level, formatLogLine(message, context, options.prefix));
	};

	return {
		debug: (message, context) => write('debug', message, context),
		info: (message, context) => write('info', message, context),
		warn: (message, context) => write('warn', message, context),
		error: (message, context) => write('error', message, context),
	};
}

const noop = (): void => {};

/**
 * A logger that discards everything. Used when no logger is supplied.
 */
export const silentLogger: Logger = {
	debug: noop,
	info: noop,
	warn: noop,
	error: noop,
};
