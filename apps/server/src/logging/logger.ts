/**
 * Console logger shared by every server component.
 * Each line is tagged with the component scope (`[signaling]`, `[pipeline]`, ...)
 * and carries an optional context record with the ids involved.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type LogContext = {
	clientId?: string;
	roomId?: string;
	frameId?: string;
	[key: string]: unknown;
};

export type Logger = {
	error(message: string, error?: unknown, context?: LogContext): void;
	warn(message: string, context?: LogContext): void;
	info(message: string, context?: LogContext): void;
	debug(message: string, context?: LogContext): void;
};

const LEVEL_ORDER: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
	currentLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LEVEL_ORDER, value);
}

function enabled(level: LogLevel): boolean {
	return LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel];
}

/**
 * Error objects don't serialize their own properties when logged,
 * so pull the useful ones into a plain object.
 */
export function serializeError(error: unknown): unknown {
	if (error instanceof Error) {
		const serialized: Record<string, unknown> = {
			name: error.name,
			message: error.message,
		};
		if (error.stack) {
			serialized.stack = error.stack;
		}
		if (error.cause !== undefined) {
			serialized.cause = serializeError(error.cause);
		}
		return serialized;
	}
	return error;
}

function format(scope: string, message: string, context?: LogContext): string {
	const line = `${new Date().toISOString()} [${scope}] ${message}`;
	if (!context || Object.keys(context).length === 0) return line;
	return `${line} ${JSON.stringify(context)}`;
}

export function createLogger(scope: string): Logger {
	return {
		error(message, error, context) {
			if (!enabled('error')) return;
			if (error === undefined) {
				console.error(format(scope, message, context));
			} else {
				console.error(format(scope, message, context), serializeError(error));
			}
		},
		warn(message, context) {
			if (enabled('warn')) console.warn(format(scope, message, context));
		},
		info(message, context) {
			if (enabled('info')) console.info(format(scope, message, context));
		},
		debug(message, context) {
			if (enabled('debug')) console.debug(format(scope, message, context));
		},
	};
}
