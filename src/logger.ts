/**
 * @file Logger utility for the ORM with configurable log levels.
 */

/**
 * Available log levels in order of priority (from lowest to highest).
 */
export enum LogLevel {
	/** Log all messages (debug, info, warn, error) */
	ALL = 0,
	/** Log debug, info, warn and error messages */
	DEBUG = 10,
	/** Log info, warn and error messages */
	INFO = 20,
	/** Log warn and error messages only */
	WARN = 30,
	/** Log error messages only */
	ERROR = 40,
	/** Disable all logging */
	OFF = 50
}

/**
 * Log entry structure.
 */
export interface LogEntry {
	timestamp: Date;
	level: LogLevel;
	message: string;
	context?: string;
	data?: unknown;
}

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
	/** The minimum log level to output (default: INFO) */
	level?: LogLevel;
	/** Whether to output logs to console (default: true) */
	console?: boolean;
	/** Custom log formatter function */
	formatter?: (entry: LogEntry) => string;
	/** Custom log handler function */
	handler?: (entry: LogEntry) => void;
}

/**
 * A logger bound to a fixed context, as returned by `getLogger`.
 */
export interface ContextLogger {
	debug: (message: string, data?: unknown) => void;
	info: (message: string, data?: unknown) => void;
	warn: (message: string, data?: unknown) => void;
	error: (message: string, data?: unknown) => void;
}

// Bound args routinely carry bigint ids, which JSON.stringify rejects.
const jsonReplacer = (_key: string, value: unknown): unknown =>
	typeof value === 'bigint' ? value.toString() : value;

/**
 * Default log formatter that creates human-readable log output.
 */
const defaultFormatter = (entry: LogEntry): string => {
	const timestamp = entry.timestamp.toISOString();
	const level = LogLevel[entry.level].padEnd(5);
	const context = entry.context ? `[${entry.context}] ` : '';
	const data = entry.data !== undefined ? ` ${JSON.stringify(entry.data, jsonReplacer)}` : '';
	return `${timestamp} ${level} ${context}${entry.message}${data}`;
};

/**
 * Logger class with configurable log levels and output options.
 */
export class Logger {
	private config: Required<LoggerConfig>;

	constructor(config: LoggerConfig = {}) {
		this.config = {
			level: config.level ?? LogLevel.INFO,
			console: config.console ?? true,
			formatter: config.formatter ?? defaultFormatter,
			handler: config.handler ?? this.defaultHandler.bind(this)
		};
	}

	/**
	 * Updates the logger configuration.
	 */
	configure(config: Partial<LoggerConfig>): void {
		this.config = {
			...this.config,
			...config,
			formatter: config.formatter ?? this.config.formatter,
			handler: config.handler ?? this.config.handler
		};
	}

	/**
	 * Gets the current log level.
	 */
	getLevel(): LogLevel {
		return this.config.level;
	}

	/**
	 * Sets the log level.
	 */
	setLevel(level: LogLevel): void {
		this.config.level = level;
	}

	private shouldLog(level: LogLevel): boolean {
		return this.config.level !== LogLevel.OFF && level >= this.config.level;
	}

	/**
	 * Default log handler that outputs to console.
	 */
	private defaultHandler(entry: LogEntry): void {
		if (!this.config.console) return;

		const formatted = this.config.formatter(entry);

		switch (entry.level) {
			case LogLevel.ERROR:
				console.error(formatted);
				break;
			case LogLevel.WARN:
				console.warn(formatted);
				break;
			case LogLevel.DEBUG:
				console.debug(formatted);
				break;
			default:
				console.log(formatted);
				break;
		}
	}

	private log(level: LogLevel, message: string, context?: string, data?: unknown): void {
		if (!this.shouldLog(level)) return;

		const entry: LogEntry = {
			timestamp: new Date(),
			level,
			message,
			context,
			data
		};

		this.config.handler(entry);
	}

	debug(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.DEBUG, message, context, data);
	}

	info(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.INFO, message, context, data);
	}

	warn(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.WARN, message, context, data);
	}

	error(message: string, context?: string, data?: unknown): void {
		this.log(LogLevel.ERROR, message, context, data);
	}
}

/**
 * Global logger instance shared by every module of the ORM.
 */
export const globalLogger = new Logger();

/**
 * Returns a logger that writes through `globalLogger` under the given context.
 */
export function getLogger(context?: string): ContextLogger {
	return {
		debug: (message: string, data?: unknown) => globalLogger.debug(message, context, data),
		info: (message: string, data?: unknown) => globalLogger.info(message, context, data),
		warn: (message: string, data?: unknown) => globalLogger.warn(message, context, data),
		error: (message: string, data?: unknown) => globalLogger.error(message, context, data)
	};
}

/**
 * One statement execution as written by the query log.
 */
export interface QueryLogEntry {
	sql: string;
	args: readonly unknown[];
	/** Wall-clock time of the execution */
	elapsedMs: number;
	/** Set when the execution failed */
	error?: Error;
}

/**
 * Writes a statement execution at INFO, with the duration rounded to the
 * microsecond.
 */
export function logQuery(logger: ContextLogger, entry: QueryLogEntry): void {
	const data = {
		sql: entry.sql,
		args: entry.args,
		durationMs: Math.round(entry.elapsedMs * 1000) / 1000
	};

	if (entry.error) {
		logger.info('Query failed', { ...data, error: entry.error.message });
	} else {
		logger.info('Query executed', data);
	}
}
