/**
 * Logger utilities for iterlane - caller-visible diagnostics
 *
 * Internal tracing goes through `debug` namespaces; this module is for
 * messages the caller asked to see (unsorted merge input, auto-drained
 * groups and so on).
 */

import type { Logger, LogLevel } from "./types.js";

const LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/**
 * Console logger with an engine prefix and a minimum level.
 */
export class ConsoleLogger implements Logger {
	private readonly prefix: string;
	private readonly threshold: number;

	constructor(name: string, level: LogLevel = "info") {
		this.prefix = `[${name}]`;
		this.threshold = LEVELS[level];
	}

	/**
	 * Whether messages at `level` reach the console.
	 */
	isEnabled(level: LogLevel): boolean {
		return LEVELS[level] >= this.threshold;
	}

	debug(message: string, ...args: unknown[]): void {
		this.write("debug", message, args);
	}

	info(message: string, ...args: unknown[]): void {
		this.write("info", message, args);
	}

	warn(message: string, ...args: unknown[]): void {
		this.write("warn", message, args);
	}

	error(message: string, ...args: unknown[]): void {
		this.write("error", message, args);
	}

	private write(level: LogLevel, message: string, args: unknown[]): void {
		if (!this.isEnabled(level)) return;
		console[level](`${this.prefix} ${message}`, ...args);
	}
}

/**
 * No-op logger for when logging is disabled.
 */
export class NoOpLogger implements Logger {
	debug(): void {}
	info(): void {}
	warn(): void {}
	error(): void {}
}

/**
 * Pick the logger an engine should use.
 *
 * An explicit logger wins; a bare level gets a ConsoleLogger; neither
 * means silence.
 */
export function createLogger(
	name: string,
	logger?: Logger,
	level?: LogLevel,
): Logger {
	if (logger) return logger;
	if (level) return new ConsoleLogger(name, level);
	return new NoOpLogger();
}
