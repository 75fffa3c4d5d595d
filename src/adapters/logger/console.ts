/**
 * Console-based logger adapter.
 *
 * The default logger. Writes prefixed lines through the matching console
 * method and drops anything below the configured level.
 */
import { DEFAULT_LOG_LEVEL, LOG_PREFIX } from "../../core/constants";
import type { HelperKitLogger, LogLevel } from "../../types/common";

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
};

export class ConsoleLogger implements HelperKitLogger {
	constructor(private level: LogLevel = DEFAULT_LOG_LEVEL) {}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	debug(message: string, meta?: Record<string, unknown>): void {
		if (this.enabled("debug")) console.debug(...this.line(message, meta));
	}

	info(message: string, meta?: Record<string, unknown>): void {
		if (this.enabled("info")) console.info(...this.line(message, meta));
	}

	warn(message: string, meta?: Record<string, unknown>): void {
		if (this.enabled("warn")) console.warn(...this.line(message, meta));
	}

	error(message: string, meta?: Record<string, unknown>): void {
		if (this.enabled("error")) console.error(...this.line(message, meta));
	}

	private enabled(level: Exclude<LogLevel, "silent">): boolean {
		return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
	}

	private line(
		message: string,
		meta?: Record<string, unknown>,
	): [string] | [string, Record<string, unknown>] {
		return meta ? [`${LOG_PREFIX} ${message}`, meta] : [`${LOG_PREFIX} ${message}`];
	}
}
