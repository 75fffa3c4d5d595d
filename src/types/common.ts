/*
 * Shared types and interfaces for HelperKit.
 *
 * This file contains the common building blocks used throughout the library:
 * - Time measurements and canonical timestamps
 * - The error record and error codes
 * - Interfaces for the logger, dumper and exception handler adapters
 * - Configuration options for customizing behavior
 */

/** A whole number of seconds (durations). */
export type Seconds = number;

/** Signed integer seconds since the Unix epoch. */
export type UnixTimestamp = number;

/** Any value `toTimestamp` understands. */
export type TimeInput = number | string | Date;

/**
 * Standard error record used throughout the library.
 *
 * Thrown exceptions carry the same fields; `toError` turns any thrown value
 * into one of these so that it can be returned instead of thrown.
 */
export interface HelperKitError {
	/** Short error code (like "UNKNOWN_HELPER_METHOD" or "RUNTIME_FAULT"). */
	code: string;
	/** Human-readable description of what went wrong. */
	message: string;
	/** The original error that caused this one (if any). */
	cause?: unknown;
	/** Extra information about the error. */
	meta?: Record<string, unknown>;
}

/** Error codes used by the core library. */
export const ErrorCodes = {
	UNKNOWN: "UNKNOWN",
	INVALID_TIME_REPRESENTATION: "INVALID_TIME_REPRESENTATION",
	RESERVED_NAME_COLLISION: "RESERVED_NAME_COLLISION",
	DUPLICATE_HELPER_COLLISION: "DUPLICATE_HELPER_COLLISION",
	UNKNOWN_HELPER_METHOD: "UNKNOWN_HELPER_METHOD",
	INVALID_PROVIDER: "INVALID_PROVIDER",
	INVALID_CONFIG: "INVALID_CONFIG",
	RUNTIME_FAULT: "RUNTIME_FAULT",
} as const;

/** All possible error codes from the core library. */
export type HelperKitErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Severity of a reported runtime error.
 *
 * Values are bit flags so that a reporting mask can select any combination.
 */
export const Severity = {
	DEPRECATED: 1,
	NOTICE: 2,
	WARNING: 4,
	ERROR: 8,
	ALL: 15,
} as const;

export type SeverityLevel = Exclude<
	(typeof Severity)[keyof typeof Severity],
	typeof Severity.ALL
>;

/** Where a runtime error was reported from. */
export interface SourceLocation {
	file: string;
	line: number;
}

/** Log levels understood by the logger adapters, in increasing order. */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/** Interface for writing diagnostic messages. */
export interface HelperKitLogger {
	debug(message: string, meta?: Record<string, unknown>): void;
	info(message: string, meta?: Record<string, unknown>): void;
	warn(message: string, meta?: Record<string, unknown>): void;
	error(message: string, meta?: Record<string, unknown>): void;
}

/** Interface for rendering a value for `dump()` in debug mode. */
export interface DumperAdapter {
	dump(value: unknown): string;
}

/**
 * Receives the failure that escaped a guarded invocation.
 *
 * Whatever it returns becomes the result of `run()`.
 */
export type ExceptionHandler<R = unknown> = (failure: Error) => R;

/** Object form of an exception handler (the default handler is one). */
export interface ExceptionHandlerAdapter<R = unknown> {
	handle(failure: Error): R;
}

/**
 * Main configuration options for setting up HelperKit.
 *
 * Everything is optional; the library works with console logging, an
 * `util.inspect` dumper and a console exception handler by default.
 */
export interface HelperKitConfig<H = HelperKitError> {
	/** Enables `dump()` output (default: false). */
	debug?: boolean;
	/** Bit mask of `Severity` flags promoted to failures inside `run()` (default: `Severity.ALL`). */
	errorReporting?: number;
	/** Minimum level written by the default console logger (default: "warn"). */
	logLevel?: LogLevel;
	/** Handler receiving failures from `run()`; the default handler is used when omitted. */
	exceptionHandler?: ExceptionHandler<H>;
	/** Replace the built-in collaborators. */
	adapters?: {
		logger?: HelperKitLogger;
		dumper?: DumperAdapter;
		defaultHandler?: ExceptionHandlerAdapter<HelperKitError>;
	};
}
