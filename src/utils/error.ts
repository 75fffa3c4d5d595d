/** Error types and normalization utilities. */
import {
	ErrorCodes,
	type HelperKitError,
	type SeverityLevel,
	type SourceLocation,
} from "../types/common";

/**
 * Base class for every error HelperKit throws.
 *
 * Carries the same `code`/`meta` fields as `HelperKitError`, so a caught
 * exception can be passed straight to `toError`.
 */
export class HelperKitException extends Error {
	readonly code: string;
	readonly meta?: Record<string, unknown>;

	constructor(
		code: string,
		message: string,
		options: { cause?: unknown; meta?: Record<string, unknown> } = {},
	) {
		super(message, { cause: options.cause });
		this.name = new.target.name;
		this.code = code;
		this.meta = options.meta;
	}
}

/** A value could not be resolved to a point in time. */
export class InvalidTimeRepresentationError extends HelperKitException {
	readonly input: unknown;

	constructor(input: unknown) {
		super(
			ErrorCodes.INVALID_TIME_REPRESENTATION,
			`Unable to convert ${describe(input)} to a valid timestamp`,
			{ meta: { input } },
		);
		this.input = input;
	}
}

/** A helper tried to take the name of a native facade operation. */
export class ReservedNameCollisionError extends HelperKitException {
	constructor(method: string, provider: string) {
		super(
			ErrorCodes.RESERVED_NAME_COLLISION,
			`Helper methods cannot override native methods - '${method}' is reserved`,
			{ meta: { method, provider } },
		);
	}
}

/** Two providers registered a helper under the same name. */
export class DuplicateHelperCollisionError extends HelperKitException {
	constructor(method: string, existing: string, duplicate: string) {
		super(
			ErrorCodes.DUPLICATE_HELPER_COLLISION,
			`Helper method '${method}' already defined in provider '${existing}', duplicate in '${duplicate}'`,
			{ meta: { method, existing, duplicate } },
		);
	}
}

/** A call named no native operation and no registered helper. */
export class UnknownHelperMethodError extends HelperKitException {
	constructor(method: string) {
		super(
			ErrorCodes.UNKNOWN_HELPER_METHOD,
			`Unknown helper method '${method}'`,
			{ meta: { method } },
		);
	}
}

/** A runtime error reported through `raise()` and promoted to a failure. */
export class RuntimeFaultError extends HelperKitException {
	readonly severity: SeverityLevel;
	readonly file: string;
	readonly line: number;

	constructor(
		severity: SeverityLevel,
		message: string,
		location: SourceLocation,
	) {
		super(ErrorCodes.RUNTIME_FAULT, message, {
			meta: { severity, file: location.file, line: location.line },
		});
		this.severity = severity;
		this.file = location.file;
		this.line = location.line;
	}
}

/**
 * Make sure a thrown value is an `Error`.
 *
 * Non-error throws are wrapped in a `HelperKitException` with code `UNKNOWN`
 * and the original value as `cause`.
 */
export function toException(thrown: unknown): Error {
	if (thrown instanceof Error) return thrown;
	return new HelperKitException(ErrorCodes.UNKNOWN, String(thrown), {
		cause: thrown,
	});
}

/**
 * Normalize an unknown thrown value into a `HelperKitError` suitable for
 * returning from HelperKit APIs.
 *
 * @param err - The unknown thrown value to normalize.
 * @param fallbackCode - Error code to use when the thrown value does not
 * have a string `code` property.
 * @param meta - Optional metadata to merge into the resulting error's `meta`.
 * @returns A well-formed `HelperKitError` with preserved details when possible.
 */
export function toError(
	err: unknown,
	fallbackCode: string,
	meta?: Record<string, unknown>,
): HelperKitError {
	const message = err instanceof Error ? err.message : String(err);
	if (err && typeof err === "object") {
		const code =
			"code" in err && typeof err.code === "string" ? err.code : fallbackCode;
		if ("message" in err && typeof err.message === "string") {
			return { code, message: err.message, cause: err, meta };
		}
		return { code, message, cause: err, meta };
	}
	return { code: fallbackCode, message, cause: err, meta };
}

function describe(input: unknown): string {
	if (typeof input === "string") return `'${input}'`;
	if (input instanceof Date) return "Invalid Date";
	return String(input);
}
