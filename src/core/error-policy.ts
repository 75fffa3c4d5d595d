/**
 * Process-wide runtime error reporting.
 *
 * Code that hits a recoverable problem calls `raise()` instead of throwing.
 * What happens next depends on the active policy: outside a guarded
 * invocation the report goes to the report logger at `warn` and execution
 * continues; inside `run()` the guard's policy turns it into a
 * `RuntimeFaultError`.
 */
import { ConsoleLogger } from "../adapters/logger/console";
import {
	type HelperKitLogger,
	Severity,
	type SeverityLevel,
	type SourceLocation,
} from "../types/common";

/** A runtime error as handed to the active policy. */
export interface ErrorReport {
	severity: SeverityLevel;
	message: string;
	location: SourceLocation;
}

export type ErrorPolicy = (report: ErrorReport) => void;

const SEVERITY_NAMES: Record<SeverityLevel, string> = {
	[Severity.DEPRECATED]: "deprecated",
	[Severity.NOTICE]: "notice",
	[Severity.WARNING]: "warning",
	[Severity.ERROR]: "error",
};

let reportLogger: HelperKitLogger = new ConsoleLogger();

const reportAndContinue: ErrorPolicy = ({ severity, message, location }) => {
	reportLogger.warn(
		`${severityName(severity)}: ${message} in ${location.file}:${location.line}`,
	);
};

let active: ErrorPolicy = reportAndContinue;

/**
 * Route reports made outside `run()` to `logger`.
 *
 * Calling it with no logger goes back to a console logger at `warn`.
 *
 * @returns The logger that was in use before.
 */
export function setReportLogger(
	logger: HelperKitLogger = new ConsoleLogger(),
): HelperKitLogger {
	const previous = reportLogger;
	reportLogger = logger;
	return previous;
}

export function severityName(severity: SeverityLevel): string {
	return SEVERITY_NAMES[severity];
}

/**
 * Make `policy` the active policy.
 *
 * Returns a function that puts back the policy that was active before. It is
 * safe to call more than once; only the first call has an effect. Restores
 * must happen in reverse order of installs for nesting to hold.
 */
export function installErrorPolicy(policy: ErrorPolicy): () => void {
	const previous = active;
	active = policy;
	let restored = false;
	return () => {
		if (restored) return;
		restored = true;
		active = previous;
	};
}

/**
 * Report a recoverable runtime error to the active policy.
 *
 * @param location - Where the error happened; defaults to the caller's frame.
 */
export function raise(
	severity: SeverityLevel,
	message: string,
	location?: SourceLocation,
): void {
	active({ severity, message, location: location ?? callerLocation() });
}

const FRAME_LOCATION = /\(?([^()\s]+):(\d+):\d+\)?$/;

function callerLocation(): SourceLocation {
	const holder: { stack?: string } = {};
	Error.captureStackTrace(holder, raise);
	const frame = holder.stack?.split("\n")[1]?.trim() ?? "";
	const match = FRAME_LOCATION.exec(frame);
	if (!match) return { file: "unknown", line: 0 };
	return { file: match[1], line: Number(match[2]) };
}
