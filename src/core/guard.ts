import type {
	ExceptionHandler,
	ExceptionHandlerAdapter,
	HelperKitError,
} from "../types/common";
import { RuntimeFaultError, toException } from "../utils/error";
import { installErrorPolicy } from "./error-policy";

export interface ExecutionGuardOptions<H> {
	/**
	 * Current reporting mask. Read each time an error is reported, so a mask
	 * changed while the callable runs applies to later reports.
	 */
	reporting: () => number;
	/** Currently registered handler, if any. */
	handler: () => ExceptionHandler<H> | undefined;
	/** Used when no handler is registered. */
	defaultHandler: ExceptionHandlerAdapter<HelperKitError>;
}

/**
 * Runs a callable with runtime errors promoted to failures.
 *
 * While the callable runs, every `raise()` whose severity is in the current
 * reporting mask throws a `RuntimeFaultError`; the rest are dropped. Whatever
 * escapes the callable goes to exactly one handler call, and the handler's
 * return value becomes the result. The previously active error policy is
 * restored on every exit path, before the handler runs.
 */
export class ExecutionGuard<H = HelperKitError> {
	constructor(private readonly options: ExecutionGuardOptions<H>) {}

	run<A extends unknown[], R>(
		callable: (...args: A) => R,
		...args: A
	): R | H | HelperKitError {
		const restore = installErrorPolicy(({ severity, message, location }) => {
			if (this.options.reporting() & severity) {
				throw new RuntimeFaultError(severity, message, location);
			}
		});

		try {
			return callable(...args);
		} catch (thrown) {
			restore();
			return this.handle(toException(thrown));
		} finally {
			restore();
		}
	}

	private handle(failure: Error): H | HelperKitError {
		const handler = this.options.handler();
		if (handler) return handler(failure);
		return this.options.defaultHandler.handle(failure);
	}
}
