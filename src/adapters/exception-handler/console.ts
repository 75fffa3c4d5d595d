/**
 * Default exception handler.
 *
 * Used by `run()` when no handler has been registered: logs the failure and
 * returns it as a `HelperKitError` record instead of rethrowing.
 */
import type {
	ExceptionHandlerAdapter,
	HelperKitError,
	HelperKitLogger,
} from "../../types/common";
import { ErrorCodes } from "../../types/common";
import { toError } from "../../utils/error";
import { ConsoleLogger } from "../logger/console";

export class ConsoleExceptionHandler
	implements ExceptionHandlerAdapter<HelperKitError>
{
	constructor(private readonly logger: HelperKitLogger = new ConsoleLogger()) {}

	handle(failure: Error): HelperKitError {
		const normalized = toError(failure, ErrorCodes.UNKNOWN, { op: "run" });
		this.logger.error(`Unhandled ${failure.name}: ${failure.message}`, {
			code: normalized.code,
		});
		return normalized;
	}
}
