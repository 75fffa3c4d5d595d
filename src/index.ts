export { InspectDumper } from "./adapters/dumper/inspect";
export { ConsoleExceptionHandler } from "./adapters/exception-handler/console";
export { ConsoleLogger } from "./adapters/logger/console";
export { NoopLogger } from "./adapters/logger/noop";
export {
	formatConfigErrors,
	type HelperKitOptions,
	HelperKitOptionsSchema,
	loadConfigFromEnv,
	resolveOptions,
} from "./core/config";
export { NATIVE_METHODS, type NativeMethod } from "./core/constants";
export { defineProvider } from "./core/core-helpers";
export { type DefaultHelperKit, getDefaultHelperKit } from "./core/default-kit";
export {
	type ErrorPolicy,
	type ErrorReport,
	installErrorPolicy,
	raise,
	setReportLogger,
	severityName,
} from "./core/error-policy";
export { ExecutionGuard, type ExecutionGuardOptions } from "./core/guard";
export { HelperKit, helperkit } from "./core/helperkit";
export { HelperRegistry } from "./core/registry";
export {
	arrayHelpers,
	builtinProviders,
	datetimeHelpers,
	inflector,
	stringHelpers,
} from "./providers";
export * from "./types/common";
export type * from "./types/providers";
export {
	DuplicateHelperCollisionError,
	HelperKitException,
	InvalidTimeRepresentationError,
	ReservedNameCollisionError,
	RuntimeFaultError,
	toError,
	toException,
	UnknownHelperMethodError,
} from "./utils/error";
export { now, toSeconds, toTimestamp } from "./utils/time";
