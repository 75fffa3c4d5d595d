/**
 * Core constants for the HelperKit implementation
 */

// Operations implemented by the facade itself; helpers can never shadow these.
export const NATIVE_METHODS = [
	"isCLI",
	"isDebug",
	"setDebug",
	"getErrorReporting",
	"setErrorReporting",
	"dump",
	"setExceptionHandler",
	"getExceptionHandler",
	"init",
	"run",
	"registerProviders",
	"registerProvider",
	"addHelperMethod",
	"resolveHelper",
	"listHelpers",
	"call",
] as const;

export type NativeMethod = (typeof NATIVE_METHODS)[number];

// Console output prefix
export const LOG_PREFIX = "[helperkit]";

export const DEFAULT_LOG_LEVEL = "warn";
