/*
 * Configuration loading and validation.
 *
 * Scalar options go through `HelperKitOptionsSchema`; adapters and handlers
 * are passed through as given.
 */
import { z } from "zod";
import { ErrorCodes, Severity } from "../types/common";
import type { HelperKitConfig, LogLevel } from "../types/common";
import { HelperKitException } from "../utils/error";
import { DEFAULT_LOG_LEVEL } from "./constants";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const HelperKitOptionsSchema = z.object({
	debug: z.boolean().default(false),
	errorReporting: z
		.number()
		.int("errorReporting must be an integer")
		.min(0)
		.max(Severity.ALL)
		.default(Severity.ALL),
	logLevel: LogLevelSchema.default(DEFAULT_LOG_LEVEL),
});

export type HelperKitOptions = z.infer<typeof HelperKitOptionsSchema>;

/** Render zod issues as `path: message` lines. */
export function formatConfigErrors(error: z.ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.join(".");
		return path ? `${path}: ${issue.message}` : issue.message;
	});
}

/**
 * Validate the scalar options of a config and apply defaults.
 *
 * @throws HelperKitException (`INVALID_CONFIG`) listing every issue.
 */
export function resolveOptions<H>(config: HelperKitConfig<H>): HelperKitOptions {
	const result = HelperKitOptionsSchema.safeParse({
		debug: config.debug,
		errorReporting: config.errorReporting,
		logLevel: config.logLevel,
	});
	if (!result.success) {
		const issues = formatConfigErrors(result.error);
		throw new HelperKitException(
			ErrorCodes.INVALID_CONFIG,
			`Invalid HelperKit configuration: ${issues.join("; ")}`,
			{ meta: { issues } },
		);
	}
	return result.data;
}

function envBool(value: string | undefined): boolean | undefined {
	if (value === undefined) return undefined;
	const normalized = value.trim().toLowerCase();
	return normalized === "true" || normalized === "1" || normalized === "yes";
}

function envInt(value: string | undefined): number | undefined {
	if (value === undefined || value.trim() === "") return undefined;
	return Number(value);
}

/**
 * Read options from environment variables.
 *
 * - `HELPERKIT_DEBUG`: "true", "1" or "yes" enable debug mode
 * - `HELPERKIT_ERROR_REPORTING`: reporting mask (0-15)
 * - `HELPERKIT_LOG_LEVEL`: one of debug, info, warn, error, silent
 *
 * Unset variables are left out so that defaults apply.
 *
 * @throws HelperKitException (`INVALID_CONFIG`) when a value is out of range.
 */
export function loadConfigFromEnv(
	env: Record<string, string | undefined> = process.env,
): HelperKitConfig {
	const config: HelperKitConfig = {};
	const debug = envBool(env.HELPERKIT_DEBUG);
	if (debug !== undefined) config.debug = debug;

	const errorReporting = envInt(env.HELPERKIT_ERROR_REPORTING);
	if (errorReporting !== undefined) config.errorReporting = errorReporting;

	const logLevel = env.HELPERKIT_LOG_LEVEL?.trim().toLowerCase();
	if (logLevel) {
		const parsed = LogLevelSchema.safeParse(logLevel);
		if (!parsed.success) {
			throw new HelperKitException(
				ErrorCodes.INVALID_CONFIG,
				`Invalid HELPERKIT_LOG_LEVEL: "${logLevel}"`,
				{ meta: { issues: formatConfigErrors(parsed.error) } },
			);
		}
		config.logLevel = parsed.data satisfies LogLevel;
	}

	resolveOptions(config);
	return config;
}
