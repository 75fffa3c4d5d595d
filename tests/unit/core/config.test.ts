import { describe, expect, it } from "vitest";
import { loadConfigFromEnv, resolveOptions } from "../../../src/core/config";
import { ErrorCodes, type HelperKitConfig } from "../../../src/types/common";
import { HelperKitException } from "../../../src/utils/error";

describe("resolveOptions", () => {
	it("fills in defaults", () => {
		expect(resolveOptions({})).toEqual({
			debug: false,
			errorReporting: 15,
			logLevel: "warn",
		});
	});

	it("keeps valid values", () => {
		expect(
			resolveOptions({ debug: true, errorReporting: 0, logLevel: "silent" }),
		).toEqual({ debug: true, errorReporting: 0, logLevel: "silent" });
	});

	it("lists every issue in one INVALID_CONFIG error", () => {
		const config: HelperKitConfig = JSON.parse(
			'{"debug":"yes","errorReporting":-1}',
		);

		try {
			resolveOptions(config);
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(HelperKitException);
			if (err instanceof HelperKitException) {
				expect(err.code).toBe(ErrorCodes.INVALID_CONFIG);
				const issues = err.meta?.issues;
				expect(Array.isArray(issues) && issues.length).toBe(2);
				expect(err.message).toMatch(
					/^Invalid HelperKit configuration: debug: .+; errorReporting: .+$/,
				);
			}
		}
	});
});

describe("loadConfigFromEnv", () => {
	it("returns an empty config when nothing is set", () => {
		expect(loadConfigFromEnv({})).toEqual({});
	});

	it("reads and normalizes every variable", () => {
		expect(
			loadConfigFromEnv({
				HELPERKIT_DEBUG: "YES",
				HELPERKIT_ERROR_REPORTING: "12",
				HELPERKIT_LOG_LEVEL: " Debug ",
			}),
		).toEqual({ debug: true, errorReporting: 12, logLevel: "debug" });
	});

	it("treats other debug values as false", () => {
		expect(loadConfigFromEnv({ HELPERKIT_DEBUG: "0" })).toEqual({
			debug: false,
		});
		expect(loadConfigFromEnv({ HELPERKIT_DEBUG: "off" })).toEqual({
			debug: false,
		});
	});

	it("ignores a blank reporting mask", () => {
		expect(loadConfigFromEnv({ HELPERKIT_ERROR_REPORTING: " " })).toEqual({});
	});

	it("rejects unreadable values", () => {
		expect(() =>
			loadConfigFromEnv({ HELPERKIT_ERROR_REPORTING: "lots" }),
		).toThrow(expect.objectContaining({ code: ErrorCodes.INVALID_CONFIG }));
		expect(() =>
			loadConfigFromEnv({ HELPERKIT_ERROR_REPORTING: "32" }),
		).toThrow(HelperKitException);
		expect(() => loadConfigFromEnv({ HELPERKIT_LOG_LEVEL: "Loud" })).toThrowError(
			'Invalid HELPERKIT_LOG_LEVEL: "loud"',
		);
	});
});
