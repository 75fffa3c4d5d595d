import { describe, expect, it } from "vitest";
import {
	builtinProviders,
	getDefaultHelperKit,
	helperkit,
	NATIVE_METHODS,
	Severity,
	toSeconds,
} from "../../src";

describe("package entry", () => {
	it("exposes the facade, providers and utilities", () => {
		expect(NATIVE_METHODS).toContain("run");
		expect(builtinProviders.map((p) => p.name)).toEqual([
			"datetime",
			"array",
			"string",
			"inflector",
		]);
		expect(Severity.ALL).toBe(15);
		expect(toSeconds("5min")).toBe(300);
		expect(typeof getDefaultHelperKit).toBe("function");
	});

	it("types helpers from the providers it was given", () => {
		const kit = helperkit({}, { providers: builtinProviders });
		expect(kit.pluralize("box")).toBe("boxes");
		expect(kit.camelCase("hello world")).toBe("helloWorld");
	});
});
