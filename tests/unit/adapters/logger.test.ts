import { afterEach, describe, expect, it, vi } from "vitest";
import { ConsoleLogger } from "../../../src/adapters/logger/console";
import { NoopLogger } from "../../../src/adapters/logger/noop";

function silenceConsole() {
	return {
		debug: vi.spyOn(console, "debug").mockImplementation(() => {}),
		info: vi.spyOn(console, "info").mockImplementation(() => {}),
		warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
		error: vi.spyOn(console, "error").mockImplementation(() => {}),
	};
}

afterEach(() => {
	vi.restoreAllMocks();
});

describe("ConsoleLogger", () => {
	it("drops messages below warn by default", () => {
		const out = silenceConsole();
		const logger = new ConsoleLogger();

		logger.debug("d");
		logger.info("i");
		logger.warn("w");
		logger.error("e", { code: "X" });

		expect(out.debug).not.toHaveBeenCalled();
		expect(out.info).not.toHaveBeenCalled();
		expect(out.warn).toHaveBeenCalledWith("[helperkit] w");
		expect(out.error).toHaveBeenCalledWith("[helperkit] e", { code: "X" });
	});

	it("writes everything at debug level", () => {
		const out = silenceConsole();
		const logger = new ConsoleLogger("debug");

		logger.debug("registered helper array.sum");
		logger.info("ready", { helpers: 18 });

		expect(out.debug).toHaveBeenCalledWith(
			"[helperkit] registered helper array.sum",
		);
		expect(out.info).toHaveBeenCalledWith("[helperkit] ready", {
			helpers: 18,
		});
	});

	it("can be silenced at runtime", () => {
		const out = silenceConsole();
		const logger = new ConsoleLogger("info");

		logger.setLevel("silent");
		logger.error("nobody hears this");

		expect(out.error).not.toHaveBeenCalled();
	});
});

describe("NoopLogger", () => {
	it("writes nothing", () => {
		const out = silenceConsole();
		const logger = new NoopLogger();

		logger.debug("d");
		logger.info("i");
		logger.warn("w");
		logger.error("e");

		for (const spy of Object.values(out)) expect(spy).not.toHaveBeenCalled();
	});
});
