import { afterEach, describe, expect, it, vi } from "vitest";
import { ErrorCodes } from "../../../src/types/common";
import { InvalidTimeRepresentationError } from "../../../src/utils/error";
import { now, toSeconds, toTimestamp } from "../../../src/utils/time";

describe("toSeconds", () => {
	it("parses spelled-out units", () => {
		expect(toSeconds("3 hours 4 minutes 10 seconds")).toBe(11050);
		expect(toSeconds("5min")).toBe(300);
		expect(toSeconds("90 secs")).toBe(90);
		expect(toSeconds("1h 30m")).toBe(5400);
	});

	it("parses decimals and truncates only the total", () => {
		expect(toSeconds("4.5h")).toBe(16200);
		expect(toSeconds("1.5 minutes")).toBe(90);
		expect(toSeconds("1.5s")).toBe(1);
		expect(toSeconds("5.m")).toBe(300);
		expect(toSeconds(".5m")).toBe(30);
	});

	it("parses clock forms", () => {
		expect(toSeconds("12:30:00")).toBe(45000);
		expect(toSeconds("30:15")).toBe(1815);
		expect(toSeconds("0:05")).toBe(5);
	});

	it("turns punctuation into separators", () => {
		expect(toSeconds("3 hours, 4 minutes")).toBe(11040);
		expect(toSeconds("2h; 10s")).toBe(7210);
	});

	it("keeps the first non-zero value of a repeated unit", () => {
		expect(toSeconds("2h 2h")).toBe(7200);
		expect(toSeconds("5m 3m 10s")).toBe(310);
		expect(toSeconds("0h 2h")).toBe(7200);
	});

	it("returns 0 when any chunk is unreadable", () => {
		expect(toSeconds("garbage")).toBe(0);
		expect(toSeconds("5 bananas")).toBe(0);
		expect(toSeconds("2h bananas")).toBe(0);
		expect(toSeconds("10")).toBe(0);
		expect(toSeconds("")).toBe(0);
		expect(toSeconds("1h30m")).toBe(0);
		expect(toSeconds("1.2.3h")).toBe(0);
		expect(toSeconds("4:5:6:7")).toBe(0);
	});

	it("only knows lower-case hour, minute and second spellings", () => {
		expect(toSeconds("2 Hours")).toBe(0);
		expect(toSeconds("2 hrs")).toBe(0);
		expect(toSeconds("2mi")).toBe(0);
		expect(toSeconds("1 day")).toBe(0);
	});

	it("returns 0 when a scale is too long to represent", () => {
		expect(toSeconds(`${"9".repeat(400)}h`)).toBe(0);
		expect(toSeconds(`${"9".repeat(400)}:30`)).toBe(0);
		expect(toSeconds(`1h ${"9".repeat(400)}s`)).toBe(0);
	});

	it("does not trim, so a leading or trailing separator fails the parse", () => {
		expect(toSeconds(" 5min")).toBe(0);
		expect(toSeconds("5 min!")).toBe(0);
	});
});

describe("toTimestamp", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("truncates numbers toward zero", () => {
		expect(toTimestamp(1700000000)).toBe(1700000000);
		expect(toTimestamp(1700000000.9)).toBe(1700000000);
		expect(toTimestamp(-1.5)).toBe(-1);
	});

	it("never returns negative zero", () => {
		expect(Object.is(toTimestamp(-0.5), 0)).toBe(true);
		expect(Object.is(toTimestamp(-0), 0)).toBe(true);
		expect(Object.is(toTimestamp("-0.9"), 0)).toBe(true);
	});

	it("reads numeric text", () => {
		expect(toTimestamp("1700000000")).toBe(1700000000);
		expect(toTimestamp(" 42.7 ")).toBe(42);
		expect(toTimestamp("1e3")).toBe(1000);
		expect(toTimestamp("-7.9")).toBe(-7);
	});

	it("takes the epoch seconds of a Date", () => {
		expect(toTimestamp(new Date(Date.UTC(2024, 0, 1)))).toBe(1704067200);
		expect(toTimestamp(new Date("2024-01-01T00:00:00.999Z"))).toBe(
			1704067200,
		);
		expect(toTimestamp(new Date(-1500))).toBe(-2);
	});

	it("parses date text", () => {
		expect(toTimestamp("2024-01-01T00:00:00Z")).toBe(1704067200);
		expect(toTimestamp("2024-01-01T01:00:00+01:00")).toBe(1704067200);
	});

	it("throws InvalidTimeRepresentationError for unreadable values", () => {
		expect(() => toTimestamp("not a date")).toThrow(
			InvalidTimeRepresentationError,
		);
		expect(() => toTimestamp("not a date")).toThrowError(
			"Unable to convert 'not a date' to a valid timestamp",
		);
		expect(() => toTimestamp(Number.NaN)).toThrow(
			InvalidTimeRepresentationError,
		);
		expect(() => toTimestamp(Number.POSITIVE_INFINITY)).toThrow(
			InvalidTimeRepresentationError,
		);
		expect(() => toTimestamp(new Date("nope"))).toThrow(
			InvalidTimeRepresentationError,
		);
		expect(() => toTimestamp("1e400")).toThrow(InvalidTimeRepresentationError);
	});

	it("carries the offending input", () => {
		try {
			toTimestamp("whenever");
			expect.unreachable();
		} catch (err) {
			expect(err).toBeInstanceOf(InvalidTimeRepresentationError);
			if (err instanceof InvalidTimeRepresentationError) {
				expect(err.input).toBe("whenever");
				expect(err.code).toBe(ErrorCodes.INVALID_TIME_REPRESENTATION);
			}
		}
	});

	it("resolves now and relative offsets against the clock", () => {
		vi.useFakeTimers();
		vi.setSystemTime(new Date("2025-01-01T12:00:00.000Z"));

		expect(toTimestamp("now")).toBe(1735732800);
		expect(toTimestamp(" NOW ")).toBe(1735732800);
		expect(toTimestamp("+5 minutes")).toBe(1735733100);
		expect(toTimestamp("-1h")).toBe(1735729200);
		expect(toTimestamp("2 hours ago")).toBe(1735725600);
		expect(() => toTimestamp("+banana")).toThrow(
			InvalidTimeRepresentationError,
		);
	});

	it("resolves day keywords to local midnight", () => {
		vi.useFakeTimers();
		vi.setSystemTime(new Date(2025, 0, 15, 13, 45));

		const midnight = (day: number) =>
			Math.floor(new Date(2025, 0, day).getTime() / 1000);
		expect(toTimestamp("today")).toBe(midnight(15));
		expect(toTimestamp("Tomorrow")).toBe(midnight(16));
		expect(toTimestamp("yesterday")).toBe(midnight(14));
	});
});

describe("now", () => {
	it("returns Date.now() value", () => {
		const spy = vi.spyOn(Date, "now").mockReturnValue(123456);
		try {
			expect(now()).toBe(123456);
		} finally {
			spy.mockRestore();
		}
	});
});
