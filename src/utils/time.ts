/** Time helpers used across the project. */
import type { Seconds, TimeInput, UnixTimestamp } from "../types/common";
import { InvalidTimeRepresentationError } from "./error";

/** Current epoch milliseconds. */
export function now(): number {
	return Date.now();
}

type DurationUnit = "hour" | "minute" | "second";

const UNIT_SECONDS: Record<DurationUnit, number> = {
	hour: 3600,
	minute: 60,
	second: 1,
};

// The letter set spells hour(s), min(ute)(s) and sec(ond)(s), nothing more.
const UNIT_PATTERNS: Array<[DurationUnit, RegExp]> = [
	["hour", /^h(r|our|ours)?$/u],
	["minute", /^m(in|ins|inute|inutes)?$/u],
	["second", /^s(ec|ecs|econd|econds)?$/u],
];

const MINUTES_SECONDS = /^\d+:\d+$/;
const HOURS_MINUTES_SECONDS = /^\d+:\d+:\d+$/;
const INVALID_CHARS = /[^a-z0-9. ]+/giu;
const REPEATED_SPACES = / {2,}/gu;
const SCALE_UNIT_GAP = /([0-9.]+) ([cdehimnorstu]+)/gu;
const SCALE_UNIT = /^(\d+\.?\d*|\.\d+)([cdehimnorstu]+)$/u;

/**
 * Convert a string containing one or more of hours, minutes and seconds into
 * a total number of seconds.
 *
 * Accepts clock forms ("30:15", "12:30:00") and free text such as
 * "3 hours 4 minutes 10 seconds", "5min" or "4.5h". Never throws: anything it
 * cannot read in full yields 0, and so does a total too large to represent,
 * so callers that must tell a zero duration from
 * bad input need to validate first.
 *
 * Each unit is taken from its first non-zero occurrence; later ones are
 * ignored ("2h 2h" is 7200, "0h 2h" is also 7200).
 */
export function toSeconds(text: string): Seconds {
	const slots: Record<DurationUnit, number> = { hour: 0, minute: 0, second: 0 };

	if (MINUTES_SECONDS.test(text)) {
		const [minutes, seconds] = text.split(":").map(Number);
		slots.minute = minutes;
		slots.second = seconds;
	} else if (HOURS_MINUTES_SECONDS.test(text)) {
		const [hours, minutes, seconds] = text.split(":").map(Number);
		slots.hour = hours;
		slots.minute = minutes;
		slots.second = seconds;
	} else {
		const normalized = text
			.replace(INVALID_CHARS, " ")
			.replace(REPEATED_SPACES, " ")
			.replace(SCALE_UNIT_GAP, "$1$2");

		for (const chunk of normalized.split(" ")) {
			const match = SCALE_UNIT.exec(chunk);
			if (!match) return 0;

			const unit = classifyUnit(match[2]);
			if (!unit) return 0;

			if (!slots[unit]) slots[unit] = Number(match[1]);
		}
	}

	const total =
		slots.hour * UNIT_SECONDS.hour +
		slots.minute * UNIT_SECONDS.minute +
		slots.second * UNIT_SECONDS.second;
	// Scales too long for a double overflow to Infinity.
	if (!Number.isFinite(total)) return 0;
	return Math.trunc(total);
}

function classifyUnit(letters: string): DurationUnit | undefined {
	for (const [unit, pattern] of UNIT_PATTERNS) {
		if (pattern.test(letters)) return unit;
	}
	return undefined;
}

const NUMERIC_TEXT = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;
const OFFSET = /^([+-])\s*(.+)$/;
const AGO = /^(.+?)\s+ago$/i;
const DAY_OFFSETS = new Map<string, number>([
	["today", 0],
	["tomorrow", 1],
	["yesterday", -1],
]);

/**
 * Convert a value to a Unix timestamp (whole seconds).
 *
 * - numbers and numeric strings are truncated toward zero;
 * - a `Date` gives its own epoch seconds;
 * - "now", "today", "tomorrow", "yesterday", "+5 minutes", "-1h" and
 *   "2 hours ago" are resolved against the current clock;
 * - any other text goes to `Date.parse`.
 *
 * @throws InvalidTimeRepresentationError when the value is not finite or the
 * text cannot be resolved to a point in time.
 */
export function toTimestamp(value: TimeInput): UnixTimestamp {
	if (typeof value === "number") {
		if (!Number.isFinite(value)) throw new InvalidTimeRepresentationError(value);
		return truncate(value);
	}

	if (value instanceof Date) {
		const ms = value.getTime();
		if (Number.isNaN(ms)) throw new InvalidTimeRepresentationError(value);
		return Math.floor(ms / 1000);
	}

	if (NUMERIC_TEXT.test(value)) {
		const numeric = Number(value);
		if (!Number.isFinite(numeric)) {
			throw new InvalidTimeRepresentationError(value);
		}
		return truncate(numeric);
	}

	const relative = resolveRelative(value.trim());
	if (relative !== undefined) return relative;

	const parsed = Date.parse(value);
	if (Number.isNaN(parsed)) throw new InvalidTimeRepresentationError(value);
	return Math.floor(parsed / 1000);
}

// Math.trunc(-0.5) is -0; callers get a plain 0.
function truncate(value: number): UnixTimestamp {
	return Math.trunc(value) || 0;
}

function resolveRelative(text: string): UnixTimestamp | undefined {
	const current = now();
	const keyword = text.toLowerCase();

	if (keyword === "now") return Math.floor(current / 1000);

	const days = DAY_OFFSETS.get(keyword);
	if (days !== undefined) {
		const midnight = new Date(current);
		midnight.setHours(0, 0, 0, 0);
		midnight.setDate(midnight.getDate() + days);
		return Math.floor(midnight.getTime() / 1000);
	}

	const offset = OFFSET.exec(text);
	if (offset) {
		const seconds = toSeconds(offset[2]);
		if (!seconds) return undefined;
		const sign = offset[1] === "-" ? -1 : 1;
		return Math.floor(current / 1000) + sign * seconds;
	}

	const ago = AGO.exec(text);
	if (ago) {
		const seconds = toSeconds(ago[1]);
		if (!seconds) return undefined;
		return Math.floor(current / 1000) - seconds;
	}

	return undefined;
}
