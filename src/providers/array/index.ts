import { defineProvider } from "../../core/core-helpers";
import { raise } from "../../core/error-policy";
import { Severity } from "../../types/common";

function isAssoc(value: unknown): boolean {
	if (Array.isArray(value)) return false;
	return typeof value === "object" && value !== null;
}

function pluck<T, K extends keyof T>(items: readonly T[], key: K): T[K][] {
	return items.map((item) => item[key]);
}

function sum(values: readonly number[]): number {
	return values.reduce((total, v) => total + v, 0);
}

function min(values: readonly number[]): number | undefined {
	return values.length ? Math.min(...values) : undefined;
}

function max(values: readonly number[]): number | undefined {
	return values.length ? Math.max(...values) : undefined;
}

function unique<T>(values: readonly T[]): T[] {
	return Array.from(new Set(values));
}

function chunk<T>(values: readonly T[], size: number): T[][] {
	if (!Number.isInteger(size) || size < 1) {
		raise(Severity.WARNING, `chunk(): size must be a positive integer, got ${size}`);
		return [];
	}
	const out: T[][] = [];
	for (let i = 0; i < values.length; i += size) {
		out.push(values.slice(i, i + size));
	}
	return out;
}

export const arrayHelpers = defineProvider("array", {
	isAssoc,
	pluck,
	sum,
	min,
	max,
	unique,
	chunk,
});
