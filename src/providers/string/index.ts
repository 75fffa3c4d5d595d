import { defineProvider } from "../../core/core-helpers";

function words(text: string): string[] {
	return text
		.replace(/([a-z0-9])([A-Z])/g, "$1 $2")
		.split(/[^a-zA-Z0-9]+/)
		.filter(Boolean);
}

function capitalize(word: string): string {
	return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

function slugify(text: string, separator: string = "-"): string {
	return text
		.normalize("NFKD")
		.replace(/[\u0300-\u036f]/g, "")
		.toLowerCase()
		.replace(/[^a-z0-9]+/g, separator)
		.split(separator)
		.filter(Boolean)
		.join(separator);
}

function camelCase(text: string): string {
	const [first = "", ...rest] = words(text);
	return first.toLowerCase() + rest.map(capitalize).join("");
}

function snakeCase(text: string): string {
	return words(text)
		.map((w) => w.toLowerCase())
		.join("_");
}

function studlyCase(text: string): string {
	return words(text).map(capitalize).join("");
}

function truncate(text: string, length: number, suffix: string = "..."): string {
	if (text.length <= length) return text;
	return text.slice(0, Math.max(0, length - suffix.length)) + suffix;
}

function startsWithAny(text: string, prefixes: readonly string[]): boolean {
	return prefixes.some((prefix) => text.startsWith(prefix));
}

export const stringHelpers = defineProvider("string", {
	slugify,
	camelCase,
	snakeCase,
	studlyCase,
	truncate,
	startsWithAny,
});
