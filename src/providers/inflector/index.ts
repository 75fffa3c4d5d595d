import { defineProvider } from "../../core/core-helpers";
import { raise } from "../../core/error-policy";
import { Severity } from "../../types/common";

const IRREGULAR: Record<string, string> = {
	person: "people",
	man: "men",
	woman: "women",
	child: "children",
	mouse: "mice",
	goose: "geese",
	foot: "feet",
	tooth: "teeth",
};

const UNCOUNTABLE = new Set([
	"equipment",
	"information",
	"rice",
	"money",
	"species",
	"series",
	"fish",
	"sheep",
	"news",
]);

const PLURAL_RULES: Array<[RegExp, string]> = [
	[/(quiz)$/i, "$1zes"],
	[/(matr|vert|ind)(ix|ex)$/i, "$1ices"],
	[/(x|ch|ss|sh)$/i, "$1es"],
	[/([^aeiouy]|qu)y$/i, "$1ies"],
	[/(?:([^f])fe|([lr])f)$/i, "$1$2ves"],
	[/(bu|gas|ba)s$/i, "$1ses"],
	[/(octop|vir)us$/i, "$1i"],
	[/(ax|test)is$/i, "$1es"],
	[/s$/i, "s"],
	[/$/, "s"],
];

const SINGULAR_RULES: Array<[RegExp, string]> = [
	[/(quiz)zes$/i, "$1"],
	[/(matr)ices$/i, "$1ix"],
	[/(vert|ind)ices$/i, "$1ex"],
	[/(octop|vir)i$/i, "$1us"],
	[/(ax|test)es$/i, "$1is"],
	[/(x|ch|ss|sh)es$/i, "$1"],
	[/([^aeiouy]|qu)ies$/i, "$1y"],
	[/([lr])ves$/i, "$1f"],
	[/([^f])ves$/i, "$1fe"],
	[/(bu|gas|ba)ses$/i, "$1s"],
	[/ss$/i, "ss"],
	[/s$/i, ""],
];

const SINGULAR_IRREGULAR = Object.fromEntries(
	Object.entries(IRREGULAR).map(([singular, plural]) => [plural, singular]),
);

function matchCase(source: string, word: string): string {
	if (source === source.toUpperCase()) return word.toUpperCase();
	if (source.charAt(0) === source.charAt(0).toUpperCase()) {
		return word.charAt(0).toUpperCase() + word.slice(1);
	}
	return word;
}

function inflect(
	word: string,
	irregular: Record<string, string>,
	rules: Array<[RegExp, string]>,
): string {
	const lower = word.toLowerCase();
	if (!word || UNCOUNTABLE.has(lower)) return word;
	if (Object.hasOwn(irregular, lower)) return matchCase(word, irregular[lower]);
	for (const [pattern, replacement] of rules) {
		if (pattern.test(word)) return word.replace(pattern, replacement);
	}
	return word;
}

function pluralize(word: string, count: number = 2): string {
	if (count === 1) return word;
	return inflect(word, IRREGULAR, PLURAL_RULES);
}

function singularize(word: string): string {
	return inflect(word, SINGULAR_IRREGULAR, SINGULAR_RULES);
}

/** 1 -> "1st", 12 -> "12th", 23 -> "23rd". */
function ordinal(value: number): string {
	let n = value;
	if (!Number.isInteger(n)) {
		raise(Severity.NOTICE, `ordinal(): ${value} is not an integer, truncating`);
		n = Math.trunc(n);
	}
	const mod100 = Math.abs(n) % 100;
	if (mod100 >= 11 && mod100 <= 13) return `${n}th`;
	switch (Math.abs(n) % 10) {
		case 1:
			return `${n}st`;
		case 2:
			return `${n}nd`;
		case 3:
			return `${n}rd`;
		default:
			return `${n}th`;
	}
}

export const inflector = defineProvider("inflector", {
	pluralize,
	singularize,
	ordinal,
});
