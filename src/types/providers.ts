/**
 * Helper provider types for HelperKit.
 *
 * A provider is an explicit manifest of named helper functions. Registering a
 * provider makes each of its methods callable through the facade.
 */

/**
 * Any callable a provider can expose.
 *
 * Parameters are `never` so that functions of every signature are assignable;
 * the registry invokes them through `Reflect.apply`.
 */
export type HelperFunction = (...args: never[]) => unknown;

/** The method table of a provider. */
export type HelperMethods = Record<string, HelperFunction>;

/** A named manifest of helper methods. */
export interface HelperProvider<M extends HelperMethods = HelperMethods> {
	/** Identifies the provider in collision checks and error messages. */
	readonly name: string;
	/** Helper methods keyed by their original-case name. */
	readonly methods: M;
}

/** One resolved registry entry. */
export interface HelperEntry {
	/** Lower-cased lookup key. */
	key: string;
	/** Name of the provider that owns the method. */
	provider: string;
	/** Method name as the provider spells it. */
	method: string;
	fn: HelperFunction;
}

/** Helper types for combining provider method tables together. */
export type UnionToIntersection<U> = (
	U extends unknown
		? (x: U) => unknown
		: never
) extends (x: infer I) => unknown
	? I
	: never;

export type Identity<T> = T extends object ? { [K in keyof T]: T[K] } : T;

/** Figures out which methods a list of providers adds to the facade. */
export type InferProviderHelpers<P extends readonly HelperProvider[]> = [
	P[number],
] extends [never]
	? Record<string, never>
	: Identity<
			UnionToIntersection<
				P[number] extends HelperProvider<infer M> ? M : Record<string, never>
			>
		>;
