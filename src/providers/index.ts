import { arrayHelpers } from "./array";
import { datetimeHelpers } from "./datetime";
import { inflector } from "./inflector";
import { stringHelpers } from "./string";

export { arrayHelpers, datetimeHelpers, inflector, stringHelpers };

/** Providers registered by `HelperKit#init()`. */
export const builtinProviders = [
	datetimeHelpers,
	arrayHelpers,
	stringHelpers,
	inflector,
] as const;
