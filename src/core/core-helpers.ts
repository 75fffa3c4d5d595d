import { ErrorCodes } from "../types/common";
import type { HelperMethods, HelperProvider } from "../types/providers";
import { HelperKitException } from "../utils/error";

/**
 * Build a provider manifest.
 *
 * The method table keeps its literal type so that `helperkit()` can expose
 * the methods on the returned instance.
 *
 * @throws HelperKitException (`INVALID_PROVIDER`) for an empty name or a
 * non-function entry.
 */
export function defineProvider<const M extends HelperMethods>(
	name: string,
	methods: M,
): HelperProvider<M> {
	if (!name.trim()) {
		throw new HelperKitException(
			ErrorCodes.INVALID_PROVIDER,
			"Provider name must not be empty",
		);
	}
	for (const [method, fn] of Object.entries(methods)) {
		if (typeof fn !== "function") {
			throw new HelperKitException(
				ErrorCodes.INVALID_PROVIDER,
				`Provider '${name}' method '${method}' is not a function`,
				{ meta: { provider: name, method } },
			);
		}
	}
	return { name, methods };
}
