import { builtinProviders } from "../providers";
import type { InferProviderHelpers } from "../types/providers";
import { loadConfigFromEnv } from "./config";
import { setReportLogger } from "./error-policy";
import { type HelperKit, helperkit } from "./helperkit";

export type DefaultHelperKit = HelperKit &
	InferProviderHelpers<typeof builtinProviders>;

let shared: DefaultHelperKit | undefined;

/**
 * The process-wide instance.
 *
 * Created on first use from the `HELPERKIT_*` environment variables with the
 * built-in providers registered, then reused for the life of the process.
 * Its logger also receives reports made outside `run()`, so
 * `HELPERKIT_LOG_LEVEL` governs those as well.
 */
export function getDefaultHelperKit(): DefaultHelperKit {
	if (!shared) {
		shared = helperkit(loadConfigFromEnv(), { providers: builtinProviders });
		shared.init();
		setReportLogger(shared.logger);
	}
	return shared;
}
