import type { HelperKitLogger } from "../types/common";
import { ErrorCodes } from "../types/common";
import type {
	HelperEntry,
	HelperMethods,
	HelperProvider,
} from "../types/providers";
import {
	DuplicateHelperCollisionError,
	HelperKitException,
	ReservedNameCollisionError,
} from "../utils/error";

/**
 * Case-insensitive table of helper methods contributed by providers.
 *
 * Registration is monotonic: entries are never removed. A name can belong to
 * one provider only; registering it again from the same provider replaces the
 * entry with an identical one.
 */
export class HelperRegistry {
	private readonly entries = new Map<string, HelperEntry>();
	private readonly reserved: ReadonlySet<string>;

	/**
	 * @param reserved - Names helpers may not take, compared case-insensitively.
	 * @param logger - Receives a `debug` line per registered method.
	 */
	constructor(
		reserved: Iterable<string> = [],
		private readonly logger?: HelperKitLogger,
	) {
		this.reserved = new Set(Array.from(reserved, (n) => n.toLowerCase()));
	}

	/** Register every method in a provider's manifest. */
	registerProvider(provider: HelperProvider): HelperEntry[] {
		return Object.keys(provider.methods).map((method) =>
			this.registerMethod(provider, method),
		);
	}

	/**
	 * Register a single method of a provider.
	 *
	 * @throws HelperKitException (`INVALID_PROVIDER`) when the manifest has no
	 * callable under that name; checked before any collision.
	 * @throws ReservedNameCollisionError when the name is a native operation.
	 * @throws DuplicateHelperCollisionError when another provider owns the name.
	 */
	registerMethod<M extends HelperMethods>(
		provider: HelperProvider<M>,
		method: keyof M & string,
	): HelperEntry {
		const key = method.toLowerCase();

		const fn = Object.hasOwn(provider.methods, method)
			? provider.methods[method]
			: undefined;
		if (typeof fn !== "function") {
			throw new HelperKitException(
				ErrorCodes.INVALID_PROVIDER,
				`Provider '${provider.name}' has no method '${method}'`,
				{ meta: { provider: provider.name, method } },
			);
		}

		if (this.reserved.has(key)) {
			throw new ReservedNameCollisionError(method, provider.name);
		}

		const existing = this.entries.get(key);
		if (existing && existing.provider !== provider.name) {
			throw new DuplicateHelperCollisionError(
				method,
				existing.provider,
				provider.name,
			);
		}

		const entry: HelperEntry = { key, provider: provider.name, method, fn };
		this.entries.set(key, entry);
		this.logger?.debug(`registered helper ${provider.name}.${method}`);
		return entry;
	}

	/** Look a helper up by name, ignoring case. */
	resolve(method: string): HelperEntry | undefined {
		return this.entries.get(method.toLowerCase());
	}

	has(method: string): boolean {
		return this.entries.has(method.toLowerCase());
	}

	/** Snapshot of all entries in registration order. */
	list(): HelperEntry[] {
		return Array.from(this.entries.values(), (entry) => ({ ...entry }));
	}
}
