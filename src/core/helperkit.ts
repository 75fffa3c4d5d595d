/*
 * Core HelperKit implementation.
 *
 * This module exposes the `HelperKit` facade and a small factory `helperkit`.
 * The facade owns the debug flag, the registered exception handler and the
 * helper registry. Calls it does not implement natively are resolved through
 * the registry, and `run()` executes arbitrary work with runtime errors
 * promoted to failures that end up at a single handler.
 */

import { InspectDumper } from "../adapters/dumper/inspect";
import { ConsoleExceptionHandler } from "../adapters/exception-handler/console";
import { ConsoleLogger } from "../adapters/logger/console";
import { builtinProviders } from "../providers";
import type {
	DumperAdapter,
	ExceptionHandler,
	ExceptionHandlerAdapter,
	HelperKitConfig,
	HelperKitError,
	HelperKitLogger,
} from "../types/common";
import { ErrorCodes } from "../types/common";
import type {
	HelperEntry,
	HelperMethods,
	HelperProvider,
	InferProviderHelpers,
} from "../types/providers";
import { HelperKitException, UnknownHelperMethodError } from "../utils/error";
import { type HelperKitOptions, HelperKitOptionsSchema, resolveOptions } from "./config";
import { NATIVE_METHODS, type NativeMethod } from "./constants";
import { ExecutionGuard } from "./guard";
import { HelperRegistry } from "./registry";

const NATIVE_LOOKUP = new Map<string, NativeMethod>(
	NATIVE_METHODS.map((name) => [name.toLowerCase(), name]),
);

/**
 * Entry point for helper dispatch and guarded execution.
 *
 * Configuration is normalized on construction:
 * - `debug`, `errorReporting` and `logLevel` are validated and defaulted
 * - missing adapters fall back to console logging, an `util.inspect` dumper
 *   and a console exception handler
 *
 * Registered helpers are reachable through `call()` under any casing, and
 * are also attached to the instance under their original name when that
 * name is free.
 */
export class HelperKit<H = HelperKitError> {
	/**
	 * Validated configuration; frozen. The exception handler is left out since
	 * it can change; see `getExceptionHandler()`.
	 */
	readonly config: Readonly<
		Omit<HelperKitConfig<H>, "exceptionHandler"> & HelperKitOptions
	>;

	/** Receives registry and facade diagnostics. */
	readonly logger: HelperKitLogger;

	/** Renders values for `dump()`. */
	readonly dumper: DumperAdapter;

	/** Receives failures from `run()` while no handler is registered. */
	readonly defaultHandler: ExceptionHandlerAdapter<HelperKitError>;

	private debug: boolean;
	private errorReporting: number;
	private exceptionHandler?: ExceptionHandler<H>;
	private initialized = false;
	private readonly attached = new Set<string>();
	private readonly registry: HelperRegistry;
	private readonly guard: ExecutionGuard<H>;

	/**
	 * @param cfg - Configuration for this instance. See `HelperKitConfig`.
	 * @param providers - Providers to register right away, in order.
	 */
	constructor(
		cfg: HelperKitConfig<H> = {},
		providers: readonly HelperProvider[] = [],
	) {
		const options = resolveOptions(cfg);
		const { exceptionHandler, ...rest } = cfg;
		this.config = Object.freeze({ ...rest, ...options });

		this.logger = cfg.adapters?.logger ?? new ConsoleLogger(options.logLevel);
		this.dumper = cfg.adapters?.dumper ?? new InspectDumper();
		this.defaultHandler =
			cfg.adapters?.defaultHandler ?? new ConsoleExceptionHandler(this.logger);

		this.debug = options.debug;
		this.errorReporting = options.errorReporting;
		this.exceptionHandler = exceptionHandler;

		this.registry = new HelperRegistry(NATIVE_METHODS, this.logger);
		this.guard = new ExecutionGuard<H>({
			reporting: () => this.errorReporting,
			handler: () => this.exceptionHandler,
			defaultHandler: this.defaultHandler,
		});

		this.registerProviders(providers);
	}

	// ===== Environment & flags =============================================

	/** Whether the process is attached to a terminal. */
	isCLI(): boolean {
		return Boolean(process.stdin.isTTY || process.stdout.isTTY);
	}

	isDebug(): boolean {
		return this.debug;
	}

	setDebug(debug: boolean = false): void {
		this.debug = debug;
		this.logger.info(`debug mode ${debug ? "enabled" : "disabled"}`);
	}

	getErrorReporting(): number {
		return this.errorReporting;
	}

	/**
	 * Change which severities `run()` promotes to failures.
	 *
	 * @returns The previous mask.
	 * @throws HelperKitException (`INVALID_CONFIG`) for a mask outside 0-15.
	 */
	setErrorReporting(mask: number): number {
		const parsed = HelperKitOptionsSchema.shape.errorReporting.safeParse(mask);
		if (!parsed.success) {
			throw new HelperKitException(
				ErrorCodes.INVALID_CONFIG,
				`Invalid error reporting mask: ${mask}`,
				{ meta: { mask } },
			);
		}
		const previous = this.errorReporting;
		this.errorReporting = parsed.data;
		return previous;
	}

	/** Pretty-print a value, but only in debug mode. */
	dump(value: unknown): void {
		if (this.debug) console.log(this.dumper.dump(value));
	}

	// ===== Guarded execution ===============================================

	/**
	 * Set the handler that receives failures escaping `run()`.
	 *
	 * Passing nothing goes back to the default handler.
	 */
	setExceptionHandler(handler?: ExceptionHandler<H>): void {
		this.exceptionHandler = handler;
	}

	getExceptionHandler(): ExceptionHandler<H> | undefined {
		return this.exceptionHandler;
	}

	/**
	 * Execute a callable with runtime errors promoted to failures.
	 *
	 * @returns The callable's result, or the exception handler's result when
	 * anything escaped the callable.
	 */
	run<A extends unknown[], R>(
		callable: (...args: A) => R,
		...args: A
	): R | H | HelperKitError {
		return this.guard.run(callable, ...args);
	}

	// ===== Helper registration =============================================

	/** Register the built-in providers. Calling it again changes nothing. */
	init(): this {
		if (this.initialized) return this;
		this.registerProviders(builtinProviders);
		this.initialized = true;
		return this;
	}

	registerProviders(providers: readonly HelperProvider[]): void {
		for (const provider of providers) this.registerProvider(provider);
	}

	registerProvider(provider: HelperProvider): void {
		for (const method of Object.keys(provider.methods)) {
			this.addHelperMethod(provider, method);
		}
	}

	/**
	 * Register one method of a provider as a helper.
	 *
	 * @throws ReservedNameCollisionError when the name is a native operation.
	 * @throws DuplicateHelperCollisionError when another provider owns it.
	 */
	addHelperMethod<M extends HelperMethods>(
		provider: HelperProvider<M>,
		method: keyof M & string,
	): void {
		const entry = this.registry.registerMethod(provider, method);
		this.attach(entry);
	}

	resolveHelper(method: string): HelperEntry | undefined {
		return this.registry.resolve(method);
	}

	listHelpers(): HelperEntry[] {
		return this.registry.list();
	}

	// ===== Dispatch ========================================================

	/**
	 * Call a native operation or a registered helper by name.
	 *
	 * Names are matched case-insensitively; native operations win.
	 *
	 * @throws UnknownHelperMethodError when nothing answers to the name.
	 */
	call(method: string, ...args: unknown[]): unknown {
		const native = NATIVE_LOOKUP.get(method.toLowerCase());
		if (native) return Reflect.apply(this[native], this, args);

		const entry = this.registry.resolve(method);
		if (!entry) throw new UnknownHelperMethodError(method);
		return Reflect.apply(entry.fn, undefined, args);
	}

	// Names already used by the instance or its prototype chain stay
	// reachable through call() only.
	private attach(entry: HelperEntry): void {
		if (entry.method in this && !this.attached.has(entry.method)) return;

		this.attached.add(entry.method);
		Object.defineProperty(this, entry.method, {
			value: (...args: unknown[]) => this.call(entry.method, ...args),
			enumerable: true,
			configurable: true,
			writable: false,
		});
	}
}

/**
 * Construct a `HelperKit` with the methods of the given providers merged into
 * its type.
 *
 * @param config - Instance configuration.
 * @param options - Providers to register.
 * @returns A `HelperKit` instance augmented with the providers' methods.
 */
export function helperkit<
	const P extends readonly HelperProvider[],
	H = HelperKitError,
>(
	config: HelperKitConfig<H> = {},
	options?: { providers?: P },
): HelperKit<H> & InferProviderHelpers<P> {
	const instance = new HelperKit<H>(config, options?.providers ?? []);
	return instance as HelperKit<H> & InferProviderHelpers<P>;
}
