/**
 * No-op logger adapter.
 *
 * Discards every message. Handy for tests and embedders that log elsewhere.
 */
import type { HelperKitLogger } from "../../types/common";

export class NoopLogger implements HelperKitLogger {
	debug(_message: string, _meta?: Record<string, unknown>): void {}
	info(_message: string, _meta?: Record<string, unknown>): void {}
	warn(_message: string, _meta?: Record<string, unknown>): void {}
	error(_message: string, _meta?: Record<string, unknown>): void {}
}
