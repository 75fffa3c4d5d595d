/**
 * Dumper backed by `util.inspect`.
 *
 * Renders nested structures in full, with colors only when stdout is a TTY.
 */
import { inspect } from "node:util";
import type { DumperAdapter } from "../../types/common";

export class InspectDumper implements DumperAdapter {
	constructor(
		private readonly colors: boolean = Boolean(process.stdout.isTTY),
	) {}

	dump(value: unknown): string {
		return inspect(value, {
			depth: null,
			colors: this.colors,
			sorted: true,
			breakLength: 80,
		});
	}
}
