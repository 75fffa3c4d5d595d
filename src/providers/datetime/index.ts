import { defineProvider } from "../../core/core-helpers";
import { toSeconds, toTimestamp } from "../../utils/time";

/** Timestamp normalization and duration parsing. */
export const datetimeHelpers = defineProvider("datetime", {
	toTimestamp,
	toSeconds,
});
