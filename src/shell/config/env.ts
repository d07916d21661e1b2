// CHANGE: Derive invocation settings from the process environment
// PURITY: CORE-compatible (pure over the env object passed in)
// INVARIANT: Unset or malformed variables fall back to DEFAULT_SETTINGS
// COMPLEXITY: O(1)

import type { ExceedMatching } from "../../core/models.js";
import {
	DEFAULT_SETTINGS,
	type InvocationSettings,
	withSettings,
} from "../../core/types/settings.js";

/**
 * Environment variables read by settingsFromEnv.
 *
 * - PATH: search path for the lrun binary
 * - LRUN_TS_BINARY: executable name (default "lrun")
 * - LRUN_TS_TRUNCATE: default capture limit in bytes
 * - LRUN_TS_EXCEED_MATCHING: "substring" | "exact"
 * - LRUN_TS_TMPDIR: directory for capture files
 * - LRUN_TS_SEPARATOR: "1" to place `--` before the command
 */
type LrunEnv = NodeJS.ProcessEnv & {
	readonly LRUN_TS_BINARY?: string;
	readonly LRUN_TS_TRUNCATE?: string;
	readonly LRUN_TS_EXCEED_MATCHING?: string;
	readonly LRUN_TS_TMPDIR?: string;
	readonly LRUN_TS_SEPARATOR?: string;
};

function nonEmpty(value: string | undefined): string | undefined {
	return value !== undefined && value.length > 0 ? value : undefined;
}

function parseTruncate(value: string | undefined): number | undefined {
	if (value === undefined || !/^\d+$/.test(value)) {
		return undefined;
	}
	return Number.parseInt(value, 10);
}

function parseMatching(value: string | undefined): ExceedMatching | undefined {
	return value === "substring" || value === "exact" ? value : undefined;
}

function parseSeparator(value: string | undefined): boolean | undefined {
	if (value === "1") return true;
	if (value === "0") return false;
	return undefined;
}

/**
 * Build settings from an environment map.
 *
 * @pure true
 * @example settingsFromEnv({ PATH: "/usr/bin", LRUN_TS_TRUNCATE: "10" }).truncateLength === 10
 */
export function settingsFromEnv(
	env: LrunEnv = process.env,
	base: InvocationSettings = DEFAULT_SETTINGS,
): InvocationSettings {
	return withSettings(base, {
		searchPath: env.PATH,
		binaryName: nonEmpty(env.LRUN_TS_BINARY),
		truncateLength: parseTruncate(env.LRUN_TS_TRUNCATE),
		exceedMatching: parseMatching(env.LRUN_TS_EXCEED_MATCHING),
		tempRoot: nonEmpty(env.LRUN_TS_TMPDIR),
		argumentSeparator: parseSeparator(env.LRUN_TS_SEPARATOR),
	});
}
