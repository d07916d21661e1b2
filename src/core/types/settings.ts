// CHANGE: Invocation settings shared by the supervisor, the runner and the config loaders
// PURITY: CORE
// INVARIANT: truncateLength ≥ 0 ∧ binaryName.length > 0
// COMPLEXITY: O(1)

import type { ExceedMatching } from "../models.js";

/** Name of the lrun executable searched on PATH. */
export const LRUN_BINARY = "lrun";

/** Bytes of stdout/stderr kept in a result unless `truncate` says otherwise. */
export const TRUNCATE_OUTPUT_LENGTH = 4096;

/** Descriptor lrun writes its report to. */
export const REPORT_FD = 3;

/**
 * Settings that shape how lrun is located and invoked.
 *
 * @property binaryName Executable name looked up on the search path
 * @property searchPath PATH-style list of directories
 * @property truncateLength Default capture limit when options carry no `truncate`
 * @property exceedMatching How the EXCEED report field is classified
 * @property tempRoot Directory under which per-run capture directories are created
 * @property argumentSeparator Whether `--` is placed between lrun flags and the command
 */
export interface InvocationSettings {
	readonly binaryName: string;
	readonly searchPath: string;
	readonly truncateLength: number;
	readonly exceedMatching: ExceedMatching;
	readonly tempRoot?: string;
	readonly argumentSeparator: boolean;
}

export const DEFAULT_SETTINGS: InvocationSettings = {
	binaryName: LRUN_BINARY,
	searchPath: "",
	truncateLength: TRUNCATE_OUTPUT_LENGTH,
	exceedMatching: "substring",
	argumentSeparator: false,
};

/**
 * Overlay partial settings onto a base, ignoring undefined fields.
 *
 * @pure true
 * @complexity O(|patch|)
 */
export function withSettings(
	base: InvocationSettings,
	patch: Partial<InvocationSettings>,
): InvocationSettings {
	const defined = Object.fromEntries(
		Object.entries(patch).filter(([, value]) => value !== undefined),
	);
	return { ...base, ...defined };
}
