// CHANGE: Optional debug logger controlled by env LRUN_TS_DEBUG
// PURITY: SHELL
// INVARIANT: Writes nothing unless LRUN_TS_DEBUG=1 at call time
// COMPLEXITY: O(|message|)

const PREFIX = "[lrun-ts]";

/**
 * Whether debug output is enabled for the given environment.
 *
 * @pure true
 */
export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
	return env.LRUN_TS_DEBUG === "1";
}

/**
 * Write one diagnostic line to stderr when debugging is enabled.
 *
 * @pure false (console I/O)
 */
export function debugLog(message: string): void {
	if (isDebugEnabled()) {
		console.error(PREFIX, message);
	}
}
