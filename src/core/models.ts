// CHANGE: Domain models for one supervised lrun run
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Which resource ceiling the sandboxed program hit.
 *
 * @remarks
 * - @pure true
 * - @invariant "none" iff lrun reported `EXCEED none`
 */
export type ExceededLimit = "none" | "time" | "memory" | "output";

/**
 * How the `EXCEED` report field is matched against limit names.
 *
 * - `substring`: case-insensitive containment of TIME, OUTPUT, MEMORY (in that order)
 * - `exact`: only the literal values lrun documents
 */
export type ExceedMatching = "substring" | "exact";

/**
 * Outcome of one supervised run.
 *
 * @remarks
 * - @pure true
 * - @invariant memoryBytes ≥ 0 ∧ cpuTimeSeconds ≥ 0 for any report lrun writes
 * - @invariant signal !== undefined ↔ the program was terminated by a signal
 * - @invariant stdout === undefined ↔ the caller redirected stdout (same for stderr)
 */
export interface RunResult {
	readonly memoryBytes: number;
	readonly cpuTimeSeconds: number;
	readonly exceededLimit: ExceededLimit;
	readonly exitCode: number;
	readonly signal?: number;
	readonly stdout?: Buffer;
	readonly stderr?: Buffer;
}

/**
 * True when the program was terminated by a signal.
 *
 * @pure true
 * @invariant isCrashed(r) ↔ r.signal !== undefined
 * @complexity O(1)
 */
export const isCrashed = (result: RunResult): boolean =>
	result.signal !== undefined;

/**
 * True when the program exited normally with status 0.
 *
 * @pure true
 * @invariant isClean(r) → ¬isCrashed(r)
 * @complexity O(1)
 */
export const isClean = (result: RunResult): boolean =>
	result.exitCode === 0 && !isCrashed(result);
