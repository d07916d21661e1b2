// CHANGE: Typed error ADT for the lrun façade using Effect.Data
// PURITY: CORE
// INVARIANT: Errors are values (no throw inside CORE), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Malformed command or option set shape, detected before any process is spawned.
 *
 * @pure true (Data class)
 * @invariant message.length > 0
 */
export class ArgumentError extends Data.TaggedError("ArgumentError")<{
	readonly message: string;
}> {}

/**
 * A partial option set that is not a mapping.
 *
 * @pure true (Data class)
 * @invariant position ≥ 0 (index among the partials passed to merge)
 */
export class TypeMismatch extends Data.TaggedError("TypeMismatch")<{
	readonly message: string;
	readonly position: number;
}> {}

/**
 * The lrun executable could not be found on the search path.
 *
 * @pure true (Data class)
 */
export class NotAvailable extends Data.TaggedError("NotAvailable")<{
	readonly message: string;
	readonly binaryName: string;
}> {}

/**
 * lrun itself failed: it could not be spawned, was signaled, or exited non-zero.
 *
 * The sandboxed program's own exit status never produces this error; it is
 * reported through `RunResult` instead.
 *
 * @pure true (Data class)
 * @invariant status === null ↔ (signal !== null ∨ spawn failed)
 */
export class InvocationFailure extends Data.TaggedError("InvocationFailure")<{
	readonly message: string;
	readonly status: number | null;
	readonly signal: string | null;
	readonly stderr?: string;
}> {}

/**
 * Unexpected content on the report channel.
 *
 * @pure true (Data class)
 */
export class DecodeError extends Data.TaggedError("DecodeError")<{
	readonly message: string;
	readonly value: string | undefined;
}> {}

/**
 * Configuration file could not be read or has an invalid shape.
 *
 * @pure true (Data class)
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly message: string;
	readonly path: string;
}> {}

/**
 * Every failure a single run can produce.
 *
 * @invariant All errors extend Data.TaggedError
 */
export type RunError =
	| ArgumentError
	| NotAvailable
	| InvocationFailure
	| DecodeError;
