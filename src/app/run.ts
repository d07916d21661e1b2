// CHANGE: Synchronous façade over the invocation effect
// PURITY: APP (composition; throws only at the synchronous boundary)
// INVARIANT: Thrown values are the typed errors from core/errors.ts, never FiberFailure wrappers
// COMPLEXITY: O(1) orchestration

import { Cause, Effect, Either, Exit, Option } from "effect";

import type { CommandInput } from "../core/command.js";
import type { RunError, TypeMismatch } from "../core/errors.js";
import type { RunResult } from "../core/models.js";
import { mergeOptions } from "../core/options/merge.js";
import type { OptionPatch, OptionSet } from "../core/options/types.js";
import type { InvocationSettings } from "../core/types/settings.js";
import { settingsFromEnv } from "../shell/config/env.js";
import { invoke } from "../shell/invoke.js";
import { isAvailable as lookupAvailable } from "../shell/locate.js";

/**
 * Run a synchronous effect and return its value, throwing its typed failure.
 *
 * @pure false
 * @postcondition Success → value; Fail(e) → throw e; Die(d) → throw squashed defect
 */
export function runOrThrow<A, E>(effect: Effect.Effect<A, E>): A {
	const exit = Effect.runSyncExit(effect);
	if (Exit.isSuccess(exit)) {
		return exit.value;
	}
	const failure = Cause.failureOption(exit.cause);
	throw Option.isSome(failure) ? failure.value : Cause.squash(exit.cause);
}

/**
 * Unwrap an Either, throwing its left value.
 *
 * @pure false
 */
export function getOrThrow<A, E>(either: Either.Either<A, E>): A {
	return Either.getOrThrowWith(either, (error) => error);
}

/**
 * Merge option patches, throwing TypeMismatch for a non-mapping partial.
 *
 * @throws TypeMismatch
 */
export function merge(
	...partials: ReadonlyArray<OptionPatch | null | undefined>
): OptionSet {
	return getOrThrow(mergeOptions(...partials));
}

/**
 * Effect form of a run: merges `options` and invokes lrun.
 *
 * @effect Effect<RunResult, RunError | TypeMismatch>
 */
export function runEffect(
	command: CommandInput,
	options: OptionPatch = {},
	settings: InvocationSettings = settingsFromEnv(),
): Effect.Effect<RunResult, RunError | TypeMismatch> {
	return Effect.gen(function* () {
		const merged = yield* mergeOptions(options);
		return yield* invoke(command, merged, settings);
	});
}

/**
 * Run `command` under lrun and block until it finishes.
 *
 * @throws NotAvailable | ArgumentError | TypeMismatch | InvocationFailure | DecodeError
 *
 * @example
 * ```ts
 * const result = run("echo hello", { max_cpu_time: 1 });
 * result.stdout?.toString(); // "hello\n"
 * ```
 */
export function run(
	command: CommandInput,
	options: OptionPatch = {},
	settings: InvocationSettings = settingsFromEnv(),
): RunResult {
	return runOrThrow(runEffect(command, options, settings));
}

/**
 * Whether the lrun binary can be located with the given settings.
 */
export function isAvailable(
	settings: InvocationSettings = settingsFromEnv(),
): boolean {
	return lookupAvailable(settings);
}
