// CHANGE: Supervise one synchronous lrun run and decode its report
// PURITY: SHELL (spawns lrun, touches the filesystem)
// EFFECT: Effect<RunResult, RunError>
// FORMAT THEOREM:
//   invoke(c, o) = locate ≫ normalize(c) ≫ argv(o) ≫ scoped(captures ≫ spawn ≫ classify ≫ parse ≫ read)
//   ∀ exit path: captures released (descriptors closed, owned files removed)
// INVARIANT: The sandboxed program's exit status never fails the effect; lrun's does
// COMPLEXITY: O(|report| + truncate) after the child exits

import type { SpawnSyncReturns } from "node:child_process";

import { Effect } from "effect";

import { type CommandInput, normalizeCommand } from "../core/command.js";
import { InvocationFailure, type RunError } from "../core/errors.js";
import type { RunResult } from "../core/models.js";
import { buildArguments } from "../core/options/expand.js";
import type { OptionSet } from "../core/options/types.js";
import { parseReport } from "../core/report/parser.js";
import { type InvocationSettings, REPORT_FD } from "../core/types/settings.js";
import { spawnSync } from "../utils/node-mods.js";
import {
	acquireCaptures,
	type Captures,
	readCapture,
	truncateOption,
} from "./capture.js";
import { debugLog } from "./debug.js";
import { locateExecutable } from "./locate.js";

/**
 * Spawn lrun with the report pipe on descriptor 3.
 *
 * spawnSync hands the pipe's write end to the child, drops the parent's copy,
 * then blocks until both the pipe reaches end of stream and the child is reaped,
 * in whichever order they happen.
 */
function spawnLrun(
	executable: string,
	args: ReadonlyArray<string>,
	captures: Captures,
): Effect.Effect<SpawnSyncReturns<Buffer>, InvocationFailure> {
	return Effect.try({
		try: () =>
			spawnSync(executable, args, {
				stdio: [captures.stdin, captures.stdout.fd, captures.stderr.fd, "pipe"],
				encoding: "buffer",
				windowsHide: true,
			}),
		catch: (error) =>
			new InvocationFailure({
				message: `failed to spawn lrun: ${String(error)}`,
				status: null,
				signal: null,
			}),
	});
}

/**
 * Human-readable termination status of lrun itself.
 *
 * @pure true
 */
function describeStatus(child: SpawnSyncReturns<Buffer>): string {
	return child.signal === null
		? `exit status ${String(child.status)}`
		: `killed by ${child.signal}`;
}

/**
 * Fail when lrun could not run, was signaled, or exited non-zero.
 *
 * @effect Effect<void, InvocationFailure>
 */
function checkTermination(
	child: SpawnSyncReturns<Buffer>,
	captures: Captures,
	truncate: number,
): Effect.Effect<void, InvocationFailure> {
	if (child.error !== undefined) {
		return Effect.fail(
			new InvocationFailure({
				message: `failed to run lrun: ${child.error.message}`,
				status: child.status,
				signal: child.signal,
			}),
		);
	}
	if (child.signal === null && child.status === 0) {
		return Effect.void;
	}
	return Effect.flatMap(readCapture(captures.stderr, truncate), (stderr) => {
		const text = stderr?.toString("utf8");
		return Effect.fail(
			new InvocationFailure({
				message:
					`lrun exits abnormally: ${describeStatus(child)}. ${text ?? ""}`.trimEnd(),
				status: child.status,
				signal: child.signal,
				...(text === undefined ? {} : { stderr: text }),
			}),
		);
	});
}

/**
 * Text lrun wrote on the report descriptor.
 *
 * @pure true
 */
function reportText(child: SpawnSyncReturns<Buffer>): string {
	const channel = child.output[REPORT_FD];
	return channel === null || channel === undefined
		? ""
		: channel.toString("utf8");
}

/**
 * Run `command` under lrun with `options`.
 *
 * @param command - Shell-style string or argv sequence
 * @param options - Merged option set; registry names become flags, stdin/stdout/stderr/truncate drive capture
 * @param settings - Binary lookup and decoding settings
 *
 * @effect Effect<RunResult, RunError>
 * @invariant options is never mutated
 * @postcondition temp captures removed on success and on every failure
 */
export function invoke(
	command: CommandInput,
	options: OptionSet,
	settings: InvocationSettings,
): Effect.Effect<RunResult, RunError> {
	return Effect.gen(function* () {
		const executable = yield* locateExecutable(settings);
		const argv = yield* normalizeCommand(command);
		const args = yield* buildArguments(
			options,
			argv,
			settings.argumentSeparator,
		);
		const truncate = yield* truncateOption(options, settings);
		debugLog(`spawn ${executable} ${JSON.stringify(args)}`);

		return yield* Effect.scoped(
			Effect.gen(function* () {
				const captures = yield* acquireCaptures(options, settings);
				const child = yield* spawnLrun(executable, args, captures);
				yield* checkTermination(child, captures, truncate);

				const text = reportText(child);
				debugLog(`report ${Buffer.byteLength(text)} bytes`);
				const report = yield* parseReport(text, settings.exceedMatching);
				const stdout = yield* readCapture(captures.stdout, truncate);
				const stderr = yield* readCapture(captures.stderr, truncate);

				const result: RunResult = {
					...report,
					...(stdout === undefined ? {} : { stdout }),
					...(stderr === undefined ? {} : { stderr }),
				};
				return Object.freeze(result);
			}),
		);
	});
}
