// CHANGE: Scoped stdio resources for one lrun invocation
// PURITY: SHELL (opens, reads and removes files)
// EFFECT: Effect<Captures, ArgumentError | InvocationFailure, Scope>
// INVARIANT: Every descriptor opened here is closed and every owned file removed when the scope closes
// INVARIANT: Caller-supplied paths are opened, never deleted
// COMPLEXITY: O(1) filesystem calls per stream; reads are O(limit)

import { Effect, Either, type Scope } from "effect";

import { ArgumentError, InvocationFailure } from "../core/errors.js";
import type { OptionSet } from "../core/options/types.js";
import type { InvocationSettings } from "../core/types/settings.js";
import { fs, os, path } from "../utils/node-mods.js";
import { debugLog } from "./debug.js";

/**
 * One output stream of the child.
 *
 * @property fd Descriptor handed to the child
 * @property ownedPath Temp file path when this invocation owns the capture, otherwise undefined
 */
export interface OutputCapture {
	readonly fd: number;
	readonly ownedPath?: string;
}

/**
 * Descriptors for the child's stdin, stdout and stderr.
 *
 * @invariant stdin === "ignore" ↔ options.stdin is absent
 */
export interface Captures {
	readonly stdin: number | "ignore";
	readonly stdout: OutputCapture;
	readonly stderr: OutputCapture;
}

type StreamKey = "stdin" | "stdout" | "stderr";

/**
 * Read a path-valued pass-through option.
 *
 * @pure true
 * @returns Right(undefined) when absent, Right(path) when a non-empty string, otherwise Left
 */
export function pathOption(
	options: OptionSet,
	key: StreamKey,
): Either.Either<string | undefined, ArgumentError> {
	const value = options[key];
	if (value === undefined) {
		return Either.right(undefined);
	}
	return typeof value === "string" && value.length > 0
		? Either.right(value)
		: Either.left(
				new ArgumentError({ message: `option ${key} must be a file path` }),
			);
}

/**
 * Capture limit from the `truncate` option, falling back to the settings default.
 *
 * @pure true
 * @invariant Right(n) → Number.isInteger(n) ∧ n ≥ 0
 */
export function truncateOption(
	options: OptionSet,
	settings: Pick<InvocationSettings, "truncateLength">,
): Either.Either<number, ArgumentError> {
	const value = options["truncate"];
	if (value === undefined) {
		return Either.right(settings.truncateLength);
	}
	return typeof value === "number" && Number.isInteger(value) && value >= 0
		? Either.right(value)
		: Either.left(
				new ArgumentError({
					message: "option truncate must be a non-negative integer",
				}),
			);
}

/**
 * Close a descriptor, logging instead of failing.
 */
function closeQuietly(fd: number): Effect.Effect<void> {
	return Effect.sync(() => {
		try {
			fs.closeSync(fd);
		} catch (error) {
			debugLog(`failed to close fd ${fd}: ${String(error)}`);
		}
	});
}

/**
 * Open a file as a scoped descriptor.
 */
function openScoped(
	file: string,
	flags: "r" | "w",
	key: StreamKey,
): Effect.Effect<number, ArgumentError, Scope.Scope> {
	return Effect.acquireRelease(
		Effect.try({
			try: () => fs.openSync(file, flags),
			catch: (error) =>
				new ArgumentError({
					message: `cannot open ${key} file ${file}: ${String(error)}`,
				}),
		}),
		closeQuietly,
	);
}

/**
 * Private directory holding this invocation's capture files, removed with the scope.
 */
function scopedTempDir(
	settings: Pick<InvocationSettings, "tempRoot">,
): Effect.Effect<string, InvocationFailure, Scope.Scope> {
	return Effect.acquireRelease(
		Effect.try({
			try: () =>
				fs.mkdtempSync(
					path.join(settings.tempRoot ?? os.tmpdir(), `lrun.${process.pid}.`),
				),
			catch: (error) =>
				new InvocationFailure({
					message: `cannot create capture directory: ${String(error)}`,
					status: null,
					signal: null,
				}),
		}),
		(dir) =>
			Effect.sync(() => {
				try {
					fs.rmSync(dir, { recursive: true, force: true });
				} catch (error) {
					debugLog(`failed to remove ${dir}: ${String(error)}`);
				}
			}),
	);
}

/**
 * Open one output stream: the caller's path, or an owned file inside the capture directory.
 */
function openOutput(
	key: "stdout" | "stderr",
	callerPath: string | undefined,
	tempDir: string,
): Effect.Effect<OutputCapture, ArgumentError, Scope.Scope> {
	if (callerPath !== undefined) {
		return Effect.map(
			openScoped(callerPath, "w", key),
			(fd): OutputCapture => ({ fd }),
		);
	}
	const ownedPath = path.join(tempDir, key);
	return Effect.map(
		openScoped(ownedPath, "w", key),
		(fd): OutputCapture => ({ fd, ownedPath }),
	);
}

/**
 * Acquire all three stdio streams for the child.
 *
 * @effect Effect<Captures, ArgumentError | InvocationFailure, Scope>
 * @postcondition On scope close: all descriptors closed, the capture directory removed
 */
export function acquireCaptures(
	options: OptionSet,
	settings: Pick<InvocationSettings, "tempRoot">,
): Effect.Effect<Captures, ArgumentError | InvocationFailure, Scope.Scope> {
	return Effect.gen(function* () {
		const stdinPath = yield* pathOption(options, "stdin");
		const stdoutPath = yield* pathOption(options, "stdout");
		const stderrPath = yield* pathOption(options, "stderr");

		const tempDir = yield* scopedTempDir(settings);
		const stdin =
			stdinPath === undefined
				? "ignore"
				: yield* openScoped(stdinPath, "r", "stdin");
		const stdout = yield* openOutput("stdout", stdoutPath, tempDir);
		const stderr = yield* openOutput("stderr", stderrPath, tempDir);

		return { stdin, stdout, stderr } satisfies Captures;
	});
}

/**
 * Read at most `limit` bytes from the start of a file.
 *
 * The buffer is sized by the smaller of `limit` and the file size.
 *
 * @pure false (filesystem read)
 * @postcondition result.length ≤ min(limit, size)
 */
export function readPrefix(file: string, limit: number): Buffer {
	const fd = fs.openSync(file, "r");
	try {
		const length = Math.min(limit, fs.fstatSync(fd).size);
		const buffer = Buffer.alloc(length);
		let filled = 0;
		while (filled < length) {
			const bytesRead = fs.readSync(fd, buffer, filled, length - filled, filled);
			if (bytesRead === 0) {
				break;
			}
			filled += bytesRead;
		}
		return buffer.subarray(0, filled);
	} finally {
		fs.closeSync(fd);
	}
}

/**
 * Read an owned capture, or undefined when the caller redirected the stream.
 *
 * @effect Effect<Buffer | undefined, InvocationFailure>
 */
export function readCapture(
	capture: OutputCapture,
	limit: number,
): Effect.Effect<Buffer | undefined, InvocationFailure> {
	const { ownedPath } = capture;
	if (ownedPath === undefined) {
		return Effect.succeed(undefined);
	}
	return Effect.try({
		try: () => readPrefix(ownedPath, limit),
		catch: (error) =>
			new InvocationFailure({
				message: `cannot read capture ${ownedPath}: ${String(error)}`,
				status: null,
				signal: null,
			}),
	});
}
