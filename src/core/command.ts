// CHANGE: Normalize the command to run inside lrun into an argv token list
// PURITY: CORE
// INVARIANT: ∀ ok result: tokens.length > 0
// COMPLEXITY: O(|command|)

import { Either } from "effect";
import { split } from "shlex";

import { ArgumentError } from "./errors.js";

/** What callers may pass as the command. */
export type CommandInput = string | ReadonlyArray<string> | null | undefined;

/**
 * Split a command string with POSIX shell word rules.
 *
 * Only quoting and whitespace are interpreted: `$NAME`, `${NAME}`, `#`, globs and
 * operator characters stay literal inside the words they belong to.
 *
 * @pure true
 * @example splitCommand(`sh -c 'echo "$A"'`) → Right(["sh", "-c", 'echo "$A"'])
 * @example splitCommand("echo 2>&1") → Right(["echo", "2>&1"])
 */
export function splitCommand(
	command: string,
): Either.Either<ReadonlyArray<string>, ArgumentError> {
	return Either.try({
		try: () => split(command),
		catch: (error) =>
			new ArgumentError({
				message: `cannot split command: ${String(error)}`,
			}),
	});
}

/**
 * Turn a command input into argv tokens, rejecting empty commands.
 *
 * @pure true
 * @invariant Right(tokens) → tokens.length > 0
 * @complexity O(|command|)
 */
export function normalizeCommand(
	command: CommandInput,
): Either.Either<ReadonlyArray<string>, ArgumentError> {
	const empty = new ArgumentError({ message: "command must not be empty" });
	if (command === null || command === undefined) {
		return Either.left(empty);
	}
	const tokens =
		typeof command === "string"
			? splitCommand(command)
			: Either.right(command);
	return Either.flatMap(tokens, (argv) =>
		argv.length === 0 ? Either.left(empty) : Either.right(argv),
	);
}
