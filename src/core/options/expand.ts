// CHANGE: Render a normalized option set as lrun command-line tokens
// PURITY: CORE
// FORMAT THEOREM:
//   expand(S) = concat_{(k,v) ∈ S, k ∈ Registry} render(k, v)
//   render(k, [e_1..e_n]) = concat_i [flag(k), ...tokens(e_i)]   (multi)
//   render(k, s)          = [flag(k), String(s)]                   (single)
// INVARIANT: Keys outside the registry contribute zero tokens
// COMPLEXITY: O(Σ|values|)

import { Either } from "effect";

import { ArgumentError } from "../errors.js";
import type { OptionName } from "./registry.js";
import { cardinalityOf, flagOf, isOptionName } from "./registry.js";
import type { MultiEntry, OptionSet, OptionValue } from "./types.js";
import { isEntryList, isPair, isScalar } from "./types.js";

type Tokens = ReadonlyArray<string>;

function renderEntry(
	name: OptionName,
	entry: MultiEntry,
): Either.Either<Tokens, ArgumentError> {
	if (isScalar(entry)) {
		return Either.right([flagOf(name), String(entry)]);
	}
	if (isPair(entry)) {
		return Either.right([flagOf(name), String(entry[0]), String(entry[1])]);
	}
	return Either.left(
		new ArgumentError({
			message: `option ${name} holds an element that is neither a scalar nor a pair`,
		}),
	);
}

function renderMulti(
	name: OptionName,
	value: OptionValue,
): Either.Either<Tokens, ArgumentError> {
	if (!isEntryList(value)) {
		return Either.left(
			new ArgumentError({
				message: `option ${name} accumulates values and must hold a sequence; merge the options first`,
			}),
		);
	}
	return Either.map(
		Either.all(value.map((entry) => renderEntry(name, entry))),
		(parts) => parts.flat(),
	);
}

function renderSingle(
	name: OptionName,
	value: OptionValue,
): Either.Either<Tokens, ArgumentError> {
	return isScalar(value)
		? Either.right([flagOf(name), String(value)])
		: Either.left(
				new ArgumentError({
					message: `option ${name} takes a single value`,
				}),
			);
}

/**
 * Expand a normalized option set into flag tokens.
 *
 * @param options - Output of mergeOptions
 * @returns Right(tokens) or Left(ArgumentError) when the set is not well formed
 *
 * @pure true
 * @invariant Only registry names produce tokens; order follows the set's iteration order
 * @complexity O(Σ|values|)
 *
 * @example
 * ```ts
 * expandOptions({ chdir: "/tmp", bindfs: [["/a", "/b"]], fd: [2, 3] });
 * // Right(["--chdir", "/tmp", "--bindfs", "/a", "/b", "--fd", "2", "--fd", "3"])
 * ```
 */
export function expandOptions(
	options: OptionSet,
): Either.Either<Tokens, ArgumentError> {
	if (
		typeof options !== "object" ||
		options === null ||
		Array.isArray(options)
	) {
		return Either.left(
			new ArgumentError({ message: "expect options to be a mapping" }),
		);
	}

	const rendered = Object.entries(options).flatMap(([key, value]) => {
		if (!isOptionName(key)) {
			return [];
		}
		return [
			cardinalityOf(key) === "multi"
				? renderMulti(key, value)
				: renderSingle(key, value),
		];
	});

	return Either.map(Either.all(rendered), (parts) => parts.flat());
}

/**
 * Full argument vector handed to lrun: flags, an optional `--`, then the command.
 *
 * @pure true
 * @precondition command.length > 0
 * @complexity O(|flags| + |command|)
 */
export function buildArguments(
	options: OptionSet,
	command: ReadonlyArray<string>,
	separator: boolean,
): Either.Either<Tokens, ArgumentError> {
	return Either.map(expandOptions(options), (flags) => [
		...flags,
		...(separator ? ["--"] : []),
		...command,
	]);
}
