// CHANGE: Immutable fold of partial option sets with override/append/delete semantics
// PURITY: CORE
// FORMAT THEOREM:
//   merge() = {} ∧ merge(A) = normalize(A)
//   merge(merge(A, B)) = merge(A, B)
//   merge(A, B, C) = merge(merge(A, B), C)
// INVARIANT: Inputs are never mutated; the result never stores null
// INVARIANT: The result and every accumulated multi sequence are frozen
// COMPLEXITY: O(Σ|partial_i| + Σ|multi values|)

import { Either } from "effect";

import { TypeMismatch } from "../errors.js";
import { cardinalityOf } from "./registry.js";
import type {
	MultiEntry,
	OptionPatch,
	OptionSet,
	OptionValue,
} from "./types.js";
import { isEntryList, isScalar } from "./types.js";

/**
 * Runtime shape check for a partial coming from untyped callers.
 *
 * @pure true
 * @invariant arrays, strings, numbers and booleans are not mappings
 */
function isMapping(partial: OptionPatch): boolean {
	return (
		typeof partial === "object" &&
		partial !== null &&
		!Array.isArray(partial)
	);
}

/**
 * Normalize a multi option value into a flat sequence.
 *
 * - scalar → [scalar]
 * - mapping → entries as [key, value] pairs, in the mapping's iteration order
 * - sequence → used as is
 *
 * @pure true
 * @complexity O(n) where n = |value|
 */
export function toMultiEntries(value: OptionValue): ReadonlyArray<MultiEntry> {
	if (isScalar(value)) {
		return [value];
	}
	if (isEntryList(value)) {
		return value;
	}
	return Object.entries(value).map(
		([key, entry]): MultiEntry => [key, entry],
	);
}

/**
 * Apply one partial onto a local accumulator.
 *
 * PURITY: CORE (mutation is confined to the accumulator owned by mergeOptions)
 */
function applyPatch(acc: Map<string, OptionValue>, patch: OptionPatch): void {
	for (const [key, value] of Object.entries(patch)) {
		if (value === undefined) {
			continue;
		}
		if (value === null) {
			acc.delete(key);
			continue;
		}
		if (cardinalityOf(key) === "multi") {
			const previous = acc.get(key);
			const stored = previous === undefined ? [] : toMultiEntries(previous);
			const appended = [...stored, ...toMultiEntries(value)];
			acc.set(key, Object.freeze(appended));
			continue;
		}
		acc.set(key, value);
	}
}

/**
 * Merge partial option sets left to right.
 *
 * @param partials - Option sets; `null`/`undefined` entries are skipped
 * @returns Right(merged set) or Left(TypeMismatch) for the first non-mapping partial
 *
 * @pure true
 * @invariant result has no key whose value is null
 * @complexity O(Σ|partial_i|)
 *
 * @example
 * ```ts
 * mergeOptions({ fd: [4, 6] }, { fd: 5 }, { fd: 7 });
 * // Right({ fd: [4, 6, 5, 7] })
 * mergeOptions({ uid: 1000 }, { uid: null });
 * // Right({})
 * ```
 */
export function mergeOptions(
	...partials: ReadonlyArray<OptionPatch | null | undefined>
): Either.Either<OptionSet, TypeMismatch> {
	const present = partials.flatMap((partial, position) =>
		partial === null || partial === undefined ? [] : [{ partial, position }],
	);

	const offending = present.find(({ partial }) => !isMapping(partial));
	if (offending !== undefined) {
		return Either.left(
			new TypeMismatch({
				message: `options should be a mapping (partial #${offending.position} is ${describeShape(offending.partial)})`,
				position: offending.position,
			}),
		);
	}

	const acc = new Map<string, OptionValue>();
	for (const { partial } of present) {
		applyPatch(acc, partial);
	}
	return Either.right(Object.freeze(Object.fromEntries(acc)));
}

/**
 * Human-readable shape of a rejected partial.
 *
 * @pure true
 */
function describeShape(partial: OptionPatch): string {
	return Array.isArray(partial) ? "an array" : `a ${typeof partial}`;
}
