// CHANGE: Option value and option set shapes
// PURITY: CORE
// INVARIANT: A stored OptionSet never holds the deletion sentinel (null)
// COMPLEXITY: O(1)

/** A single option value as lrun receives it on the command line. */
export type Scalar = string | number | boolean;

/** Two-token element of a multi option, e.g. a bindfs `[target, source]` pair. */
export type Pair = readonly [Scalar, Scalar];

/** One accumulated element of a multi option. */
export type MultiEntry = Scalar | Pair;

/** Mapping input for multi options; flattened to pairs in iteration order on merge. */
export type ScalarMap = { readonly [key: string]: Scalar };

/**
 * Any value an option may hold.
 *
 * After merging, multi options always hold a `ReadonlyArray<MultiEntry>`.
 */
export type OptionValue = Scalar | ReadonlyArray<MultiEntry> | ScalarMap;

/**
 * Normalized option set: name → value, iterated in insertion order.
 *
 * @invariant ∀ k: set[k] !== null ∧ set[k] !== undefined
 */
export type OptionSet = { readonly [name: string]: OptionValue };

/**
 * Partial option set passed to merge.
 *
 * @remarks
 * - `null` removes the key from the accumulated set
 * - `undefined` leaves the accumulated set untouched
 */
export type OptionPatch = {
	readonly [name: string]: OptionValue | null | undefined;
};

/**
 * Type guard for a single pair element.
 *
 * @pure true
 * @complexity O(1)
 */
export function isPair(entry: MultiEntry | OptionValue): entry is Pair {
	return (
		Array.isArray(entry) &&
		entry.length === 2 &&
		entry.every((part) => isScalar(part))
	);
}

/**
 * Type guard for the normalized multi representation.
 *
 * @pure true
 * @complexity O(1)
 */
export function isEntryList(
	value: OptionValue,
): value is ReadonlyArray<MultiEntry> {
	return Array.isArray(value);
}

/**
 * Type guard for scalars.
 *
 * @pure true
 * @complexity O(1)
 */
export function isScalar(
	value: OptionValue | MultiEntry | Scalar | null | undefined,
): value is Scalar {
	return (
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "boolean"
	);
}
