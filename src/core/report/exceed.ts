// CHANGE: Classify lrun's EXCEED report field
// PURITY: CORE
// INVARIANT: "none" ↦ none; every other accepted value maps to exactly one limit
// COMPLEXITY: O(|value|)

import { Either } from "effect";
import { match } from "ts-pattern";

import { DecodeError } from "../errors.js";
import type { ExceededLimit, ExceedMatching } from "../models.js";

/** Literal EXCEED values lrun writes, by limit. */
const EXACT_VALUES: ReadonlyArray<readonly [string, ExceededLimit]> = [
	["CPU_TIME", "time"],
	["REAL_TIME", "time"],
	["TIME", "time"],
	["OUTPUT", "output"],
	["MEMORY", "memory"],
];

/** Substring needles, checked in order. */
const SUBSTRING_NEEDLES: ReadonlyArray<readonly [string, ExceededLimit]> = [
	["TIME", "time"],
	["OUTPUT", "output"],
	["MEMORY", "memory"],
];

function unexpected(value: string | undefined): DecodeError {
	return new DecodeError({
		message: `unexpected EXCEED returned by lrun: ${value ?? "<missing>"}`,
		value,
	});
}

/**
 * Map an EXCEED value to the limit it names.
 *
 * @param value - Raw EXCEED value, undefined when the report lacks it
 * @param matching - substring (case-insensitive containment) or exact
 * @returns Right(limit) or Left(DecodeError naming the value)
 *
 * @pure true
 * @example classifyExceed("REAL_TIME", "substring") → Right("time")
 */
export function classifyExceed(
	value: string | undefined,
	matching: ExceedMatching,
): Either.Either<ExceededLimit, DecodeError> {
	if (value === undefined) {
		return Either.left(unexpected(value));
	}
	if (value === "none") {
		return Either.right<ExceededLimit>("none");
	}
	const hit = match(matching)
		.with("exact", () => EXACT_VALUES.find(([literal]) => literal === value))
		.with("substring", () => {
			const upper = value.toUpperCase();
			return SUBSTRING_NEEDLES.find(([needle]) => upper.includes(needle));
		})
		.exhaustive();
	return hit === undefined
		? Either.left(unexpected(value))
		: Either.right(hit[1]);
}
