// CHANGE: Narrowing helpers for Either results in tests
// PURITY: CORE (throws only to fail the surrounding test)

import { Either } from "effect";

/** Value of a Right, failing the test on Left. */
export function expectRight<A, E>(either: Either.Either<A, E>): A {
	if (Either.isLeft(either)) {
		throw new Error(`expected Right, got Left: ${String(either.left)}`);
	}
	return either.right;
}

/** Error of a Left, failing the test on Right. */
export function expectLeft<A, E>(either: Either.Either<A, E>): E {
	if (Either.isRight(either)) {
		throw new Error(`expected Left, got Right: ${JSON.stringify(either.right)}`);
	}
	return either.left;
}
