// CHANGE: Deterministic and property-based specs for option merging
// PURITY: CORE
// FORMAT THEOREM: ∀ A, B, C: merge(merge(A, B)) = merge(A, B) ∧ merge(merge(A, B), C) = merge(A, B, C)

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { TypeMismatch } from "../../../src/core/errors.js";
import {
	mergeOptions,
	toMultiEntries,
} from "../../../src/core/options/merge.js";
import type {
	OptionPatch,
	OptionValue,
} from "../../../src/core/options/types.js";
import { expectLeft, expectRight } from "../../utils/either.js";

const merged = (...partials: ReadonlyArray<OptionPatch | null | undefined>) =>
	expectRight(mergeOptions(...partials));

describe("mergeOptions", () => {
	it("returns an empty set without partials", () => {
		expect(merged()).toEqual({});
		expect(merged({})).toEqual({});
	});

	it("skips absent partials", () => {
		expect(merged(null, { uid: 1 }, undefined)).toEqual({ uid: 1 });
	});

	it("lets the last single value win", () => {
		expect(merged({ uid: 1 }, { uid: 3 }, { uid: 4 })).toEqual({ uid: 4 });
	});

	it("appends multi values in merge order", () => {
		expect(merged({ fd: [4, 6] }, { fd: 5 }, { fd: 7 })).toEqual({
			fd: [4, 6, 5, 7],
		});
	});

	it("flattens mappings of multi options into pairs", () => {
		expect(
			merged({ bindfs: { "/a": "/b" } }, { bindfs: { "/c": "/d" } }),
		).toEqual({
			bindfs: [
				["/a", "/b"],
				["/c", "/d"],
			],
		});
	});

	it("keeps repeated keys of multi mappings as separate pairs", () => {
		expect(merged({ env: { A: "1" } }, { env: { A: "2" } })).toEqual({
			env: [
				["A", "1"],
				["A", "2"],
			],
		});
	});

	it("removes keys set to null", () => {
		expect(merged({ uid: 1000 }, { uid: null })).toEqual({});
		expect(merged({ fd: [4, 5, 6] }, { fd: 7 }, { fd: null })).toEqual({});
	});

	it("treats null for an absent key as a no-op", () => {
		expect(merged({ uid: 1 }, { gid: null })).toEqual({ uid: 1 });
	});

	it("leaves keys with undefined values untouched", () => {
		expect(merged({ uid: 1 }, { uid: undefined })).toEqual({ uid: 1 });
	});

	it("overwrites pass-through and unknown keys verbatim", () => {
		expect(
			merged({ stdout: "/tmp/a", custom: [1] }, { stdout: "/tmp/b", custom: "x" }),
		).toEqual({ stdout: "/tmp/b", custom: "x" });
	});

	it("starts a fresh sequence after deleting a multi option", () => {
		expect(merged({ fd: 3 }, { fd: null }, { fd: 4 })).toEqual({ fd: [4] });
	});

	it("does not mutate its inputs and freezes the result", () => {
		const first = { fd: [4] };
		const second = { fd: 5, uid: 2 };
		const result = merged(first, second);
		expect(first).toEqual({ fd: [4] });
		expect(second).toEqual({ fd: 5, uid: 2 });
		expect(Object.isFrozen(result)).toBe(true);
		expect(Object.isFrozen(result["fd"])).toBe(true);
	});

	it("rejects a non-mapping partial with its position", () => {
		const notAMapping: OptionPatch = JSON.parse("[1, 2]");
		const error = expectLeft(mergeOptions({ uid: 1 }, null, notAMapping));
		expect(error).toBeInstanceOf(TypeMismatch);
		expect(error.position).toBe(2);
		expect(error.message).toBe(
			"options should be a mapping (partial #2 is an array)",
		);
	});

	it("describes scalar partials by their type", () => {
		const scalar: OptionPatch = JSON.parse('"fd"');
		expect(expectLeft(mergeOptions(scalar)).message).toBe(
			"options should be a mapping (partial #0 is a string)",
		);
	});
});

describe("toMultiEntries", () => {
	it("wraps scalars, keeps sequences and turns mappings into pairs", () => {
		expect(toMultiEntries(3)).toEqual([3]);
		expect(toMultiEntries([1, ["a", "b"]])).toEqual([1, ["a", "b"]]);
		expect(toMultiEntries({ A: 1, B: true })).toEqual([
			["A", 1],
			["B", true],
		]);
	});
});

const keyArb = fc.constantFrom("uid", "chdir", "fd", "env", "bindfs", "stdout", "custom");
const scalarArb = fc.oneof(fc.integer(), fc.string(), fc.boolean());
const valueArb: fc.Arbitrary<OptionValue | null> = fc.oneof(
	scalarArb,
	fc.array(scalarArb, { maxLength: 3 }),
	fc.dictionary(fc.constantFrom("A", "B", "/a"), scalarArb),
	fc.constant(null),
);
const patchArb: fc.Arbitrary<OptionPatch> = fc.dictionary(keyArb, valueArb);

describe("mergeOptions properties", () => {
	it("is idempotent on its own output", () => {
		fc.assert(
			fc.property(patchArb, patchArb, (a, b) => {
				const once = merged(a, b);
				expect(merged(once)).toEqual(once);
			}),
		);
	});

	it("folds left to right: merge(merge(A, B), C) = merge(A, B, C)", () => {
		fc.assert(
			fc.property(patchArb, patchArb, patchArb, (a, b, c) => {
				expect(merged(merged(a, b), c)).toEqual(merged(a, b, c));
			}),
		);
	});

	it("never stores null", () => {
		fc.assert(
			fc.property(fc.array(patchArb, { maxLength: 4 }), (patches) => {
				expect(Object.values(merged(...patches))).not.toContain(null);
			}),
		);
	});
});
