// CHANGE: Command normalization and shell word splitting
// PURITY: CORE

import { describe, expect, it } from "vitest";

import {
	normalizeCommand,
	splitCommand,
} from "../../src/core/command.js";
import { ArgumentError } from "../../src/core/errors.js";
import { expectLeft, expectRight } from "../utils/either.js";

describe("splitCommand", () => {
	it("honors quotes", () => {
		expect(expectRight(splitCommand("echo 'hello world'"))).toEqual([
			"echo",
			"hello world",
		]);
		expect(expectRight(splitCommand(`sh -c 'echo "$A"'`))).toEqual([
			"sh",
			"-c",
			'echo "$A"',
		]);
	});

	it("keeps unquoted variable references literally", () => {
		expect(expectRight(splitCommand("echo $HOME"))).toEqual(["echo", "$HOME"]);
	});

	it("keeps operator characters inside the word they belong to", () => {
		expect(expectRight(splitCommand("echo a;b"))).toEqual(["echo", "a;b"]);
		expect(expectRight(splitCommand("echo a|b"))).toEqual(["echo", "a|b"]);
		expect(expectRight(splitCommand("echo 2>&1"))).toEqual(["echo", "2>&1"]);
	});

	it("keeps separated operators and globs as plain words", () => {
		expect(expectRight(splitCommand("true && ls *.txt"))).toEqual([
			"true",
			"&&",
			"ls",
			"*.txt",
		]);
	});

	it("keeps braced variable references intact inside double quotes", () => {
		expect(expectRight(splitCommand('sh -c "echo ${X}y"'))).toEqual([
			"sh",
			"-c",
			"echo ${X}y",
		]);
	});

	it("treats # inside a word as a literal character", () => {
		expect(expectRight(splitCommand("echo a#b"))).toEqual(["echo", "a#b"]);
	});
});

describe("normalizeCommand", () => {
	it("passes argv sequences through", () => {
		expect(expectRight(normalizeCommand(["ls", "-l"]))).toEqual(["ls", "-l"]);
	});

	it("splits strings", () => {
		expect(expectRight(normalizeCommand("  ls   -l "))).toEqual(["ls", "-l"]);
	});

	it.each([
		["null", null],
		["undefined", undefined],
		["an empty string", ""],
		["a blank string", "   "],
		["an empty sequence", []],
	])("rejects %s", (_label, command) => {
		const error = expectLeft(normalizeCommand(command));
		expect(error).toBeInstanceOf(ArgumentError);
		expect(error.message).toBe("command must not be empty");
	});
});
