// CHANGE: JSON configuration parsing and loading
// PURITY: SHELL (temp files)

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigError } from "../../../src/core/errors.js";
import {
	loadRunnerConfig,
	parseRunnerConfig,
} from "../../../src/shell/config/loader.js";
import { expectLeft, expectRight } from "../../utils/either.js";

describe("parseRunnerConfig", () => {
	it("reads settings and options", () => {
		const config = expectRight(
			parseRunnerConfig(
				{
					binary: "lrun-dev",
					truncate: 64,
					exceedMatching: "exact",
					separator: true,
					options: {
						max_cpu_time: 1,
						network: false,
						env: { LANG: "C" },
						bindfs: [["/srv/a", "/srv/b"]],
						fd: [3, 4],
					},
				},
				"lrun.config.json",
			),
		);
		expect(config.settings).toEqual({
			binaryName: "lrun-dev",
			truncateLength: 64,
			exceedMatching: "exact",
			argumentSeparator: true,
			tempRoot: undefined,
		});
		expect(config.options).toEqual({
			max_cpu_time: 1,
			network: false,
			env: { LANG: "C" },
			bindfs: [["/srv/a", "/srv/b"]],
			fd: [3, 4],
		});
	});

	it("returns empty options when the key is absent", () => {
		expect(expectRight(parseRunnerConfig({}, "c.json")).options).toEqual({});
	});

	it("ignores settings of the wrong type", () => {
		const config = expectRight(
			parseRunnerConfig({ truncate: -1, exceedMatching: "fuzzy" }, "c.json"),
		);
		expect(config.settings.truncateLength).toBeUndefined();
		expect(config.settings.exceedMatching).toBeUndefined();
	});

	it("rejects documents that are not objects", () => {
		const error = expectLeft(parseRunnerConfig([1], "c.json"));
		expect(error).toBeInstanceOf(ConfigError);
		expect(error.message).toBe("configuration must be a JSON object");
		expect(error.path).toBe("c.json");
	});

	it("rejects unsupported option values", () => {
		expect(
			expectLeft(parseRunnerConfig({ options: { env: { A: null } } }, "c.json"))
				.message,
		).toBe("option env has an unsupported value");
		expect(
			expectLeft(parseRunnerConfig({ options: { fd: [[1, 2, 3]] } }, "c.json"))
				.message,
		).toBe("option fd has an unsupported value");
		expect(
			expectLeft(parseRunnerConfig({ options: "uid=1" }, "c.json")).message,
		).toBe("options must be an object");
	});
});

describe("loadRunnerConfig", () => {
	let dir = "";

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "lrun-ts-config-"));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("loads a file from disk", () => {
		const file = path.join(dir, "lrun.config.json");
		fs.writeFileSync(file, JSON.stringify({ options: { uid: 1000 } }));
		const config = Effect.runSync(loadRunnerConfig(file));
		expect(config.options).toEqual({ uid: 1000 });
	});

	it("fails with ConfigError for invalid JSON", () => {
		const file = path.join(dir, "broken.json");
		fs.writeFileSync(file, "{ nope");
		const error = expectLeft(Effect.runSync(Effect.either(loadRunnerConfig(file))));
		expect(error).toBeInstanceOf(ConfigError);
		expect(error.path).toBe(file);
		expect(error.message).toMatch(/^cannot read configuration: SyntaxError/);
	});

	it("fails with ConfigError for a missing file", () => {
		const file = path.join(dir, "missing.json");
		const error = expectLeft(Effect.runSync(Effect.either(loadRunnerConfig(file))));
		expect(error.message).toMatch(/ENOENT/);
	});
});
