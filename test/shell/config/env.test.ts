// CHANGE: Settings derived from environment variables
// PURITY: CORE (env object passed explicitly)

import { describe, expect, it } from "vitest";

import { DEFAULT_SETTINGS } from "../../../src/core/types/settings.js";
import { settingsFromEnv } from "../../../src/shell/config/env.js";

describe("settingsFromEnv", () => {
	it("falls back to defaults for an empty environment", () => {
		expect(settingsFromEnv({})).toEqual(DEFAULT_SETTINGS);
	});

	it("reads every supported variable", () => {
		expect(
			settingsFromEnv({
				PATH: "/opt/lrun/bin:/usr/bin",
				LRUN_TS_BINARY: "lrun-dev",
				LRUN_TS_TRUNCATE: "128",
				LRUN_TS_EXCEED_MATCHING: "exact",
				LRUN_TS_TMPDIR: "/var/tmp",
				LRUN_TS_SEPARATOR: "1",
			}),
		).toEqual({
			binaryName: "lrun-dev",
			searchPath: "/opt/lrun/bin:/usr/bin",
			truncateLength: 128,
			exceedMatching: "exact",
			tempRoot: "/var/tmp",
			argumentSeparator: true,
		});
	});

	it("ignores malformed values", () => {
		const settings = settingsFromEnv({
			LRUN_TS_BINARY: "",
			LRUN_TS_TRUNCATE: "-5",
			LRUN_TS_EXCEED_MATCHING: "fuzzy",
			LRUN_TS_SEPARATOR: "yes",
		});
		expect(settings).toEqual(DEFAULT_SETTINGS);
	});

	it("overlays onto a custom base", () => {
		const base = { ...DEFAULT_SETTINGS, truncateLength: 1 };
		expect(settingsFromEnv({ LRUN_TS_SEPARATOR: "0" }, base)).toEqual(base);
	});
});
