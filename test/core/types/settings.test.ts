// CHANGE: Settings overlay
// PURITY: CORE

import { describe, expect, it } from "vitest";

import {
	DEFAULT_SETTINGS,
	withSettings,
} from "../../../src/core/types/settings.js";

describe("withSettings", () => {
	it("overrides defined fields and ignores undefined ones", () => {
		expect(
			withSettings(DEFAULT_SETTINGS, {
				truncateLength: 10,
				binaryName: undefined,
			}),
		).toEqual({ ...DEFAULT_SETTINGS, truncateLength: 10 });
	});

	it("defaults to the lrun binary, 4096 bytes and substring matching", () => {
		expect(DEFAULT_SETTINGS.binaryName).toBe("lrun");
		expect(DEFAULT_SETTINGS.truncateLength).toBe(4096);
		expect(DEFAULT_SETTINGS.exceedMatching).toBe("substring");
		expect(DEFAULT_SETTINGS.argumentSeparator).toBe(false);
	});
});
