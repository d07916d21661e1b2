// CHANGE: Materialize a stand-in lrun executable inside an isolated temp directory
// PURITY: SHELL (writes scripts, removes directories)
// INVARIANT: Each fake lives in its own directory, so the locate cache never mixes two fakes
// COMPLEXITY: O(1) filesystem calls

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import {
	DEFAULT_SETTINGS,
	type InvocationSettings,
} from "../../src/core/types/settings.js";

/**
 * Report values a fake writes on descriptor 3.
 */
export interface FakeReport {
	readonly memory?: number;
	readonly cputime?: number;
	readonly exceed?: string;
	readonly exitcode?: number;
	readonly signaled?: 0 | 1;
	readonly termsig?: number;
}

/**
 * A fake lrun installation.
 *
 * Postconditions:
 * - settings.searchPath contains only binDir
 * - settings.tempRoot is an empty directory owned by this fake
 * - cleanup() removes everything
 */
export interface FakeLrun {
	readonly binDir: string;
	readonly tempRoot: string;
	readonly workDir: string;
	readonly settings: InvocationSettings;
	readonly cleanup: () => void;
}

/**
 * Shell statement writing a complete report to descriptor 3.
 *
 * @example reportStatement({ exceed: "MEMORY" }) → `printf '...EXCEED MEMORY\n...' >&3`
 */
export function reportStatement(report: FakeReport = {}): string {
	const lines = [
		`MEMORY ${report.memory ?? 262144}`,
		`CPUTIME ${report.cputime ?? 0.002}`,
		`EXCEED ${report.exceed ?? "none"}`,
		`EXITCODE ${report.exitcode ?? 0}`,
		`SIGNALED ${report.signaled ?? 0}`,
		`TERMSIG ${report.termsig ?? 0}`,
	];
	return `printf '${lines.join("\\n")}\\n' >&3`;
}

/**
 * Create a fake `lrun` whose body is the given shell script.
 *
 * @param body /bin/sh statements; "$@" holds the arguments built for lrun
 */
export function createFakeLrun(body: string): FakeLrun {
	const root = fs.mkdtempSync(path.join(os.tmpdir(), "lrun-ts-test-"));
	const binDir = path.join(root, "bin");
	const tempRoot = path.join(root, "captures");
	const workDir = path.join(root, "work");
	for (const dir of [binDir, tempRoot, workDir]) {
		fs.mkdirSync(dir);
	}
	const script = path.join(binDir, "lrun");
	fs.writeFileSync(script, `#!/bin/sh\n${body}\n`, { mode: 0o755 });

	return {
		binDir,
		tempRoot,
		workDir,
		settings: { ...DEFAULT_SETTINGS, searchPath: binDir, tempRoot },
		cleanup: (): void => {
			fs.rmSync(root, { recursive: true, force: true });
		},
	};
}
