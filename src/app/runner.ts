// CHANGE: Immutable chainable builder over the merge/invoke pipeline
// PURITY: APP
// FORMAT THEOREM: ∀ r, p: r.where(p).options = merge(r.options, p) ∧ r.options unchanged
// INVARIANT: Every accessor name(v) ≡ where({ name: v })
// COMPLEXITY: O(|options| + |patch|) per where

import type { Effect } from "effect";

import type { CommandInput } from "../core/command.js";
import type { RunError } from "../core/errors.js";
import type { RunResult } from "../core/models.js";
import { mergeOptions } from "../core/options/merge.js";
import type {
	MultiOptionName,
	SingleOptionName,
} from "../core/options/registry.js";
import type {
	OptionPatch,
	OptionSet,
	OptionValue,
	Pair,
	Scalar,
	ScalarMap,
} from "../core/options/types.js";
import {
	type InvocationSettings,
	withSettings,
} from "../core/types/settings.js";
import { settingsFromEnv } from "../shell/config/env.js";
import { loadRunnerConfig } from "../shell/config/loader.js";
import { invoke } from "../shell/invoke.js";
import { getOrThrow, runOrThrow } from "./run.js";

/** Accepted input for a single-valued option; null removes it. */
export type SingleInput = Scalar | null;

/** Accepted input for an accumulating option; null removes every accumulated value. */
export type MultiInput =
	| Scalar
	| ReadonlyArray<Scalar | Pair>
	| ScalarMap
	| null;

/**
 * Runs many programs with the same lrun options.
 *
 * @example
 * ```ts
 * const runner = new Runner()
 *   .maxCpuTime(1)
 *   .tmpfs({ "/tmp": 2 ** 20 })
 *   .chdir("/tmp");
 * runner.options; // { max_cpu_time: 1, tmpfs: [["/tmp", 1048576]], chdir: "/tmp" }
 * runner.maxCpuTime(null).options; // { tmpfs: [["/tmp", 1048576]], chdir: "/tmp" }
 * runner.env({ A: "Hello" }).run(["sh", "-c", "echo $A"]).stdout?.toString(); // "Hello\n"
 * ```
 */
export class Runner {
	readonly options: OptionSet;
	readonly settings: InvocationSettings;

	/**
	 * @param options - Initial options, normalized through merge
	 * @param settings - Invocation settings; defaults come from the environment
	 * @throws TypeMismatch when options is not a mapping
	 */
	constructor(
		options: OptionPatch = {},
		settings: InvocationSettings = settingsFromEnv(),
	) {
		this.options = getOrThrow(mergeOptions(options));
		this.settings = settings;
	}

	/**
	 * Runner built from a JSON configuration file (settings + base options).
	 *
	 * @throws ConfigError | TypeMismatch
	 */
	static fromConfigFile(
		configPath?: string,
		base: InvocationSettings = settingsFromEnv(),
	): Runner {
		const config = runOrThrow(loadRunnerConfig(configPath));
		return new Runner(config.options, withSettings(base, config.settings));
	}

	/**
	 * New runner whose options are merge(this.options, patch).
	 *
	 * @throws TypeMismatch when patch is not a mapping
	 */
	where(patch: OptionPatch): Runner {
		const merged = getOrThrow(mergeOptions(this.options, patch));
		return new Runner(merged, this.settings);
	}

	/** New runner with settings overridden; options are kept. */
	withSettings(patch: Partial<InvocationSettings>): Runner {
		return new Runner(this.options, withSettings(this.settings, patch));
	}

	/** Effect form of run. */
	runEffect(command: CommandInput): Effect.Effect<RunResult, RunError> {
		return invoke(command, this.options, this.settings);
	}

	/**
	 * Run a command with this runner's options.
	 *
	 * @throws NotAvailable | ArgumentError | InvocationFailure | DecodeError
	 */
	run(command: CommandInput): RunResult {
		return runOrThrow(this.runEffect(command));
	}

	private single(name: SingleOptionName, value: SingleInput): Runner {
		return this.where({ [name]: value });
	}

	private multi(name: MultiOptionName, value: MultiInput): Runner {
		return this.where({ [name]: value });
	}

	private passThrough(name: string, value: OptionValue | null): Runner {
		return this.where({ [name]: value });
	}

	stdin(path: string | null): Runner {
		return this.passThrough("stdin", path);
	}
	stdout(path: string | null): Runner {
		return this.passThrough("stdout", path);
	}
	stderr(path: string | null): Runner {
		return this.passThrough("stderr", path);
	}
	truncate(bytes: number | null): Runner {
		return this.passThrough("truncate", bytes);
	}

	maxCpuTime(value: SingleInput): Runner {
		return this.single("max_cpu_time", value);
	}
	maxRealTime(value: SingleInput): Runner {
		return this.single("max_real_time", value);
	}
	maxMemory(value: SingleInput): Runner {
		return this.single("max_memory", value);
	}
	maxOutput(value: SingleInput): Runner {
		return this.single("max_output", value);
	}
	maxNprocess(value: SingleInput): Runner {
		return this.single("max_nprocess", value);
	}
	maxRtprio(value: SingleInput): Runner {
		return this.single("max_rtprio", value);
	}
	maxNfile(value: SingleInput): Runner {
		return this.single("max_nfile", value);
	}
	maxStack(value: SingleInput): Runner {
		return this.single("max_stack", value);
	}
	isolateProcess(value: SingleInput): Runner {
		return this.single("isolate_process", value);
	}
	basicDevices(value: SingleInput): Runner {
		return this.single("basic_devices", value);
	}
	resetEnv(value: SingleInput): Runner {
		return this.single("reset_env", value);
	}
	network(value: SingleInput): Runner {
		return this.single("network", value);
	}
	chroot(value: SingleInput): Runner {
		return this.single("chroot", value);
	}
	chdir(value: SingleInput): Runner {
		return this.single("chdir", value);
	}
	nice(value: SingleInput): Runner {
		return this.single("nice", value);
	}
	umask(value: SingleInput): Runner {
		return this.single("umask", value);
	}
	uid(value: SingleInput): Runner {
		return this.single("uid", value);
	}
	gid(value: SingleInput): Runner {
		return this.single("gid", value);
	}
	interval(value: SingleInput): Runner {
		return this.single("interval", value);
	}
	cgname(value: SingleInput): Runner {
		return this.single("cgname", value);
	}

	bindfs(value: MultiInput): Runner {
		return this.multi("bindfs", value);
	}
	cgroupOption(value: MultiInput): Runner {
		return this.multi("cgroup_option", value);
	}
	tmpfs(value: MultiInput): Runner {
		return this.multi("tmpfs", value);
	}
	env(value: MultiInput): Runner {
		return this.multi("env", value);
	}
	fd(value: MultiInput): Runner {
		return this.multi("fd", value);
	}
	group(value: MultiInput): Runner {
		return this.multi("group", value);
	}
	cmd(value: MultiInput): Runner {
		return this.multi("cmd", value);
	}
}
