// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces, or the APP façade
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// APP (Synchronous façade and builder)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run a program under lrun.
 *
 * @example
 * ```typescript
 * import { Runner, run } from "lrun-ts";
 *
 * const result = run("echo hello", { max_cpu_time: 1, network: false });
 * result.exitCode;            // 0
 * result.stdout?.toString();  // "hello\n"
 *
 * const runner = new Runner().maxMemory(2 ** 26).chdir("/tmp");
 * runner.run(["ls", "-l"]);
 * ```
 */
export {
	getOrThrow,
	isAvailable,
	merge,
	run,
	runEffect,
	runOrThrow,
} from "./app/run.js";
export { type MultiInput, Runner, type SingleInput } from "./app/runner.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE (Pure functions and immutable models)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type CommandInput,
	normalizeCommand,
	splitCommand,
} from "./core/command.js";
export {
	ArgumentError,
	ConfigError,
	DecodeError,
	InvocationFailure,
	NotAvailable,
	type RunError,
	TypeMismatch,
} from "./core/errors.js";
export {
	type ExceededLimit,
	type ExceedMatching,
	isClean,
	isCrashed,
	type RunResult,
} from "./core/models.js";
export { buildArguments, expandOptions } from "./core/options/expand.js";
export { mergeOptions, toMultiEntries } from "./core/options/merge.js";
export {
	type Cardinality,
	cardinalityOf,
	flagOf,
	isOptionName,
	type MultiOptionName,
	OPTION_NAMES,
	OPTION_REGISTRY,
	type OptionName,
	PASS_THROUGH_KEYS,
	type PassThroughKey,
	type SingleOptionName,
} from "./core/options/registry.js";
export type {
	MultiEntry,
	OptionPatch,
	OptionSet,
	OptionValue,
	Pair,
	Scalar,
	ScalarMap,
} from "./core/options/types.js";
export { classifyExceed } from "./core/report/exceed.js";
export { parseReport, type ReportFields } from "./core/report/parser.js";
export {
	DEFAULT_SETTINGS,
	type InvocationSettings,
	LRUN_BINARY,
	REPORT_FD,
	TRUNCATE_OUTPUT_LENGTH,
	withSettings,
} from "./core/types/settings.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL (Effects exposed for composition)
// ═══════════════════════════════════════════════════════════════════════════════

export { settingsFromEnv } from "./shell/config/env.js";
export {
	CONFIG_FILE_NAME,
	loadRunnerConfig,
	parseRunnerConfig,
	type RunnerConfig,
} from "./shell/config/loader.js";
export { invoke } from "./shell/invoke.js";
export { findExecutable, locateExecutable } from "./shell/locate.js";
