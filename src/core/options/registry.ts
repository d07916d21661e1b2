// CHANGE: Static registry of lrun options and their cardinality
// PURITY: CORE
// INVARIANT: The registry is closed; names outside it are "unknown" and never become flags
// COMPLEXITY: O(1) lookup

/**
 * Whether an option keeps one value or accumulates values across merges.
 */
export type Cardinality = "single" | "multi";

/**
 * Every option lrun accepts, in the order lrun documents them.
 *
 * @invariant ∀ name: OPTION_REGISTRY[name] ∈ {"single", "multi"}
 */
export const OPTION_REGISTRY = {
	max_cpu_time: "single",
	max_real_time: "single",
	max_memory: "single",
	max_output: "single",
	max_nprocess: "single",
	max_rtprio: "single",
	max_nfile: "single",
	max_stack: "single",
	isolate_process: "single",
	basic_devices: "single",
	reset_env: "single",
	network: "single",
	chroot: "single",
	chdir: "single",
	nice: "single",
	umask: "single",
	uid: "single",
	gid: "single",
	interval: "single",
	cgname: "single",
	bindfs: "multi",
	cgroup_option: "multi",
	tmpfs: "multi",
	env: "multi",
	fd: "multi",
	group: "multi",
	cmd: "multi",
} as const satisfies Readonly<Record<string, Cardinality>>;

export type OptionName = keyof typeof OPTION_REGISTRY;

/** Names whose cardinality is `multi`. */
export type MultiOptionName = {
	readonly [K in OptionName]: (typeof OPTION_REGISTRY)[K] extends "multi"
		? K
		: never;
}[OptionName];

/** Names whose cardinality is `single`. */
export type SingleOptionName = Exclude<OptionName, MultiOptionName>;

/**
 * Keys the supervisor consumes itself; they survive merging but never reach lrun.
 */
export const PASS_THROUGH_KEYS = [
	"stdin",
	"stdout",
	"stderr",
	"truncate",
] as const;

export type PassThroughKey = (typeof PASS_THROUGH_KEYS)[number];

/** Option names in registry order. */
export const OPTION_NAMES: ReadonlyArray<OptionName> = Object.keys(
	OPTION_REGISTRY,
).filter(isOptionName);

/**
 * Type guard for registry membership.
 *
 * @pure true
 * @complexity O(1)
 */
export function isOptionName(name: string): name is OptionName {
	return Object.hasOwn(OPTION_REGISTRY, name);
}

/**
 * Cardinality of an option name, or "unknown" when the registry does not list it.
 *
 * @pure true
 * @invariant cardinalityOf(n) === "unknown" ↔ ¬isOptionName(n)
 * @complexity O(1)
 */
export function cardinalityOf(name: string): Cardinality | "unknown" {
	return isOptionName(name) ? OPTION_REGISTRY[name] : "unknown";
}

/**
 * Command-line flag for an option: underscores become hyphens, prefixed with `--`.
 *
 * @pure true
 * @example flagOf("max_cpu_time") === "--max-cpu-time"
 */
export function flagOf(name: OptionName): string {
	return `--${name.replaceAll("_", "-")}`;
}
