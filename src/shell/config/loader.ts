// CHANGE: Load runner defaults (settings and base options) from a JSON file
// PURITY: SHELL (reads the filesystem)
// EFFECT: Effect<RunnerConfig, ConfigError>
// INVARIANT: Only values of the documented shapes are accepted; anything else is a ConfigError
// COMPLEXITY: O(|file|)

import { Effect, Either } from "effect";

import { ConfigError } from "../../core/errors.js";
import type { ExceedMatching } from "../../core/models.js";
import type {
	MultiEntry,
	OptionPatch,
	OptionValue,
	Scalar,
} from "../../core/options/types.js";
import type { InvocationSettings } from "../../core/types/settings.js";
import { fs, path } from "../../utils/node-mods.js";

/** Default file name looked up in the working directory. */
export const CONFIG_FILE_NAME = "lrun.config.json";

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

/**
 * Parsed configuration file.
 *
 * @property settings Overrides for InvocationSettings
 * @property options Base option patch merged before any per-call options
 */
export interface RunnerConfig {
	readonly settings: Partial<InvocationSettings>;
	readonly options: OptionPatch;
}

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isJSONArray(value: JSONValue): value is ReadonlyArray<JSONValue> {
	return Array.isArray(value);
}

function isJSONScalar(value: JSONValue): value is Scalar {
	return (
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "boolean"
	);
}

/**
 * Convert a JSON array element into a multi entry.
 *
 * @returns null when the element is neither a scalar nor a two-scalar array
 */
function toMultiEntry(value: JSONValue): MultiEntry | null {
	if (isJSONScalar(value)) {
		return value;
	}
	if (isJSONArray(value) && value.length === 2) {
		const [first, second] = value;
		if (
			first !== undefined &&
			second !== undefined &&
			isJSONScalar(first) &&
			isJSONScalar(second)
		) {
			return [first, second];
		}
	}
	return null;
}

/**
 * Validate one option value from the file.
 *
 * @returns Right(value) for scalars, arrays of scalars/pairs, and mappings of scalars
 */
function toOptionValue(
	key: string,
	value: JSONValue,
	file: string,
): Either.Either<OptionValue, ConfigError> {
	const invalid = Either.left(
		new ConfigError({
			message: `option ${key} has an unsupported value`,
			path: file,
		}),
	);
	if (isJSONScalar(value)) {
		return Either.right(value);
	}
	if (isJSONArray(value)) {
		const entries = value.map(toMultiEntry);
		return entries.every((entry): entry is MultiEntry => entry !== null)
			? Either.right(entries)
			: invalid;
	}
	if (isJSONObject(value)) {
		const pairs = Object.entries(value);
		const scalars = pairs.filter(
			(pair): pair is [string, Scalar] => isJSONScalar(pair[1]),
		);
		return scalars.length === pairs.length
			? Either.right(Object.fromEntries(scalars))
			: invalid;
	}
	return invalid;
}

function toOptions(
	value: JSONValue | undefined,
	file: string,
): Either.Either<OptionPatch, ConfigError> {
	if (value === undefined) {
		return Either.right({});
	}
	if (!isJSONObject(value)) {
		return Either.left(
			new ConfigError({ message: "options must be an object", path: file }),
		);
	}
	return Either.map(
		Either.all(
			Object.entries(value).map(([key, entry]) =>
				Either.map(
					toOptionValue(key, entry, file),
					(checked): readonly [string, OptionValue] => [key, checked],
				),
			),
		),
		(entries): OptionPatch => Object.fromEntries(entries),
	);
}

function optionalString(value: JSONValue | undefined): string | undefined {
	return typeof value === "string" && value.length > 0 ? value : undefined;
}

function optionalTruncate(value: JSONValue | undefined): number | undefined {
	return typeof value === "number" && Number.isInteger(value) && value >= 0
		? value
		: undefined;
}

function optionalMatching(
	value: JSONValue | undefined,
): ExceedMatching | undefined {
	return value === "substring" || value === "exact" ? value : undefined;
}

function optionalBoolean(value: JSONValue | undefined): boolean | undefined {
	return typeof value === "boolean" ? value : undefined;
}

/**
 * Interpret a parsed configuration document.
 *
 * @pure true
 * @returns Right(config) or Left(ConfigError) when the document or its options are malformed
 */
export function parseRunnerConfig(
	document: JSONValue,
	file: string,
): Either.Either<RunnerConfig, ConfigError> {
	if (!isJSONObject(document)) {
		return Either.left(
			new ConfigError({
				message: "configuration must be a JSON object",
				path: file,
			}),
		);
	}
	return Either.map(
		toOptions(document["options"], file),
		(options): RunnerConfig => ({
			settings: {
				binaryName: optionalString(document["binary"]),
				truncateLength: optionalTruncate(document["truncate"]),
				exceedMatching: optionalMatching(document["exceedMatching"]),
				argumentSeparator: optionalBoolean(document["separator"]),
				tempRoot: optionalString(document["tempRoot"]),
			},
			options,
		}),
	);
}

/**
 * Read and validate a configuration file.
 *
 * @param configPath Defaults to lrun.config.json in the working directory
 * @effect Effect<RunnerConfig, ConfigError>
 */
export function loadRunnerConfig(
	configPath: string = path.resolve(process.cwd(), CONFIG_FILE_NAME),
): Effect.Effect<RunnerConfig, ConfigError> {
	return Effect.try({
		try: () => JSON.parse(fs.readFileSync(configPath, "utf8")) as JSONValue,
		catch: (error) =>
			new ConfigError({
				message: `cannot read configuration: ${String(error)}`,
				path: configPath,
			}),
	}).pipe(
		Effect.flatMap((document) => parseRunnerConfig(document, configPath)),
	);
}
