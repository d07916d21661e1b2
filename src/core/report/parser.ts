// CHANGE: Decode the KEY VALUE report lrun writes on descriptor 3
// PURITY: CORE
// FORMAT THEOREM:
//   fields(text) = fold over lines l: map[key(l)] := value(l)   (later lines win)
//   signal(text) defined ↔ toInt(SIGNALED) ≠ 0
// INVARIANT: Numeric fields degrade to 0; EXCEED never degrades (DecodeError)
// COMPLEXITY: O(|text|)

import { Either } from "effect";

import type { DecodeError } from "../errors.js";
import type { ExceededLimit, ExceedMatching } from "../models.js";
import { classifyExceed } from "./exceed.js";

/**
 * Typed view of one report.
 *
 * @invariant signal !== undefined ↔ SIGNALED was non-zero
 */
export interface ReportFields {
	readonly memoryBytes: number;
	readonly cpuTimeSeconds: number;
	readonly exceededLimit: ExceededLimit;
	readonly exitCode: number;
	readonly signal?: number;
}

/**
 * Split report text into a key → value map.
 *
 * Each line is split on its first space; a line without a space maps its key to "".
 *
 * @pure true
 * @complexity O(|text|)
 */
export function readReportLines(text: string): ReadonlyMap<string, string> {
	const entries = text
		.split("\n")
		.map((line) => line.replace(/\r$/, ""))
		.filter((line) => line.length > 0)
		.map((line): readonly [string, string] => {
			const space = line.indexOf(" ");
			return space === -1
				? [line, ""]
				: [line.slice(0, space), line.slice(space + 1)];
		});
	return new Map(entries);
}

/**
 * Leading-integer parse; anything unparsable is 0.
 *
 * @pure true
 */
export function toInteger(value: string | undefined): number {
	const parsed = Number.parseInt(value ?? "", 10);
	return Number.isNaN(parsed) ? 0 : parsed;
}

/**
 * Leading-float parse; anything unparsable is 0.
 *
 * @pure true
 */
export function toFloat(value: string | undefined): number {
	const parsed = Number.parseFloat(value ?? "");
	return Number.isNaN(parsed) ? 0 : parsed;
}

/**
 * Parse a complete report.
 *
 * @param text - Everything lrun wrote on the report channel
 * @param matching - EXCEED matching mode
 * @returns Right(fields) or Left(DecodeError) for an unexpected EXCEED value
 *
 * @pure true
 * @complexity O(|text|)
 *
 * @example
 * ```ts
 * parseReport("MEMORY 262144\nCPUTIME 0.002\nEXCEED none\nEXITCODE 0\nSIGNALED 0\nTERMSIG 0\n", "substring");
 * // Right({ memoryBytes: 262144, cpuTimeSeconds: 0.002, exceededLimit: "none", exitCode: 0 })
 * ```
 */
export function parseReport(
	text: string,
	matching: ExceedMatching,
): Either.Either<ReportFields, DecodeError> {
	const report = readReportLines(text);
	const signaled = toInteger(report.get("SIGNALED")) !== 0;

	return Either.map(
		classifyExceed(report.get("EXCEED"), matching),
		(exceededLimit): ReportFields => ({
			memoryBytes: toInteger(report.get("MEMORY")),
			cpuTimeSeconds: toFloat(report.get("CPUTIME")),
			exceededLimit,
			exitCode: toInteger(report.get("EXITCODE")),
			...(signaled ? { signal: toInteger(report.get("TERMSIG")) } : {}),
		}),
	);
}
