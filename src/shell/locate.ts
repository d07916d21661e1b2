// CHANGE: Locate the lrun executable on a PATH-style search path
// PURITY: SHELL (filesystem lookups)
// EFFECT: Effect<string, NotAvailable>
// INVARIANT: ∀ (searchPath, name): the lookup runs at most once per process
// COMPLEXITY: O(|dirs|) stat calls on first lookup, O(1) afterwards

import { Effect } from "effect";

import { NotAvailable } from "../core/errors.js";
import type { InvocationSettings } from "../core/types/settings.js";
import { fs, path } from "../utils/node-mods.js";
import { debugLog } from "./debug.js";

const resolved = new Map<string, string | null>();

/**
 * Check that a path names an executable regular file.
 *
 * Postcondition: returns false on any filesystem error.
 */
export function isExecutableFile(candidate: string): boolean {
	try {
		fs.accessSync(candidate, fs.constants.X_OK);
		return fs.statSync(candidate).isFile();
	} catch {
		return false;
	}
}

/**
 * First executable `binaryName` among the search path's directories, or null.
 *
 * Empty entries are skipped; the scan does not consult the cache.
 */
export function findExecutable(
	binaryName: string,
	searchPath: string,
): string | null {
	const candidates = searchPath
		.split(path.delimiter)
		.filter((dir) => dir.length > 0)
		.map((dir) => path.join(dir, binaryName));
	return candidates.find(isExecutableFile) ?? null;
}

/**
 * Cached lookup for a settings pair.
 */
function lookup(
	settings: Pick<InvocationSettings, "binaryName" | "searchPath">,
): string | null {
	const key = `${settings.searchPath}\u0000${settings.binaryName}`;
	const cached = resolved.get(key);
	if (cached !== undefined) {
		return cached;
	}
	const found = findExecutable(settings.binaryName, settings.searchPath);
	debugLog(`resolved ${settings.binaryName} -> ${found ?? "<not found>"}`);
	resolved.set(key, found);
	return found;
}

/**
 * Whether lrun can be found, without failing.
 *
 * @pure false (filesystem lookup, cached)
 */
export function isAvailable(
	settings: Pick<InvocationSettings, "binaryName" | "searchPath">,
): boolean {
	return lookup(settings) !== null;
}

/**
 * Resolve lrun or fail with NotAvailable.
 *
 * @effect Effect<string, NotAvailable>
 */
export function locateExecutable(
	settings: Pick<InvocationSettings, "binaryName" | "searchPath">,
): Effect.Effect<string, NotAvailable> {
	return Effect.suspend(() => {
		const found = lookup(settings);
		return found === null
			? Effect.fail(
					new NotAvailable({
						message: `${settings.binaryName} not found in PATH. Please install lrun first.`,
						binaryName: settings.binaryName,
					}),
				)
			: Effect.succeed(found);
	});
}
