/**
 * CHANGE: Centralized re-exports of the Node built-ins the shell layer touches
 * PURITY: SHELL (re-exports only)
 *
 * Invariant: exports compatible objects/functions, avoiding `export *` for modules with `export =`.
 */
import * as fsNS from "node:fs";
import * as osNS from "node:os";
import * as pathNS from "node:path";

export { spawnSync } from "node:child_process";

// node:path (and often node:fs) use `export =`, incompatible with `export *`
export const fs = fsNS;
export const os = osNS;
export const path = pathNS;
