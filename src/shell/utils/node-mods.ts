/**
 * CHANGE: Centralized re-exports of the Node built-ins used by the shell
 *
 * Invariant: export compatible objects/functions, avoiding `export *` for modules using `export =`.
 */
import * as fsNS from "node:fs";
import * as osNS from "node:os";
import * as pathNS from "node:path";

export { spawn } from "node:child_process";
export { randomBytes } from "node:crypto";

// CHANGE: Re-export through constants instead of `export *`
// REF: TypeScript limitation for `export =`
export const fs = fsNS;
export const os = osNS;
export const path = pathNS;
