/**
 * CHANGE: Centralized re-exports of Node built-ins used by the SHELL layer
 *
 * Invariant: re-export through constants rather than `export *`, since
 * node:path and node:fs are `export =` modules.
 */
import * as fsNS from "node:fs";
import * as osNS from "node:os";
import * as pathNS from "node:path";

export { execFile } from "node:child_process";

export const fs = fsNS;
export const os = osNS;
export const path = pathNS;
