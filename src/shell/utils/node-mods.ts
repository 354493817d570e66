/**
 * CHANGE: Centralized re-exports of Node built-ins used by the shell
 * WHY: One import block for fs promises and path across shell modules
 *
 * Invariant: re-export through constants; node:path and node:fs use `export =`,
 * which is incompatible with `export *`.
 */
import * as fsNS from "node:fs";
import * as pathNS from "node:path";

export { fileURLToPath } from "node:url";

export const fsPromises = fsNS.promises;
export const path = pathNS;

/**
 * Whether a thrown filesystem error means "no such file".
 *
 * @pure true
 */
export function isNotFound(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}
