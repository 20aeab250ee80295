// PURITY: SHELL (filesystem reads)
// EFFECT: Effect<string, WorkdirUnavailable>
// INVARIANT: succeeds iff path is a directory the process may enter
// COMPLEXITY: O(1)

import * as fs from "node:fs";

import { Effect } from "effect";

import { WorkdirUnavailable } from "../core/errors.js";

/**
 * Human-readable reason from a failed fs call.
 *
 * @pure true
 */
export function describeFsError(error: unknown): string {
	if (error instanceof Error) {
		const code = "code" in error ? error.code : undefined;
		return typeof code === "string" ? code : error.message;
	}
	return String(error);
}

/**
 * Verify the benchmark root before anything is spawned.
 *
 * @param dir Absolute directory the child will run in
 * @returns Effect succeeding with `dir`
 *
 * @pure false (stat + access)
 * @postcondition failure → no subprocess is started by the caller
 */
export function checkWorkdir(
	dir: string,
): Effect.Effect<string, WorkdirUnavailable> {
	return Effect.try({
		try: () => {
			const stat = fs.statSync(dir);
			if (!stat.isDirectory()) {
				return false;
			}
			fs.accessSync(dir, fs.constants.X_OK);
			return true;
		},
		catch: (error) =>
			new WorkdirUnavailable({ path: dir, detail: describeFsError(error) }),
	}).pipe(
		Effect.filterOrFail(
			(isDirectory) => isDirectory,
			() => new WorkdirUnavailable({ path: dir, detail: "ENOTDIR" }),
		),
		Effect.as(dir),
	);
}
