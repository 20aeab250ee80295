// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value; process.argv is never read
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { runTrampoline } from "./app/runTrampoline.js";
import type { ExitCode, TrampolineConfig } from "./core/models.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @returns cloc's exit status, or the trampoline's own failure status
 *
 * @pure false (delegates to app orchestration), but does not call process.exit
 */
export async function main(
	overrides?: Partial<TrampolineConfig>,
): Promise<ExitCode> {
	return Effect.runPromise(runTrampoline(overrides));
}
