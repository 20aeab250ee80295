// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Returns ExitCode as value; the success path writes nothing of its own
// COMPLEXITY: O(1) + child runtime

import { Effect } from "effect";

import { exitCodeOfError, exitCodeOfOutcome } from "../core/decision.js";
import type { AppError } from "../core/errors.js";
import { formatFailure } from "../core/format.js";
import { buildInvocation } from "../core/invocation.js";
import type { ExitCode, TrampolineConfig } from "../core/models.js";
import { resolveConfig } from "../shell/config/defaults.js";
import { checkWorkdir } from "../shell/preflight.js";
import { spawnInherited } from "../shell/process/spawn.js";

/**
 * Preflight then spawn; failures stay typed.
 *
 * @effect Effect<ExitCode, AppError>
 */
export function executeTrampoline(
	config: TrampolineConfig,
): Effect.Effect<ExitCode, AppError> {
	return Effect.gen(function* (_) {
		const cwd = yield* _(checkWorkdir(config.benchmarkRoot));
		const invocation = buildInvocation({ ...config, benchmarkRoot: cwd });
		const outcome = yield* _(spawnInherited(invocation));
		return exitCodeOfOutcome(outcome);
	});
}

/**
 * Report a failure on stderr and turn it into an exit status.
 *
 * @pure false (console output)
 */
function reportFailure(error: AppError): Effect.Effect<ExitCode> {
	return Effect.sync(() => {
		console.error(formatFailure(error));
		return exitCodeOfError(error);
	});
}

/**
 * Runs cloc over the fixed benchmark set and returns its exit status (no process.exit).
 *
 * @param overrides - Programmatic overrides; the CLI passes none
 * @returns Effect<ExitCode, never>
 *
 * @pure false (spawns cloc), but does not terminate the process
 * @postcondition cloc ran → result = cloc's exit status
 * @postcondition benchmark root unusable → result = 1 and nothing was spawned
 */
export function runTrampoline(
	overrides?: Partial<TrampolineConfig>,
): Effect.Effect<ExitCode, never> {
	return executeTrampoline(resolveConfig(overrides)).pipe(
		Effect.catchAll(reportFailure),
	);
}
