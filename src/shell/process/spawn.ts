// PURITY: SHELL (executes external command)
// EFFECT: Effect<ToolOutcome, SpawnError | WorkdirUnavailable>
// INVARIANT: stdio is inherited, no shell is involved, the child runs in invocation.cwd
// COMPLEXITY: O(1) + child runtime

import { spawn } from "node:child_process";

import { Effect } from "effect";

import {
	type AppError,
	type SpawnError,
	ToolNotFound,
	ToolSpawnFailed,
} from "../../core/errors.js";
import { renderCommandLine } from "../../core/invocation.js";
import type { ClocInvocation, ToolOutcome } from "../../core/models.js";
import { checkWorkdir, describeFsError } from "../preflight.js";

/**
 * Map a spawn `error` event onto the error ADT.
 *
 * @pure true
 * @remarks ENOENT is ambiguous: Node reports a missing cwd the same way as a
 * missing executable. {@link spawnInherited} re-checks the cwd first.
 */
export function toSpawnError(
	invocation: ClocInvocation,
	error: Error,
): SpawnError {
	const reason = describeFsError(error);
	if (reason === "ENOENT") {
		return new ToolNotFound({ command: invocation.command });
	}
	return new ToolSpawnFailed({
		command: invocation.command,
		commandLine: renderCommandLine(invocation),
		detail: reason,
	});
}

/**
 * Spawn failure, attributed to the working directory when it is gone.
 *
 * @pure false (stat + access)
 * @postcondition cwd unusable → WorkdirUnavailable, else toSpawnError(...)
 */
export function classifySpawnFailure(
	invocation: ClocInvocation,
	error: Error,
): Effect.Effect<never, AppError> {
	return checkWorkdir(invocation.cwd).pipe(
		Effect.zipRight(Effect.fail(toSpawnError(invocation, error))),
	);
}

/**
 * Run the invocation to completion with the parent's stdin/stdout/stderr.
 *
 * @returns Effect with the way the child terminated
 *
 * @pure false (spawns a process)
 * @invariant resumes exactly once: first of `error` or `close`
 */
export function spawnInherited(
	invocation: ClocInvocation,
): Effect.Effect<ToolOutcome, AppError> {
	return Effect.async<ToolOutcome, AppError>((resume) => {
		let settled = false;
		const settle = (effect: Effect.Effect<ToolOutcome, AppError>): void => {
			if (settled) return;
			settled = true;
			resume(effect);
		};

		const child = spawn(invocation.command, [...invocation.args], {
			cwd: invocation.cwd,
			stdio: "inherit",
		});

		child.once("error", (error) => {
			settle(classifySpawnFailure(invocation, error));
		});
		child.once("close", (code, signal) => {
			if (signal !== null) {
				settle(Effect.succeed<ToolOutcome>({ _tag: "Signaled", signal }));
				return;
			}
			settle(Effect.succeed<ToolOutcome>({ _tag: "Exited", code: code ?? 0 }));
		});
	});
}
