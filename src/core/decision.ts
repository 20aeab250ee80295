// FORMAT THEOREM: ∀o ∈ Exited: exitCodeOfOutcome(o) = o.code
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping Outcome | AppError → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { constants } from "node:os";

import { match } from "ts-pattern";

import type { AppError } from "./errors.js";
import type { ExitCode, ToolOutcome } from "./models.js";

export const EXIT_WORKDIR_UNAVAILABLE: ExitCode = 1;
export const EXIT_CANNOT_EXECUTE: ExitCode = 126;
export const EXIT_COMMAND_NOT_FOUND: ExitCode = 127;

const SIGNAL_EXIT_BASE = 128;

const SIGNAL_NUMBERS: ReadonlyMap<string, number> = new Map(
	Object.entries(constants.signals),
);

/**
 * Exit status a POSIX shell reports for a child killed by `signal`.
 *
 * @pure true
 * @postcondition unknown signal names map to 128
 */
export function signalExitCode(signal: NodeJS.Signals): ExitCode {
	return SIGNAL_EXIT_BASE + (SIGNAL_NUMBERS.get(signal) ?? 0);
}

/**
 * Exit status propagated from the child.
 *
 * @pure true
 * @invariant Exited → code verbatim; Signaled → 128 + signo
 *
 * @example
 * ```ts
 * exitCodeOfOutcome({ _tag: "Exited", code: 3 }); // 3
 * exitCodeOfOutcome({ _tag: "Signaled", signal: "SIGTERM" }); // 143
 * ```
 */
export const exitCodeOfOutcome = (outcome: ToolOutcome): ExitCode =>
	match(outcome)
		.with({ _tag: "Exited" }, ({ code }) => code)
		.with({ _tag: "Signaled" }, ({ signal }) => signalExitCode(signal))
		.exhaustive();

/**
 * Exit status for a failure raised before or while spawning the child.
 *
 * @pure true
 * @invariant result ≠ 0
 */
export const exitCodeOfError = (error: AppError): ExitCode =>
	match(error)
		.with({ _tag: "WorkdirUnavailable" }, () => EXIT_WORKDIR_UNAVAILABLE)
		.with({ _tag: "ToolNotFound" }, () => EXIT_COMMAND_NOT_FOUND)
		.with({ _tag: "ToolSpawnFailed" }, () => EXIT_CANNOT_EXECUTE)
		.exhaustive();
