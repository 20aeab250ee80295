// PURITY: CORE
// INVARIANT: One diagnostic line per failure, prefixed with the program name
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { AppError } from "./errors.js";

export const PROGRAM_NAME = "count-spec-loc";

/**
 * Render a failure the way a shell reports it: `<program>: <what>: <why>`.
 *
 * @pure true
 *
 * @example
 * ```ts
 * formatFailure(new ToolNotFound({ command: "cloc" }));
 * // => "count-spec-loc: cloc: command not found"
 * ```
 */
export function formatFailure(error: AppError): string {
	const body = match(error)
		.with(
			{ _tag: "WorkdirUnavailable" },
			({ path, detail }) =>
				`cannot change directory to ${path}: ${detail}`,
		)
		.with(
			{ _tag: "ToolNotFound" },
			({ command }) => `${command}: command not found`,
		)
		.with(
			{ _tag: "ToolSpawnFailed" },
			({ commandLine, detail }) =>
				`failed to execute \`${commandLine}\`: ${detail}`,
		)
		.exhaustive();
	return `${PROGRAM_NAME}: ${body}`;
}
