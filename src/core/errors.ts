// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Benchmark root is missing, not a directory, or not accessible.
 *
 * @invariant path.length > 0
 */
export class WorkdirUnavailable extends Data.TaggedError("WorkdirUnavailable")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Executable could not be resolved through PATH (spawn ENOENT).
 */
export class ToolNotFound extends Data.TaggedError("ToolNotFound")<{
	readonly command: string;
}> {}

/**
 * Spawn failed for any reason other than a missing executable.
 */
export class ToolSpawnFailed extends Data.TaggedError("ToolSpawnFailed")<{
	readonly command: string;
	readonly commandLine: string;
	readonly detail: string;
}> {}

export type SpawnError = ToolNotFound | ToolSpawnFailed;

export type AppError = WorkdirUnavailable | SpawnError;
