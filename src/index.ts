// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or APP entry points

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run cloc over the fixed SPEC CPU2006 set and resolve with its exit status.
 *
 * @example
 * ```typescript
 * import { main } from "count-spec-loc";
 *
 * const exitCode = await main();
 * ```
 */
export { main } from "./main.js";
export { executeTrampoline, runTrampoline } from "./app/runTrampoline.js";
export {
	defaultConfig,
	resolveBenchmarkRoot,
	resolveConfig,
} from "./shell/config/defaults.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	ClocInvocation,
	ExitCode,
	ToolOutcome,
	TrampolineConfig,
} from "./core/models.js";
export type { AppError, SpawnError } from "./core/errors.js";
export {
	ToolNotFound,
	ToolSpawnFailed,
	WorkdirUnavailable,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	BENCHMARK_DIRECTORIES,
	buildClocArgs,
	buildClocOptions,
	buildInvocation,
	renderCommandLine,
} from "./core/invocation.js";
export { exitCodeOfError, exitCodeOfOutcome } from "./core/decision.js";
export { formatFailure } from "./core/format.js";
