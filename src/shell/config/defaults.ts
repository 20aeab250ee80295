// PURITY: SHELL (reads the home directory)
// INVARIANT: Defaults depend on nothing but os.homedir(); argv and env are never consulted
// COMPLEXITY: O(1)

import * as os from "node:os";
import * as path from "node:path";

import type { TrampolineConfig } from "../../core/models.js";

/**
 * Benchmark root relative to the home directory, split per segment.
 */
export const BENCHMARK_ROOT_SEGMENTS = [
	"cheri",
	"build",
	"spec2006-128-build",
	"spec",
	"benchspec",
	"CPU2006",
] as const;

export const CLOC_COMMAND = "cloc";

/**
 * Expand a home-relative location into an absolute path.
 *
 * @pure true
 */
export function resolveBenchmarkRoot(homeDir: string): string {
	return path.join(homeDir, ...BENCHMARK_ROOT_SEGMENTS);
}

/**
 * Fixed configuration used by the CLI.
 *
 * @example
 * ```ts
 * defaultConfig();
 * // { benchmarkRoot: "/home/me/cheri/build/spec2006-128-build/spec/benchspec/CPU2006", command: "cloc" }
 * ```
 */
export function defaultConfig(): TrampolineConfig {
	return {
		benchmarkRoot: resolveBenchmarkRoot(os.homedir()),
		command: CLOC_COMMAND,
	};
}

/**
 * Apply programmatic overrides on top of the fixed defaults.
 *
 * @postcondition fields absent from `overrides` keep their default value
 */
export function resolveConfig(
	overrides: Partial<TrampolineConfig> = {},
): TrampolineConfig {
	return { ...defaultConfig(), ...overrides };
}
