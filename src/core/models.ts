// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Process exit status reported by the trampoline.
 *
 * @remarks
 * - @pure true
 * - @invariant 0 ≤ exitCode ≤ 255
 */
export type ExitCode = number;

/**
 * Where the line counter runs and which executable is spawned.
 *
 * @remarks
 * The CLI always uses {@link defaultConfig}; overrides exist for library
 * callers and tests (a stub executable in place of `cloc`).
 */
export interface TrampolineConfig {
	readonly benchmarkRoot: string;
	readonly command: string;
}

/**
 * Fully resolved subprocess invocation.
 *
 * @invariant args are passed to the child verbatim (no shell)
 */
export interface ClocInvocation {
	readonly command: string;
	readonly args: readonly string[];
	readonly cwd: string;
}

/**
 * How the child process terminated.
 */
export type ToolOutcome =
	| { readonly _tag: "Exited"; readonly code: number }
	| { readonly _tag: "Signaled"; readonly signal: NodeJS.Signals };
