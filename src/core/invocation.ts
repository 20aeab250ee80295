// PURITY: CORE
// INVARIANT: buildClocArgs() is constant; options precede positional directories
// COMPLEXITY: O(n) where n = |args|

import { pipe } from "effect";

import type { ClocInvocation, TrampolineConfig } from "./models.js";

/**
 * Languages cloc is restricted to, in the order cloc receives them.
 */
export const INCLUDED_LANGUAGES = [
	"C",
	"C++",
	"C/C++ Header",
	"Assembly",
] as const;

/**
 * Files whose content matches this Perl regex are skipped (generated sources).
 */
export const EXCLUDE_CONTENT_PATTERN = "\\bDO NOT EDIT\\b";

export const FILE_ENCODING = "UTF-8";

export const CLOC_PROCESSES = 8;

/**
 * SPEC CPU2006 members counted, relative to the benchmark root.
 *
 * @invariant order is preserved on the command line
 */
export const BENCHMARK_DIRECTORIES = [
	"401.bzip",
	"445.gobmk",
	"456.hmmer",
	"458.sjeng",
	"462.libquantum",
	"464.h264ref",
	"471.omnetpp",
	"473.astar",
	"483.xalanbmk",
] as const;

/**
 * Option flags passed to cloc ahead of the positional directories.
 *
 * @pure true
 */
export function buildClocOptions(): readonly string[] {
	return [
		`--include-lang=${INCLUDED_LANGUAGES.join(",")}`,
		`--exclude-content=${EXCLUDE_CONTENT_PATTERN}`,
		"--verbose=1",
		`--file-encoding=${FILE_ENCODING}`,
		`--processes=${CLOC_PROCESSES}`,
	];
}

/**
 * Complete cloc argument vector.
 *
 * @pure true
 * @postcondition result = buildClocOptions() ++ BENCHMARK_DIRECTORIES
 *
 * @example
 * ```ts
 * buildClocArgs().at(-1); // "483.xalanbmk"
 * ```
 */
export function buildClocArgs(): readonly string[] {
	return [...buildClocOptions(), ...BENCHMARK_DIRECTORIES];
}

/**
 * @pure true
 * @invariant result.cwd === config.benchmarkRoot
 */
export function buildInvocation(config: TrampolineConfig): ClocInvocation {
	return {
		command: config.command,
		args: buildClocArgs(),
		cwd: config.benchmarkRoot,
	};
}

const SHELL_SAFE = /^[\w@%+=:,./-]+$/;

/**
 * Quote a single word for a POSIX shell.
 *
 * @pure true
 * @invariant sh -c "printf %s $(quoteShellWord(w))" prints w
 */
export function quoteShellWord(word: string): string {
	if (word.length > 0 && SHELL_SAFE.test(word)) {
		return word;
	}
	return `'${word.replaceAll("'", "'\"'\"'")}'`;
}

/**
 * Render an invocation as a copy-pasteable shell command line.
 *
 * @pure true
 *
 * @example
 * ```ts
 * renderCommandLine({ command: "cloc", args: ["--verbose=1", "a b"], cwd: "/x" });
 * // => "cd /x && cloc --verbose=1 'a b'"
 * ```
 */
export function renderCommandLine(invocation: ClocInvocation): string {
	return pipe(
		[invocation.command, ...invocation.args],
		(words) => words.map(quoteShellWord).join(" "),
		(line) => `cd ${quoteShellWord(invocation.cwd)} && ${line}`,
	);
}
