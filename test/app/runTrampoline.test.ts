import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";
import { afterEach, describe, expect, it, vi } from "vitest";

import { runTrampoline } from "../../src/app/runTrampoline.js";
import type { ExitCode, TrampolineConfig } from "../../src/core/models.js";
import { main } from "../../src/main.js";
import {
	createStubTool,
	type StubTool,
	type StubToolOptions,
} from "../utils/stubTool.js";

const EXPECTED_ARGS = [
	"--include-lang=C,C++,C/C++ Header,Assembly",
	"--exclude-content=\\bDO NOT EDIT\\b",
	"--verbose=1",
	"--file-encoding=UTF-8",
	"--processes=8",
	"401.bzip",
	"445.gobmk",
	"456.hmmer",
	"458.sjeng",
	"462.libquantum",
	"464.h264ref",
	"471.omnetpp",
	"473.astar",
	"483.xalanbmk",
];

/**
 * Replace process.argv for the duration of an async call and restore afterwards.
 */
async function withArgv<T>(
	args: readonly string[],
	fn: () => Promise<T>,
): Promise<T> {
	const original = process.argv.slice();
	try {
		process.argv = [
			original[0] ?? "node",
			original[1] ?? "count-spec-loc",
			...args,
		];
		return await fn();
	} finally {
		process.argv = original;
	}
}

describe("runTrampoline", () => {
	const stubs: StubTool[] = [];

	const makeStub = (options?: StubToolOptions): StubTool => {
		const stub = createStubTool(options);
		stubs.push(stub);
		return stub;
	};

	const run = (
		stub: StubTool,
		overrides: Partial<TrampolineConfig> = {},
	): Promise<ExitCode> =>
		Effect.runPromise(
			runTrampoline({
				benchmarkRoot: overrides.benchmarkRoot ?? stub.benchmarkRoot,
				command: overrides.command ?? stub.command,
			}),
		);

	afterEach(() => {
		for (const stub of stubs.splice(0)) stub.cleanup();
		vi.restoreAllMocks();
	});

	it("passes the fixed argument vector to the tool and exits 0", async () => {
		const stub = makeStub();
		const code = await run(stub);
		expect(code).toBe(0);
		expect(stub.readArgs()).toEqual(EXPECTED_ARGS);
	});

	it("runs the tool inside the benchmark root without changing the process cwd", async () => {
		const stub = makeStub();
		const before = process.cwd();
		await run(stub);
		expect(stub.readCwd()).toBe(fs.realpathSync(stub.benchmarkRoot));
		expect(process.cwd()).toBe(before);
	});

	it.each([1, 3, 42, 255])("propagates tool exit status %i", async (exitCode) => {
		const stub = makeStub({ exitCode });
		expect(await run(stub)).toBe(exitCode);
	});

	it("propagates a signal termination as 128 + signal number", async () => {
		const stub = makeStub({ signal: "TERM" });
		expect(await run(stub)).toBe(143);
	});

	it("fails with 1 and spawns nothing when the benchmark root is missing", async () => {
		const stub = makeStub();
		const error = vi.spyOn(console, "error").mockImplementation(() => {
			// silence
		});
		const missing = path.join(stub.root, "missing");
		const code = await run(stub, { benchmarkRoot: missing });
		expect(code).toBe(1);
		expect(stub.readArgs()).toEqual([]);
		expect(stub.readCwd()).toBeNull();
		expect(error).toHaveBeenCalledTimes(1);
		expect(error).toHaveBeenCalledWith(
			`count-spec-loc: cannot change directory to ${missing}: ENOENT`,
		);
	});

	it("fails with 127 when the tool is absent", async () => {
		const stub = makeStub();
		const error = vi.spyOn(console, "error").mockImplementation(() => {
			// silence
		});
		const absent = path.join(stub.root, "no-such-cloc");
		expect(await run(stub, { command: absent })).toBe(127);
		expect(error).toHaveBeenCalledWith(
			`count-spec-loc: ${absent}: command not found`,
		);
	});

	it("fails with 126 when the tool is not executable", async () => {
		const stub = makeStub();
		const error = vi.spyOn(console, "error").mockImplementation(() => {
			// silence
		});
		const plain = path.join(stub.root, "cloc-not-executable");
		fs.writeFileSync(plain, "#!/bin/sh\nexit 0\n", { mode: 0o644 });
		expect(await run(stub, { command: plain })).toBe(126);
		expect(error).toHaveBeenCalledTimes(1);
		expect(error.mock.calls[0]?.[0]).toMatch(/: EACCES$/);
	});

	it("writes nothing of its own on success, run after run", async () => {
		const stub = makeStub();
		const log = vi.spyOn(console, "log");
		const error = vi.spyOn(console, "error");
		const warn = vi.spyOn(console, "warn");
		const stdout = vi.spyOn(process.stdout, "write");
		const stderr = vi.spyOn(process.stderr, "write");

		expect(await run(stub)).toBe(0);
		const firstArgs = stub.readArgs();
		expect(await run(stub)).toBe(0);

		expect(stub.readArgs()).toEqual(firstArgs);
		expect(log).not.toHaveBeenCalled();
		expect(error).not.toHaveBeenCalled();
		expect(warn).not.toHaveBeenCalled();
		expect(stdout).not.toHaveBeenCalled();
		expect(stderr).not.toHaveBeenCalled();
	});
});

describe("main", () => {
	const stubs: StubTool[] = [];

	afterEach(() => {
		for (const stub of stubs.splice(0)) stub.cleanup();
	});

	it("ignores command-line arguments entirely", async () => {
		const stub = createStubTool({ exitCode: 5 });
		stubs.push(stub);
		const code = await withArgv(
			["--processes=1", "--help", "some/dir"],
			() => main({ benchmarkRoot: stub.benchmarkRoot, command: stub.command }),
		);
		expect(code).toBe(5);
		expect(stub.readArgs()).toEqual(EXPECTED_ARGS);
	});
});
