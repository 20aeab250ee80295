#!/usr/bin/env node

// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { main } from "../main.js";

/**
 * CLI entry point. Takes no arguments; anything on the command line is ignored.
 *
 * @remarks
 * - @pure false (process termination)
 * - @postcondition exit status = cloc's exit status, or the failure status
 */
void (async (): Promise<void> => {
	try {
		const code = await main();
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
