#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// FORMAT THEOREM: ∀run: main() resolves exitCode ∈ {0,1,2} → process.exit(exitCode) occurs exactly once
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) (delegates to APP)

import { main } from "../main.js";

/**
 * CLI entry point for guidelint.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @postcondition process terminates exactly once
 */
void (async (): Promise<void> => {
	try {
		const code = await main();
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(2);
	}
})();
