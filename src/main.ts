// CHANGE: Thin APP delegator for programmatic use
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value
// COMPLEXITY: O(1)

import { Effect, Either } from "effect";

import { runLinter } from "./app/runLinter.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs, USAGE } from "./shell/config/index.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @returns ExitCode: 0 clean, 1 violations, 2 usage or fatal error
 *
 * @pure false (reads process.argv, delegates to app orchestration)
 */
export async function main(): Promise<ExitCode> {
	const parsed = parseCLIArgs();
	if (Either.isLeft(parsed)) {
		console.error(`❌ ${parsed.left.detail}\n\n${USAGE}`);
		return 2;
	}
	return Effect.runPromise(runLinter(parsed.right));
}
